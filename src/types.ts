import type { OpenAPI } from 'openapi-types';
import type { UnsupportedConstructError } from './errors.js';
import type { JsonObject } from './utils/json.js';

export type { JsonObject } from './utils/json.js';

export type SourceDocument = OpenAPI.Document;

export interface SpecInfo {
  readonly title: string;
  readonly version: string;
  readonly description?: string;
}

/**
 * The OpenAPI-3-shaped form of a loaded document. Swagger 2.0 input is converted into this
 * shape by the loader, so the generator only ever deals with one layout.
 */
export interface SpecDocument {
  readonly info: SpecInfo;
  readonly servers: readonly string[];
  readonly schemas: Readonly<Record<string, JsonObject>>;
  readonly paths: Readonly<Record<string, JsonObject>>;
  readonly parameters: Readonly<Record<string, JsonObject>>;
  readonly requestBodies: Readonly<Record<string, JsonObject>>;
  readonly responses: Readonly<Record<string, JsonObject>>;
  readonly securitySchemes: Readonly<Record<string, JsonObject>>;
  /** The document as loaded, before conversion; local `$ref` pointers resolve against it. */
  readonly root?: JsonObject;
}

export type NameKind = 'module' | 'class' | 'method' | 'field' | 'variable';

export type PrimitiveKind = 'string' | 'integer' | 'number' | 'boolean';

export type EnumValue = string | number | boolean;

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly primitive: PrimitiveKind;
  readonly format?: string;
}

export interface ArrayType {
  readonly kind: 'array';
  readonly items: TypeRef;
}

export interface MapType {
  readonly kind: 'map';
  readonly values: TypeRef;
}

export interface ObjectField {
  readonly name: string;
  readonly wireName: string;
  readonly type: TypeRef;
  readonly doc?: string;
}

export interface ObjectType {
  readonly kind: 'object';
  readonly name: string;
  readonly fields: ReadonlyMap<string, ObjectField>;
  readonly required: ReadonlySet<string>;
  readonly doc?: string;
}

export interface EnumType {
  readonly kind: 'enum';
  readonly name: string;
  readonly values: readonly EnumValue[];
  readonly doc?: string;
}

/** Points at a named type by its sanitized name; this is how cycles stay finite. */
export interface NamedRef {
  readonly kind: 'ref';
  readonly name: string;
}

export interface UnresolvedType {
  readonly kind: 'unresolved';
  readonly reason?: string;
}

export type TypeRef = PrimitiveType | ArrayType | MapType | ObjectType | EnumType | NamedRef | UnresolvedType;

export type ResolvedTypes = ReadonlyMap<string, TypeRef>;

export type ParameterLocation = 'path' | 'query' | 'header';

export interface Parameter {
  readonly name: string;
  readonly wireName: string;
  readonly location: ParameterLocation;
  readonly type: TypeRef;
  readonly required: boolean;
  readonly description?: string;
}

export type HttpMethod = 'get' | 'put' | 'post' | 'delete' | 'options' | 'head' | 'patch' | 'trace';

export interface RequestBody {
  readonly type: TypeRef;
  readonly required: boolean;
  readonly contentType: string;
}

export interface ResponseDescriptor {
  /** A status code, a range such as `4XX`, or `default`. */
  readonly status: string;
  /** Absent when the response carries no content. */
  readonly type?: TypeRef;
  readonly description?: string;
}

export interface Operation {
  readonly method: HttpMethod;
  readonly path: string;
  /** The tag this entry is grouped under. */
  readonly tag: string;
  readonly tags: readonly string[];
  readonly methodName: string;
  readonly parameters: readonly Parameter[];
  readonly paramsTypeName?: string;
  readonly requestBody?: RequestBody;
  readonly responses: readonly ResponseDescriptor[];
  readonly summary?: string;
  readonly description?: string;
  readonly deprecated: boolean;
}

export type AuthDescriptor =
  | {
      readonly strategy: 'api_key';
      readonly schemeName: string;
      readonly parameterName: string;
      readonly location: 'header' | 'query';
      readonly description?: string;
    }
  | { readonly strategy: 'basic'; readonly schemeName: string; readonly description?: string }
  | { readonly strategy: 'none' };

export type GeneratedPackage = ReadonlyMap<string, string>;

export interface GenerationResult {
  readonly files: GeneratedPackage;
  readonly warnings: readonly UnsupportedConstructError[];
}

export interface GeneratorConfig {
  packageName?: string;
  baseUrlOverride?: string;
  includeTags?: readonly string[];
  failOnUnsupported?: boolean;
}

export interface GeneratorOptions extends GeneratorConfig {
  spec: string;
  outputDir: string;
  headers?: Record<string, string>;
  noProgress?: boolean;
}

export interface APIConfig {
  name: string;
  spec: string;
  output?: string;  // matches --output
  packageName?: string;  // matches --package-name
  baseUrl?: string;  // matches --base-url
  includeTags?: string[];  // matches --tag
  headers?: Record<string, string>;  // matches --header
  failOnUnsupported?: boolean;  // matches --fail-on-unsupported
}

export interface ForgeConfig {
  apis: APIConfig[];
}

/**
 * Resolves environment variables in header values.
 * Supports syntax: ${VAR_NAME} or ${VAR_NAME:default_value}
 *
 * @param value The header value that may contain environment variable references
 * @returns The resolved value with environment variables substituted
 */
export function resolveEnvironmentVariables(value: string): string {
  return value.replace(/\$\{([^}:]+)(?::([^}]*))?\}/g, (match: string, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Unset variable without a default keeps its placeholder
    return match;
  });
}

export function resolveHeadersEnvironmentVariables(headers: Record<string, string>): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    resolved[key] = resolveEnvironmentVariables(value);
  }
  return resolved;
}
