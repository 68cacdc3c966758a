import SwaggerParser from '@apidevtools/swagger-parser';
import { InvalidSpecificationError } from './errors.js';
import { resolveHeadersEnvironmentVariables, type SourceDocument, type SpecDocument, type SpecInfo } from './types.js';
import {
  escapePointer,
  getArray,
  getObject,
  getString,
  getStringArray,
  isJsonObject,
  lookup,
  objectEntries,
  refTail,
  resolvePointer,
  type JsonObject,
} from './utils/json.js';

export interface LoadOptions {
  /** Sent with every HTTP request made while fetching a remote document. */
  headers?: Record<string, string>;
}

const FORM_CONTENT_TYPES = ['multipart/form-data', 'application/x-www-form-urlencoded'];

// Swagger 2.0 keywords that move from a non-body parameter into its schema
const SIMPLE_SCHEMA_KEYS = [
  'type', 'format', 'items', 'enum', 'default', 'minimum', 'maximum', 'minLength', 'maxLength',
  'pattern', 'minItems', 'maxItems',
];

export function isUrl(source: string): boolean {
  return source.startsWith('http://') || source.startsWith('https://');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function requireObject(value: unknown, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new InvalidSpecificationError(`${what} is not an object`);
  }
  return value;
}

function objectMap(source: JsonObject | undefined): Record<string, JsonObject> {
  return Object.fromEntries(objectEntries(source));
}

/**
 * Reads, bundles and validates a document from a file path or URL, then normalizes it.
 * `${VAR}` references in header values are resolved here, once, right before fetching.
 * Every failure surfaces as an `InvalidSpecificationError`.
 */
export async function loadSpec(source: string, options: LoadOptions = {}): Promise<SpecDocument> {
  const headers = options.headers ? resolveHeadersEnvironmentVariables(options.headers) : undefined;

  let document: SourceDocument;
  try {
    document = await SwaggerParser.bundle(source, headers ? { resolve: { http: { headers } } } : {});
  } catch (error) {
    throw new InvalidSpecificationError(`Failed to read ${source}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    // validate() dereferences in place; keep the bundled $refs intact for the generator
    await SwaggerParser.validate(structuredClone(document));
  } catch (error) {
    throw new InvalidSpecificationError(`${source} is not a valid OpenAPI document: ${errorMessage(error)}`, { cause: error });
  }

  return normalizeDocument(document);
}

/**
 * Converts a parsed Swagger 2.0 or OpenAPI 3.x document into the OpenAPI-3-shaped `SpecDocument`.
 */
export function normalizeDocument(document: unknown): SpecDocument {
  const root = requireObject(document, 'The document');
  const swagger = getString(root, 'swagger');
  if (swagger !== undefined) {
    if (!swagger.startsWith('2.')) {
      throw new InvalidSpecificationError(`Unsupported Swagger version "${swagger}"`);
    }
    return new SwaggerConverter(root).convert();
  }

  const openapi = getString(root, 'openapi');
  if (openapi === undefined || !openapi.startsWith('3.')) {
    throw new InvalidSpecificationError(`Unsupported OpenAPI version "${openapi ?? 'missing'}"`);
  }

  const components = getObject(root, 'components');
  return {
    info: readInfo(root),
    servers: (getArray(root, 'servers') ?? []).filter(isJsonObject).flatMap(server => {
      const url = getString(server, 'url');
      return url === undefined ? [] : [expandServerVariables(url, getObject(server, 'variables'))];
    }),
    schemas: objectMap(components && getObject(components, 'schemas')),
    paths: readPaths(root),
    parameters: objectMap(components && getObject(components, 'parameters')),
    requestBodies: objectMap(components && getObject(components, 'requestBodies')),
    responses: objectMap(components && getObject(components, 'responses')),
    securitySchemes: objectMap(components && getObject(components, 'securitySchemes')),
    root,
  };
}

function readInfo(root: JsonObject): SpecInfo {
  const info = getObject(root, 'info') ?? {};
  const description = getString(info, 'description');
  return {
    title: getString(info, 'title') ?? 'API',
    version: getString(info, 'version') ?? '0.0.0',
    ...(description === undefined ? {} : { description }),
  };
}

function readPaths(root: JsonObject): Record<string, JsonObject> {
  return Object.fromEntries(objectEntries(getObject(root, 'paths')).filter(([path]) => path.startsWith('/')));
}

export function expandServerVariables(url: string, variables: JsonObject | undefined): string {
  return url.replace(/\{([^}]+)\}/g, (match: string, name: string) => {
    const variable = variables && getObject(variables, name);
    return (variable && getString(variable, 'default')) ?? match;
  });
}

/**
 * Rewrites the parts of a Swagger 2.0 document the generator reads into their OpenAPI 3 form.
 * Parameter and response `$ref`s are inlined, since body and form parameters turn into request
 * bodies and cannot stay shared parameters.
 */
class SwaggerConverter {
  private readonly consumes: string[];
  private readonly produces: string[];

  constructor(private readonly root: JsonObject) {
    this.consumes = getStringArray(root, 'consumes');
    this.produces = getStringArray(root, 'produces');
  }

  convert(): SpecDocument {
    const paths: Record<string, JsonObject> = {};
    for (const [path, pathItem] of Object.entries(readPaths(this.root))) {
      paths[path] = this.convertPathItem(pathItem, `#/paths/${escapePointer(path)}`);
    }

    return {
      info: readInfo(this.root),
      servers: this.servers(),
      schemas: objectMap(getObject(this.root, 'definitions')),
      paths,
      parameters: {},
      requestBodies: {},
      responses: {},
      securitySchemes: Object.fromEntries(
        objectEntries(getObject(this.root, 'securityDefinitions')).map(([name, scheme]) => [
          name,
          getString(scheme, 'type') === 'basic' ? { type: 'http', scheme: 'basic', description: scheme.description } : scheme,
        ]),
      ),
      root: this.root,
    };
  }

  private servers(): string[] {
    const host = getString(this.root, 'host');
    const basePath = getString(this.root, 'basePath') ?? '';
    if (host === undefined) {
      return basePath ? [basePath] : [];
    }
    const scheme = getStringArray(this.root, 'schemes')[0] ?? 'https';
    return [`${scheme}://${host}${basePath}`];
  }

  private convertPathItem(pathItem: JsonObject, location: string): JsonObject {
    const converted: Record<string, unknown> = {};
    const shared = this.resolveParameters(getArray(pathItem, 'parameters'), location);
    for (const [key, value] of Object.entries(pathItem)) {
      if (key === 'parameters') continue;
      converted[key] = isJsonObject(value) && key !== '$ref' ? this.convertOperation(value, shared, `${location}/${key}`) : value;
    }
    return converted;
  }

  private convertOperation(operation: JsonObject, shared: JsonObject[], location: string): JsonObject {
    const own = this.resolveParameters(getArray(operation, 'parameters'), location);
    const consumes = getArray(operation, 'consumes') ? getStringArray(operation, 'consumes') : this.consumes;
    const produces = getArray(operation, 'produces') ? getStringArray(operation, 'produces') : this.produces;

    // Operation parameters override path-level ones with the same name and location
    const merged = new Map<string, JsonObject>();
    for (const parameter of [...shared, ...own]) {
      merged.set(`${getString(parameter, 'in')}:${getString(parameter, 'name')}`, parameter);
    }
    const parameters = [...merged.values()];

    const converted: Record<string, unknown> = { ...operation };
    delete converted.consumes;
    delete converted.produces;

    converted.parameters = parameters
      .filter(parameter => !['body', 'formData'].includes(getString(parameter, 'in') ?? ''))
      .map(parameter => this.convertParameter(parameter));

    const requestBody = this.convertBody(parameters, consumes);
    if (requestBody) {
      converted.requestBody = requestBody;
    }

    const responses = getObject(operation, 'responses');
    if (responses) {
      const mediaType = produces.find(type => /[/+]json(;|$)/i.test(type)) ?? produces[0] ?? 'application/json';
      converted.responses = Object.fromEntries(
        Object.entries(responses).map(([status, response]) => [status, this.convertResponse(response, mediaType, `${location}/responses/${status}`)]),
      );
    }
    return converted;
  }

  private convertParameter(parameter: JsonObject): JsonObject {
    const schema: Record<string, unknown> = {};
    const converted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(parameter)) {
      if (SIMPLE_SCHEMA_KEYS.includes(key)) {
        schema[key] = value;
      } else if (key !== 'collectionFormat' && key !== 'allowEmptyValue') {
        converted[key] = value;
      }
    }
    converted.schema = schema;
    return converted;
  }

  private convertBody(parameters: JsonObject[], consumes: string[]): JsonObject | undefined {
    const body = parameters.find(parameter => getString(parameter, 'in') === 'body');
    if (body) {
      const contentType = consumes.find(type => /[/+]json(;|$)/i.test(type)) ?? consumes[0] ?? 'application/json';
      return {
        required: body.required === true,
        ...(typeof body.description === 'string' ? { description: body.description } : {}),
        content: { [contentType]: { schema: body.schema ?? {} } },
      };
    }

    const fields = parameters.filter(parameter => getString(parameter, 'in') === 'formData');
    if (fields.length === 0) {
      return undefined;
    }
    const hasFile = fields.some(field => getString(field, 'type') === 'file');
    const contentType = hasFile ? FORM_CONTENT_TYPES[0] : (consumes.find(type => FORM_CONTENT_TYPES.includes(type)) ?? FORM_CONTENT_TYPES[1]);
    const required = fields.filter(field => field.required === true).flatMap(field => getString(field, 'name') ?? []);

    const properties: Record<string, unknown> = {};
    for (const field of fields) {
      const name = getString(field, 'name');
      if (name === undefined) continue;
      const schema = requireObject(this.convertParameter(field).schema, `Form field "${name}"`);
      properties[name] = getString(schema, 'type') === 'file' ? { ...schema, type: 'string', format: 'binary' } : schema;
    }
    return {
      required: required.length > 0,
      content: { [contentType]: { schema: { type: 'object', properties, ...(required.length > 0 ? { required } : {}) } } },
    };
  }

  private convertResponse(raw: unknown, mediaType: string, location: string): JsonObject {
    const response = this.inline(raw, 'responses', location);
    const converted: Record<string, unknown> = { description: response.description ?? '' };
    if (response.schema !== undefined) {
      converted.content = { [mediaType]: { schema: response.schema } };
    }
    if (response.headers !== undefined) {
      converted.headers = response.headers;
    }
    return converted;
  }

  private resolveParameters(raw: readonly unknown[] | undefined, location: string): JsonObject[] {
    return (raw ?? []).map((parameter, index) => this.inline(parameter, 'parameters', `${location}/parameters/${index}`));
  }

  private inline(raw: unknown, section: 'parameters' | 'responses', location: string): JsonObject {
    const value = requireObject(raw, `The entry at ${location}`);
    const ref = getString(value, '$ref');
    if (ref === undefined) {
      return value;
    }
    const name = refTail(ref, [`#/${section}/`]);
    const target = (name === undefined ? undefined : lookup(objectMap(getObject(this.root, section)), name)) ?? resolvePointer(this.root, ref);
    if (!isJsonObject(target)) {
      throw new InvalidSpecificationError(`Unresolvable $ref "${ref}" at ${location}`);
    }
    return target;
  }
}
