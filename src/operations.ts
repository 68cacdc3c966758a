import { OpenAPIV3 } from 'openapi-types';
import { InvalidSpecificationError, type WarningCollector } from './errors.js';
import type { SchemaResolver } from './resolver.js';
import type {
  HttpMethod,
  Operation,
  Parameter,
  ParameterLocation,
  RequestBody,
  ResponseDescriptor,
  SpecDocument,
  TypeRef,
} from './types.js';
import {
  documentRoot,
  escapePointer,
  getArray,
  getBoolean,
  getObject,
  getString,
  getStringArray,
  isJsonObject,
  lookup,
  refTail,
  resolvePointer,
  type JsonObject,
} from './utils/json.js';
import { NameRegistry } from './utils/naming.js';

export const DEFAULT_TAG = 'default';

/** Identifiers every generated method body already uses. */
const METHOD_LOCALS = ['body', 'params', 'options', 'response'];

/** Members of a generated API class other than its operations. */
const API_CLASS_MEMBERS = ['client'];

const MAX_REF_DEPTH = 32;

type ComponentSection = 'parameters' | 'requestBodies' | 'responses';

function isHttpMethod(key: string): key is HttpMethod {
  return Object.values(OpenAPIV3.HttpMethods).some(method => method === key);
}

function isParameterLocation(value: string): value is ParameterLocation {
  return value === 'path' || value === 'query' || value === 'header';
}

export function isSuccessStatus(status: string): boolean {
  return /^2[0-9X]{2}$/i.test(status);
}

/**
 * Builds a method name for an operation without an operationId, e.g. `GET /pets/{id}`
 * becomes "get pets by id".
 */
export function synthesizeOperationName(method: string, path: string): string {
  const words = [method];
  for (const segment of path.split('/')) {
    if (segment.length === 0) continue;
    const placeholder = /^\{(.+)\}$/.exec(segment);
    words.push(placeholder ? `by ${placeholder[1]}` : segment);
  }
  return words.join(' ');
}

export function pathPlaceholders(path: string): string[] {
  return [...new Set([...path.matchAll(/\{([^}]+)\}/g)].map(match => match[1]))];
}

/**
 * Picks the media type a generated client speaks: JSON first, then any JSON flavour,
 * then whatever is declared first.
 */
export function pickMediaType(content: JsonObject | undefined): [string, JsonObject] | undefined {
  if (!content) return undefined;
  const entries = Object.entries(content).filter((entry): entry is [string, JsonObject] => isJsonObject(entry[1]));
  return (
    entries.find(([type]) => type === 'application/json') ??
    entries.find(([type]) => /[/+]json(;|$)/i.test(type)) ??
    entries[0]
  );
}

interface ParameterDraft {
  wireName: string;
  location: ParameterLocation;
  type: TypeRef;
  required: boolean;
  description?: string;
}

export interface ExtractorOptions {
  includeTags?: readonly string[];
}

/**
 * Walks every path and method of the specification and produces one `Operation` per tag it is
 * filed under.
 */
export class OperationExtractor {
  private readonly methodNames = new Map<string, NameRegistry>();
  private readonly includeTags: ReadonlySet<string> | undefined;
  private readonly root: JsonObject;

  constructor(
    private readonly spec: SpecDocument,
    private readonly resolver: SchemaResolver,
    private readonly names: NameRegistry,
    private readonly warnings: WarningCollector,
    options: ExtractorOptions = {},
  ) {
    this.includeTags = options.includeTags ? new Set(options.includeTags) : undefined;
    this.root = documentRoot(spec);
  }

  extractAll(): Operation[] {
    if (Object.keys(this.spec.paths).length === 0) {
      throw new InvalidSpecificationError('The specification declares no paths');
    }

    const operations: Operation[] = [];
    for (const [path, pathItem] of Object.entries(this.spec.paths)) {
      const sharedParameters = getArray(pathItem, 'parameters') ?? [];

      for (const [method, rawOperation] of Object.entries(pathItem)) {
        if (!isHttpMethod(method) || !isJsonObject(rawOperation)) continue;

        const declaredTags = getStringArray(rawOperation, 'tags');
        const tags = declaredTags.length > 0 ? [...new Set(declaredTags)] : [DEFAULT_TAG];
        const emittedTags = tags.filter(tag => this.includeTags === undefined || this.includeTags.has(tag));
        if (emittedTags.length === 0) continue;

        const location = `#/paths/${escapePointer(path)}/${method}`;
        const baseName = getString(rawOperation, 'operationId') ?? synthesizeOperationName(method, path);

        const parameters = this.extractParameters(path, [...sharedParameters, ...(getArray(rawOperation, 'parameters') ?? [])], baseName, location);
        const paramsTypeName = parameters.some(parameter => parameter.location !== 'path')
          ? this.names.claim(`${baseName} Params`, 'class')
          : undefined;
        const requestBody = this.extractRequestBody(rawOperation, baseName, location);
        const responses = this.extractResponses(rawOperation, baseName, location);
        const summary = getString(rawOperation, 'summary');
        const description = getString(rawOperation, 'description');

        for (const tag of emittedTags) {
          operations.push({
            method,
            path,
            tag,
            tags,
            methodName: this.methodRegistry(tag).claim(baseName, 'method'),
            parameters,
            paramsTypeName,
            requestBody,
            responses,
            summary,
            description,
            deprecated: getBoolean(rawOperation, 'deprecated') === true,
          });
        }
      }
    }
    return operations;
  }

  private methodRegistry(tag: string): NameRegistry {
    let registry = this.methodNames.get(tag);
    if (!registry) {
      registry = new NameRegistry(`methods of tag "${tag}"`).reserve(...API_CLASS_MEMBERS);
      this.methodNames.set(tag, registry);
    }
    return registry;
  }

  private extractParameters(path: string, rawParameters: readonly unknown[], baseName: string, location: string): Parameter[] {
    // Operation-level entries override path-level ones with the same name and location
    const merged = new Map<string, JsonObject>();
    for (const [index, raw] of rawParameters.entries()) {
      const parameter = this.dereference(raw, 'parameters', `${location}/parameters/${index}`);
      if (!parameter) continue;
      const name = getString(parameter, 'name');
      const where = getString(parameter, 'in');
      if (name === undefined || where === undefined) {
        throw new InvalidSpecificationError(`Parameter without a name or location at ${location}/parameters/${index}`);
      }
      merged.set(`${where}:${name}`, parameter);
    }

    const placeholders = pathPlaceholders(path);
    const drafts: ParameterDraft[] = [];
    for (const parameter of merged.values()) {
      const wireName = getString(parameter, 'name') ?? '';
      const where = getString(parameter, 'in') ?? '';
      const parameterLocation = `${location}/parameters/${escapePointer(wireName)}`;

      if (!isParameterLocation(where)) {
        this.warnings.unsupported(parameterLocation, `${where} parameters are not supported`);
        continue;
      }
      if (where === 'path' && !placeholders.includes(wireName)) {
        this.warnings.unsupported(parameterLocation, `path parameter "${wireName}" does not appear in "${path}"`);
        continue;
      }

      const content = pickMediaType(getObject(parameter, 'content'));
      const schema = getObject(parameter, 'schema') ?? (content ? getObject(content[1], 'schema') : undefined);
      drafts.push({
        wireName,
        location: where,
        type: this.resolver.resolve(schema, `${baseName} ${wireName}`, parameterLocation),
        // A path template cannot omit a segment
        required: where === 'path' || getBoolean(parameter, 'required') === true,
        description: getString(parameter, 'description'),
      });
    }

    const pathDrafts = placeholders.map(
      placeholder =>
        drafts.find(draft => draft.location === 'path' && draft.wireName === placeholder) ?? {
          wireName: placeholder,
          location: 'path' as const,
          type: { kind: 'primitive' as const, primitive: 'string' as const },
          required: true,
        },
    );
    const ordered = [...pathDrafts, ...drafts.filter(draft => draft.location !== 'path')];

    const variables = new NameRegistry(`${location} variables`).reserve(...METHOD_LOCALS);
    return ordered.map(draft => ({ ...draft, name: variables.claim(draft.wireName, 'variable') }));
  }

  private extractRequestBody(operation: JsonObject, baseName: string, location: string): RequestBody | undefined {
    const body = this.dereference(operation.requestBody, 'requestBodies', `${location}/requestBody`);
    const media = body ? pickMediaType(getObject(body, 'content')) : undefined;
    if (!body || !media) {
      return undefined;
    }
    const [contentType, mediaObject] = media;
    return {
      type: this.resolver.resolve(getObject(mediaObject, 'schema'), `${baseName} Request`, `${location}/requestBody`),
      required: getBoolean(body, 'required') === true,
      contentType,
    };
  }

  private extractResponses(operation: JsonObject, baseName: string, location: string): ResponseDescriptor[] {
    const responses: ResponseDescriptor[] = [];
    for (const [status, raw] of Object.entries(getObject(operation, 'responses') ?? {})) {
      const responseLocation = `${location}/responses/${status}`;
      const response = this.dereference(raw, 'responses', responseLocation);
      if (!response) continue;

      const media = pickMediaType(getObject(response, 'content'));
      const hint = `${baseName} ${isSuccessStatus(status) ? 'Response' : 'Error'}`;
      responses.push({
        status,
        type: media ? this.resolver.resolve(getObject(media[1], 'schema'), hint, responseLocation) : undefined,
        description: getString(response, 'description'),
      });
    }
    return responses;
  }

  /**
   * Follows `#/components/<section>/<name>` references, or any other local pointer, until it
   * reaches an inline object.
   */
  private dereference(raw: unknown, section: ComponentSection, location: string): JsonObject | undefined {
    let current = raw;
    for (let depth = 0; depth < MAX_REF_DEPTH; depth++) {
      if (!isJsonObject(current)) {
        return undefined;
      }
      const ref = getString(current, '$ref');
      if (ref === undefined) {
        return current;
      }
      const name = refTail(ref, [`#/components/${section}/`]);
      const target = (name === undefined ? undefined : lookup(this.spec[section], name)) ?? resolvePointer(this.root, ref);
      if (!isJsonObject(target)) {
        throw new InvalidSpecificationError(`Unresolvable $ref "${ref}" at ${location}`);
      }
      current = target;
    }
    throw new InvalidSpecificationError(`Reference chain too deep at ${location}`);
  }
}
