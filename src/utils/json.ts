import { InvalidSpecificationError } from '../errors.js';
import type { SpecDocument } from '../types.js';

/**
 * Narrowing helpers for the untyped JSON that comes out of a parsed specification.
 */
export type JsonObject = { readonly [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getObject(source: JsonObject, key: string): JsonObject | undefined {
  const value = source[key];
  return isJsonObject(value) ? value : undefined;
}

export function getString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

export function getBoolean(source: JsonObject, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function getArray(source: JsonObject, key: string): readonly unknown[] | undefined {
  const value = source[key];
  return Array.isArray(value) ? value : undefined;
}

export function getStringArray(source: JsonObject, key: string): string[] {
  return (getArray(source, key) ?? []).filter((item): item is string => typeof item === 'string');
}

/**
 * Returns the entries of a nested object whose values are themselves objects, in declaration order.
 */
export function objectEntries(source: JsonObject | undefined): Array<[string, JsonObject]> {
  if (!source) return [];
  const entries: Array<[string, JsonObject]> = [];
  for (const [key, value] of Object.entries(source)) {
    if (isJsonObject(value)) {
      entries.push([key, value]);
    }
  }
  return entries;
}

/**
 * Returns the unescaped name a local `$ref` points at when it starts with one of `prefixes`.
 */
export function refTail(ref: string, prefixes: readonly string[]): string | undefined {
  const prefix = prefixes.find(candidate => ref.startsWith(candidate));
  if (prefix === undefined) {
    return undefined;
  }
  return unescapePointer(ref.slice(prefix.length), ref);
}

function unescapePointer(segment: string, ref: string): string {
  try {
    return decodeURIComponent(segment).replace(/~1/g, '/').replace(/~0/g, '~');
  } catch (error) {
    throw new InvalidSpecificationError(`Malformed $ref "${ref}"`, { cause: error });
  }
}

/**
 * Follows a local JSON pointer such as `#/paths/~1pets/get/responses/200` from `root`.
 * Returns undefined when the pointer is not local or leads nowhere.
 */
export function resolvePointer(root: JsonObject, ref: string): unknown {
  if (ref === '#') {
    return root;
  }
  if (!ref.startsWith('#/')) {
    return undefined;
  }

  let current: unknown = root;
  for (const raw of ref.slice(2).split('/')) {
    const segment = unescapePointer(raw, ref);
    if (Array.isArray(current)) {
      if (!/^(0|[1-9][0-9]*)$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (isJsonObject(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * The object local `$ref`s of a document resolve against. Documents built in memory without a
 * `root` get one assembled from their sections.
 */
export function documentRoot(spec: SpecDocument): JsonObject {
  return (
    spec.root ?? {
      paths: spec.paths,
      definitions: spec.schemas,
      components: {
        schemas: spec.schemas,
        parameters: spec.parameters,
        requestBodies: spec.requestBodies,
        responses: spec.responses,
        securitySchemes: spec.securitySchemes,
      },
    }
  );
}

export function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function lookup<T>(map: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}
