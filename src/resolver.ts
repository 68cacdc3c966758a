import { InvalidSpecificationError, type WarningCollector } from './errors.js';
import type {
  EnumType,
  EnumValue,
  ObjectField,
  ObjectType,
  PrimitiveKind,
  ResolvedTypes,
  SpecDocument,
  TypeRef,
} from './types.js';
import { JSDocUtils } from './utils/jsdoc.js';
import {
  documentRoot,
  escapePointer,
  getArray,
  getObject,
  getString,
  getStringArray,
  isJsonObject,
  refTail,
  resolvePointer,
  type JsonObject,
} from './utils/json.js';
import { NameRegistry } from './utils/naming.js';

const SCHEMA_REF_PREFIXES = ['#/components/schemas/', '#/definitions/'];

const PRIMITIVE_KINDS: readonly PrimitiveKind[] = ['string', 'integer', 'number', 'boolean'];

function isPrimitiveKind(value: unknown): value is PrimitiveKind {
  return PRIMITIVE_KINDS.some(kind => kind === value);
}

function primitiveKindOf(value: unknown): PrimitiveKind | undefined {
  return isPrimitiveKind(value) ? value : undefined;
}

function isEnumValue(value: unknown): value is EnumValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

interface FlatObject {
  properties: Record<string, unknown>;
  required: string[];
}

/**
 * Decodes the raw schemas of a specification into the closed `TypeRef` union.
 *
 * Every declared schema name is claimed up front, so a `$ref` to a declared schema always resolves
 * to its name. Any other local pointer (a property of a declared schema, or a location `bundle`
 * moved a shared external schema to) is decoded once and reused. Inline objects and enums are
 * hoisted into named types of their own.
 */
export class SchemaResolver {
  private readonly types = new Map<string, TypeRef>();
  private readonly schemaNames = new Map<string, string>();
  private readonly jsdoc = new JSDocUtils();
  private readonly root: JsonObject;
  private readonly pointerTypes = new Map<string, TypeRef>();
  private readonly pointersInProgress = new Set<string>();

  constructor(
    private readonly spec: SpecDocument,
    private readonly names: NameRegistry,
    private readonly warnings: WarningCollector,
  ) {
    this.root = documentRoot(spec);
    for (const rawName of Object.keys(spec.schemas)) {
      this.schemaNames.set(rawName, names.claim(rawName, 'class'));
    }
  }

  resolveAll(): ResolvedTypes {
    for (const [rawName, schema] of Object.entries(this.spec.schemas)) {
      const name = this.typeNameOf(rawName);
      // Placeholder keeps declared schemas ahead of the types hoisted out of them
      this.types.set(name, { kind: 'unresolved' });
      this.types.set(name, this.decode(schema, name, `#/components/schemas/${escapePointer(rawName)}`, true));
    }
    return this.types;
  }

  /** Every named type resolved so far, hoisted ones included. */
  get resolved(): ResolvedTypes {
    return this.types;
  }

  /**
   * Resolves a schema found outside the declared schemas, e.g. a parameter or body schema.
   * Objects and enums are hoisted under a name derived from `hint`.
   */
  resolve(schema: unknown, hint: string, location: string): TypeRef {
    return this.decode(schema, hint, location, false);
  }

  typeNameOf(rawName: string): string {
    const name = this.schemaNames.get(rawName);
    if (name === undefined) {
      throw new InvalidSpecificationError(`No schema named "${rawName}"`);
    }
    return name;
  }

  private decode(schema: unknown, hint: string, location: string, named: boolean): TypeRef {
    if (!isJsonObject(schema)) {
      return { kind: 'unresolved' };
    }

    const ref = getString(schema, '$ref');
    if (ref !== undefined) {
      return this.decodeRef(ref, hint, location);
    }

    if (schema.discriminator !== undefined) {
      return this.unsupported(location, 'discriminated unions are not supported');
    }

    const enumValues = getArray(schema, 'enum') ?? (isEnumValue(schema.const) ? [schema.const] : undefined);
    if (enumValues) {
      return this.decodeEnum(schema, enumValues, hint, named);
    }

    const allOf = getArray(schema, 'allOf');
    if (allOf) {
      return this.decodeAllOf(schema, allOf, hint, location, named);
    }

    for (const keyword of ['oneOf', 'anyOf']) {
      const branches = getArray(schema, keyword);
      if (branches) {
        return this.decodeUnion(branches, keyword, hint, `${location}/${keyword}`, named);
      }
    }

    let type: unknown = schema.type;
    if (Array.isArray(type)) {
      const concrete = type.filter(item => item !== 'null');
      if (concrete.length > 1) {
        return this.unsupported(location, `multiple types (${concrete.join(', ')}) are not supported`);
      }
      type = concrete[0];
    }

    if (isPrimitiveKind(type)) {
      const format = getString(schema, 'format');
      return format === undefined ? { kind: 'primitive', primitive: type } : { kind: 'primitive', primitive: type, format };
    }

    if (type === 'array') {
      return { kind: 'array', items: this.decode(schema.items, `${hint} Item`, `${location}/items`, false) };
    }

    const properties = getObject(schema, 'properties');
    if (type === 'object' || properties !== undefined || schema.additionalProperties !== undefined) {
      if (properties === undefined || Object.keys(properties).length === 0) {
        const values = isJsonObject(schema.additionalProperties)
          ? this.decode(schema.additionalProperties, `${hint} Value`, `${location}/additionalProperties`, false)
          : { kind: 'unresolved' as const };
        return { kind: 'map', values };
      }
      return this.decodeObject(schema, { properties, required: getStringArray(schema, 'required') }, hint, location, named);
    }

    return { kind: 'unresolved' };
  }

  private decodeObject(schema: JsonObject, flat: FlatObject, hint: string, location: string, named: boolean): TypeRef {
    const name = named ? hint : this.names.claim(hint, 'class');
    if (!named) {
      this.types.set(name, { kind: 'unresolved' });
    }

    const fieldNames = new NameRegistry(`${name} fields`);
    const requiredWireNames = new Set(flat.required);
    const fields = new Map<string, ObjectField>();
    const required = new Set<string>();

    for (const [wireName, fieldSchema] of Object.entries(flat.properties)) {
      const fieldName = fieldNames.claim(wireName, 'field');
      const type = this.decode(fieldSchema, `${name} ${wireName}`, `${location}/properties/${escapePointer(wireName)}`, false);
      const doc = isJsonObject(fieldSchema) ? this.jsdoc.describeSchema(fieldSchema) : undefined;
      fields.set(fieldName, doc === undefined ? { name: fieldName, wireName, type } : { name: fieldName, wireName, type, doc });
      if (requiredWireNames.has(wireName)) {
        required.add(fieldName);
      }
    }

    const objectType: ObjectType = { kind: 'object', name, fields, required, doc: this.jsdoc.describeSchema(schema) };
    if (named) {
      return objectType;
    }
    this.types.set(name, objectType);
    return { kind: 'ref', name };
  }

  private decodeEnum(schema: JsonObject, rawValues: readonly unknown[], hint: string, named: boolean): TypeRef {
    const values = [...new Set(rawValues.filter(isEnumValue))];
    if (values.length === 0) {
      return { kind: 'unresolved' };
    }

    const name = named ? hint : this.names.claim(hint, 'class');
    const enumType: EnumType = { kind: 'enum', name, values, doc: this.jsdoc.describeSchema(schema) };
    if (named) {
      return enumType;
    }
    this.types.set(name, enumType);
    return { kind: 'ref', name };
  }

  private decodeAllOf(schema: JsonObject, branches: readonly unknown[], hint: string, location: string, named: boolean): TypeRef {
    if (branches.length === 1 && getObject(schema, 'properties') === undefined) {
      return this.decode(branches[0], hint, `${location}/allOf/0`, named);
    }

    const flat = this.flatten(schema, location, new Set());
    if (flat === undefined) {
      return this.unsupported(location, 'allOf is only supported when every branch is an object');
    }
    return this.decodeObject(schema, flat, hint, location, named);
  }

  /**
   * Merges an object schema with everything its `allOf` branches contribute, following `$ref`s.
   * Returns undefined when some branch is not object-like.
   */
  private flatten(schema: JsonObject, location: string, seen: ReadonlySet<string>): FlatObject | undefined {
    const ref = getString(schema, '$ref');
    if (ref !== undefined) {
      const rawName = this.declaredSchemaName(ref);
      const pointer = rawName === undefined ? ref : `#/components/schemas/${escapePointer(rawName)}`;
      if (seen.has(pointer)) {
        return undefined;
      }
      const target = rawName === undefined ? this.pointerTarget(ref, location) : this.spec.schemas[rawName];
      return this.flatten(target, pointer, new Set(seen).add(pointer));
    }

    const branches = getArray(schema, 'allOf');
    const ownProperties = getObject(schema, 'properties');
    if (branches === undefined && ownProperties === undefined && schema.type !== 'object') {
      return undefined;
    }

    const flat: FlatObject = { properties: {}, required: [] };
    for (const [index, branch] of (branches ?? []).entries()) {
      const part = isJsonObject(branch) ? this.flatten(branch, `${location}/allOf/${index}`, seen) : undefined;
      if (part === undefined) {
        return undefined;
      }
      Object.assign(flat.properties, part.properties);
      flat.required.push(...part.required);
    }
    Object.assign(flat.properties, ownProperties ?? {});
    flat.required.push(...getStringArray(schema, 'required'));
    return flat;
  }

  private decodeUnion(branches: readonly unknown[], keyword: string, hint: string, location: string, named: boolean): TypeRef {
    const concrete = branches.filter(branch => !(isJsonObject(branch) && branch.type === 'null'));
    if (concrete.length === 1) {
      return this.decode(concrete[0], hint, `${location}/0`, named);
    }

    const kinds = new Set(
      concrete.map(branch =>
        isJsonObject(branch) && branch.$ref === undefined && branch.enum === undefined
          ? primitiveKindOf(branch.type)
          : undefined,
      ),
    );
    if (kinds.size > 0 && !kinds.has(undefined)) {
      if (kinds.size === 1) {
        const [primitive] = [...kinds];
        if (primitive !== undefined) {
          return { kind: 'primitive', primitive };
        }
      }
      if (kinds.size === 2 && kinds.has('integer') && kinds.has('number')) {
        return { kind: 'primitive', primitive: 'number' };
      }
    }

    return this.unsupported(location, `${keyword} with incompatible branches is not supported`);
  }

  private decodeRef(ref: string, hint: string, location: string): TypeRef {
    const rawName = this.declaredSchemaName(ref);
    if (rawName !== undefined) {
      return { kind: 'ref', name: this.typeNameOf(rawName) };
    }

    const known = this.pointerTypes.get(ref);
    if (known !== undefined) {
      return known;
    }
    if (this.pointersInProgress.has(ref)) {
      return this.unsupported(location, `circular $ref "${ref}" outside the declared schemas is not supported`);
    }

    const target = this.pointerTarget(ref, location);
    this.pointersInProgress.add(ref);
    const type = this.decode(target, hint, ref, false);
    this.pointersInProgress.delete(ref);
    this.pointerTypes.set(ref, type);
    return type;
  }

  private declaredSchemaName(ref: string): string | undefined {
    const rawName = refTail(ref, SCHEMA_REF_PREFIXES);
    return rawName !== undefined && this.schemaNames.has(rawName) ? rawName : undefined;
  }

  private pointerTarget(ref: string, location: string): JsonObject {
    const target = resolvePointer(this.root, ref);
    if (!isJsonObject(target)) {
      throw new InvalidSpecificationError(`Unresolvable $ref "${ref}" at ${location}`);
    }
    return target;
  }

  private unsupported(location: string, detail: string): TypeRef {
    this.warnings.unsupported(location, detail);
    return { kind: 'unresolved', reason: detail };
  }
}
