import type { TypeRef } from './types.js';

export function decoderName(typeName: string): string {
  return `decode${typeName}`;
}

export function encoderName(typeName: string): string {
  return `encode${typeName}`;
}

/**
 * True when a value of this type must pass through a generated converter, i.e. it contains a
 * named type somewhere.
 */
export function needsConversion(type: TypeRef): boolean {
  switch (type.kind) {
    case 'primitive':
    case 'unresolved':
      return false;
    case 'array':
      return needsConversion(type.items);
    case 'map':
      return needsConversion(type.values);
    case 'object':
    case 'enum':
    case 'ref':
      return true;
  }
}

/**
 * Prints TypeRefs as TypeScript type and converter expressions, remembering which named types
 * and converter functions the printed code refers to so the caller can import them.
 */
export class TypePrinter {
  readonly usedTypes = new Set<string>();
  readonly usedFunctions = new Set<string>();

  typeString(type: TypeRef): string {
    switch (type.kind) {
      case 'primitive':
        return type.primitive === 'integer' ? 'number' : type.primitive;
      case 'array':
        return `Array<${this.typeString(type.items)}>`;
      case 'map':
        return `Record<string, ${this.typeString(type.values)}>`;
      case 'object':
      case 'enum':
      case 'ref':
        this.usedTypes.add(type.name);
        return type.name;
      case 'unresolved':
        return 'unknown';
    }
  }

  /**
   * Expression turning the wire value `expr` (typed `unknown`) into `type`.
   */
  decode(type: TypeRef, expr: string): string {
    switch (type.kind) {
      case 'primitive':
        return `${expr} as ${this.typeString(type)}`;
      case 'unresolved':
        return expr;
      case 'array':
        if (!needsConversion(type.items)) {
          return `${expr} as ${this.typeString(type)}`;
        }
        return `(${expr} as unknown[]).map((item) => ${this.decode(type.items, 'item')})`;
      case 'map':
        if (!needsConversion(type.values)) {
          return `${expr} as ${this.typeString(type)}`;
        }
        return `Object.fromEntries(Object.entries(${expr} as Record<string, unknown>).map(([key, value]) => [key, ${this.decode(type.values, 'value')}]))`;
      case 'object':
      case 'enum':
      case 'ref':
        this.usedFunctions.add(decoderName(type.name));
        return `${decoderName(type.name)}(${expr})`;
    }
  }

  /**
   * Expression turning `expr` (typed as `type`) back into its wire form.
   */
  encode(type: TypeRef, expr: string): string {
    switch (type.kind) {
      case 'primitive':
      case 'unresolved':
        return expr;
      case 'array':
        return needsConversion(type.items) ? `${expr}.map((item) => ${this.encode(type.items, 'item')})` : expr;
      case 'map':
        return needsConversion(type.values)
          ? `Object.fromEntries(Object.entries(${expr}).map(([key, value]) => [key, ${this.encode(type.values, 'value')}]))`
          : expr;
      case 'object':
      case 'enum':
      case 'ref':
        this.usedFunctions.add(encoderName(type.name));
        return `${encoderName(type.name)}(${expr})`;
    }
  }

  /** Same as `decode`, but passes a missing (or null) value through as undefined. */
  decodeOptional(type: TypeRef, expr: string): string {
    if (!needsConversion(type)) {
      return type.kind === 'unresolved' ? expr : `${expr} as ${this.typeString(type)} | undefined`;
    }
    return `${expr} == null ? undefined : ${this.decode(type, expr)}`;
  }

  encodeOptional(type: TypeRef, expr: string): string {
    if (!needsConversion(type)) {
      return expr;
    }
    return `${expr} === undefined ? undefined : ${this.encode(type, expr)}`;
  }
}
