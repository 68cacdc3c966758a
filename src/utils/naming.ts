import { NameCollisionExhaustedError } from '../errors.js';
import type { NameKind } from '../types.js';

const RESERVED_WORDS = new Set([
  'arguments', 'await', 'break', 'case', 'catch', 'class', 'const', 'constructor', 'continue',
  'debugger', 'default', 'delete', 'do', 'else', 'enum', 'eval', 'export', 'extends', 'false',
  'finally', 'for', 'function', 'if', 'implements', 'import', 'in', 'instanceof', 'interface', 'let',
  'new', 'null', 'package', 'private', 'protected', 'public', 'return', 'static', 'super', 'switch',
  'this', 'throw', 'true', 'try', 'typeof', 'undefined', 'var', 'void', 'while', 'with', 'yield',
]);

// Global types a generated model must not shadow
const RESERVED_TYPE_NAMES = new Set([
  'Array', 'ArrayBuffer', 'BigInt', 'Blob', 'Boolean', 'Date', 'Error', 'Function', 'JSON', 'Map',
  'Math', 'Number', 'Object', 'Omit', 'Partial', 'Pick', 'Promise', 'Readonly', 'Record', 'RegExp',
  'Required', 'Set', 'String', 'Symbol', 'Uint8Array', 'URL',
]);

/**
 * Splits an arbitrary OpenAPI identifier into words: separators and illegal characters
 * break words, and so does a lower-to-upper case boundary.
 */
export function splitWords(raw: string): string[] {
  return raw
    .replace(/[-\s.]+/g, '_')
    .replace(/[^A-Za-z0-9_]/g, '')
    .split('_')
    .flatMap(part => part.split(/(?<=[a-z0-9])(?=[A-Z])/))
    .filter(word => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function applyCasing(words: string[], kind: NameKind): string {
  switch (kind) {
    case 'class':
      return words.map(capitalize).join('');
    case 'module':
      return words.map(word => word.toLowerCase()).join('-');
    case 'method':
    case 'field':
    case 'variable':
      return words.map((word, index) => (index === 0 ? word.toLowerCase() : capitalize(word))).join('');
  }
}

/**
 * Converts an OpenAPI identifier into a TypeScript name of the given kind.
 *
 * Classes are PascalCase, methods, fields and variables camelCase, and modules kebab-case
 * (they become file and package names).
 */
export function sanitize(raw: string, kind: NameKind): string {
  let result = applyCasing(splitWords(raw), kind);

  if (result.length === 0) {
    result = kind === 'class' ? 'Unnamed' : 'unnamed';
  }

  // File and package names are never identifiers; npm rejects a leading underscore
  if (kind === 'module') {
    return result;
  }

  if (/^[0-9]/.test(result)) {
    result = '_' + result;
  }

  if (RESERVED_WORDS.has(result) || (kind === 'class' && RESERVED_TYPE_NAMES.has(result))) {
    result = result + '_';
  }

  return result;
}

/**
 * Quotes a property name unless it is already a valid identifier.
 */
export function toPropertyName(name: string): string {
  if (/^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(name)) {
    return name;
  }
  return JSON.stringify(name);
}

/**
 * One naming scope. Every name handed out is unique within the registry; a collision is
 * resolved by appending `_2`, `_3`, ... (`-2`, `-3`, ... for modules) in first-seen order.
 */
export class NameRegistry {
  private readonly claimed = new Set<string>();

  constructor(readonly scope: string, private readonly maxAttempts: number = 1000) {}

  /**
   * Sanitizes `raw` as `kind` and claims the first free variant of it.
   */
  claim(raw: string, kind: NameKind): string {
    const base = sanitize(raw, kind);
    if (!this.claimed.has(base)) {
      this.claimed.add(base);
      return base;
    }

    const separator = kind === 'module' ? '-' : '_';
    for (let attempt = 2; attempt <= this.maxAttempts + 1; attempt++) {
      const candidate = `${base}${separator}${attempt}`;
      if (!this.claimed.has(candidate)) {
        this.claimed.add(candidate);
        return candidate;
      }
    }
    throw new NameCollisionExhaustedError(this.scope, base, this.maxAttempts);
  }

  /**
   * Takes exact names out of circulation, e.g. identifiers the generated code already uses.
   */
  reserve(...names: string[]): this {
    for (const name of names) {
      this.claimed.add(name);
    }
    return this;
  }

  has(name: string): boolean {
    return this.claimed.has(name);
  }
}
