import { getBoolean, getString, type JsonObject } from './json.js';

const NUMERIC_CONSTRAINTS: ReadonlyArray<[string, string]> = [
  ['minimum', 'Minimum'],
  ['maximum', 'Maximum'],
  ['minLength', 'Min length'],
  ['maxLength', 'Max length'],
  ['minItems', 'Min items'],
  ['maxItems', 'Max items'],
];

/**
 * Utility class for JSDoc generation
 */
export class JSDocUtils {
  /**
   * Escapes backticks and comment delimiters in text to avoid JSDoc syntax errors
   */
  escapeBackticks(text: string): string {
    let sanitized = text;
    // Remove backticks entirely to avoid template literal syntax errors in JSDoc
    sanitized = sanitized.replace(/`([^`]+)`/g, '$1');
    sanitized = sanitized.replace(/\*\//g, '* /');
    sanitized = sanitized.replace(/\/\*/g, '/ *');
    return sanitized;
  }

  /**
   * Builds the doc text for a schema: its description followed by a compact line of
   * constraints and metadata. Returns undefined when the schema has nothing to say.
   */
  describeSchema(schema: JsonObject): string | undefined {
    const parts: string[] = [];

    const description = getString(schema, 'description') ?? getString(schema, 'title');
    if (description) {
      parts.push(this.escapeBackticks(description.trim()));
    }

    const constraints: string[] = [];

    if (schema.default !== undefined) {
      constraints.push(`Default: ${JSON.stringify(schema.default)}`);
    }
    if (schema.example !== undefined) {
      constraints.push(`Example: ${this.escapeBackticks(JSON.stringify(schema.example))}`);
    }

    const format = getString(schema, 'format');
    if (format) {
      constraints.push(`Format: ${format}`);
    }

    for (const [key, label] of NUMERIC_CONSTRAINTS) {
      const value = schema[key];
      if (typeof value === 'number') {
        constraints.push(`${label}: ${value}`);
      }
    }

    const pattern = getString(schema, 'pattern');
    if (pattern) {
      constraints.push(`Pattern: ${this.escapeBackticks(pattern)}`);
    }

    if (getBoolean(schema, 'nullable') === true) {
      constraints.push('Nullable: true');
    }
    if (getBoolean(schema, 'readOnly') === true) {
      constraints.push('Read-only: true');
    }
    if (getBoolean(schema, 'writeOnly') === true) {
      constraints.push('Write-only: true');
    }
    if (getBoolean(schema, 'deprecated') === true) {
      constraints.push('Deprecated');
    }

    if (constraints.length > 0) {
      parts.push(constraints.join(', '));
    }

    return parts.length > 0 ? parts.join('\n') : undefined;
  }

  /**
   * Doc text for a generated operation method.
   */
  describeOperation(summary: string | undefined, description: string | undefined): string | undefined {
    const parts = [summary, description]
      .filter((part): part is string => part !== undefined && part.trim().length > 0)
      .map(part => this.escapeBackticks(part.trim()));
    return parts.length > 0 ? parts.join('\n\n') : undefined;
  }
}
