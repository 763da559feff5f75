export const CIRCULAR = '[Circular]';
export const FUNCTION = '[Function]';

/**
 * Truncator
 *
 * Produces a JSON-safe copy of an arbitrary value:
 * - strings longer than `maxStringLength` are cut to that length
 * - circular references become "[Circular]"
 * - bigints become decimal strings, functions "[Function]", symbols their description
 * - dates become ISO strings, errors "Name: message"
 *
 * The input is never modified.
 */
export class Truncator {
  public constructor(private readonly maxStringLength: number = Number.POSITIVE_INFINITY) {}

  public truncate(value: unknown): unknown {
    return this.copy(value, new WeakSet<object>());
  }

  private copy(value: unknown, ancestors: WeakSet<object>): unknown {
    switch (typeof value) {
      case 'string':
        return value.length > this.maxStringLength ? value.slice(0, this.maxStringLength) : value;
      case 'bigint':
        return value.toString();
      case 'function':
        return FUNCTION;
      case 'symbol':
        return value.toString();
      case 'object':
        return value === null ? null : this.copyObject(value, ancestors);
      default:
        return value;
    }
  }

  private copyObject(value: object, ancestors: WeakSet<object>): unknown {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }
    if (value instanceof Error) {
      return this.copy(`${value.name}: ${value.message}`, ancestors);
    }
    if (ancestors.has(value)) {
      return CIRCULAR;
    }

    ancestors.add(value);
    try {
      if (Array.isArray(value)) {
        return value.map((item: unknown) => this.copy(item, ancestors));
      }
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        if (item === undefined) continue;
        result[key] = this.copy(item, ancestors);
      }
      return result;
    } finally {
      ancestors.delete(value);
    }
  }
}
