/**
 * Deterministic JSON serialization of domain values
 *
 * The same value always produces the same string, so slot payloads and indexed values
 * are stable across writes.
 */

import type { ValueSerializer } from "./types.js";

export interface StringifyOptions {
  /** Spaces of indentation (default: 0, compact) */
  indent?: number;
  /** Key ordering: "alpha" or explicit leading keys (default: "alpha") */
  order?: "alpha" | string[];
}

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

/**
 * Stable JSON stringification with guaranteed key ordering
 * @throws {TypeError} On circular references
 */
export function stableStringify(value: unknown, options: StringifyOptions = {}): string {
  const order = options.order ?? "alpha";
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order !== "alpha") {
      const aIndex = order.indexOf(a);
      const bIndex = order.indexOf(b);
      if (aIndex !== -1 && bIndex !== -1) return aIndex - bIndex;
      if (aIndex !== -1) return -1;
      if (bIndex !== -1) return 1;
    }
    // Code-unit order, independent of locale
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const normalize = (input: unknown): unknown => {
    if (input === null || typeof input !== "object") {
      return input;
    }
    if (hasToJSON(input)) {
      return normalize(input.toJSON());
    }
    if (seen.has(input)) {
      throw new TypeError("Circular reference detected in object");
    }
    seen.add(input);

    try {
      if (Array.isArray(input)) {
        return input.map(normalize);
      }

      const out: Record<string, unknown> = {};
      for (const key of Object.keys(input).sort(sorter)) {
        out[key] = normalize(Reflect.get(input, key));
      }
      return out;
    } finally {
      seen.delete(input);
    }
  };

  return JSON.stringify(normalize(value), null, options.indent ?? 0);
}

/**
 * Check if two JSON strings are semantically equivalent (ignoring formatting and key order)
 */
export function jsonEqual(a: string, b: string): boolean {
  try {
    return stableStringify(JSON.parse(a)) === stableStringify(JSON.parse(b));
  } catch {
    return false;
  }
}

/**
 * Default serializer for domain values: compact canonical JSON
 */
export const canonicalSerializer: ValueSerializer = {
  stringify(value: unknown): string {
    const text = stableStringify(value);
    if (text === undefined) {
      throw new TypeError("Value is not JSON-serializable");
    }
    return text;
  },
  parse(text: string): unknown {
    return JSON.parse(text);
  },
};
