/**
 * @fileoverview Canonical JSON and deep freezing
 *
 * Findings are compared by value, not by reference or key order, and every
 * object that leaves a synthesis step is frozen.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * Serialize a JSON value with object keys sorted at every depth.
 * `{ b: 1, a: [2, { d: 3, c: 4 }] }` and `{ a: [2, { c: 4, d: 3 }], b: 1 }`
 * produce the same string.
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (isJsonArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  const parts: string[] = [];
  for (const key of keys) {
    const item = value[key];
    if (item === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${canonicalJson(item)}`);
  }
  return `{${parts.join(',')}}`;
}

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}

/**
 * Recursively freeze plain objects and arrays in place and return the same
 * reference. Frozen containers are still walked: a frozen Finding may hold an
 * unfrozen value.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (!Object.isFrozen(value)) Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}

/**
 * True for values `canonicalJson` serializes faithfully: finite numbers,
 * strings, booleans, null, arrays and plain objects of those. Cycles fail.
 */
export function isJsonValue(value: unknown, ancestors: Set<object> = new Set()): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value !== 'object' || ancestors.has(value)) return false;

  const proto: unknown = Object.getPrototypeOf(value);
  if (!Array.isArray(value) && proto !== Object.prototype && proto !== null) return false;

  ancestors.add(value);
  const ok = Object.values(value).every((item) => isJsonValue(item, ancestors));
  ancestors.delete(value);
  return ok;
}
