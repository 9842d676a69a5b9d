// Shape checks for raw input

import { isUnspecified } from '../core/sentinels.js';

/**
 * Objects created by literals, `Object.create(null)` or JSON parsing.
 * Class instances, arrays and maps are not plain.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Renders a map as a plain object with stringified keys. Entries under an
 * `Unspecified` key have no name and are dropped.
 */
export function plainObjectOf(map: ReadonlyMap<unknown, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, item] of map) {
    if (!isUnspecified(key)) {
      result[String(key)] = toPlain(item);
    }
  }
  return result;
}

/**
 * Converts coerced values into JSON-friendly data: maps become objects
 * (keys stringified), bytes become arrays of numbers and `Unspecified`
 * becomes `undefined`.
 */
export function toPlain(value: unknown): unknown {
  if (isUnspecified(value)) {
    return undefined;
  }
  if (value instanceof Map) {
    return plainObjectOf(value);
  }
  if (value instanceof Uint8Array) {
    return Array.from(value);
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toPlain(item)]));
  }
  return value;
}
