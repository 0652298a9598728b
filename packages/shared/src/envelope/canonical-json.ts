/**
 * Canonical JSON: object keys sorted, no whitespace.
 */

import type { JsonValue } from '../types';

/** Narrow an unknown value to JSON, rejecting non-finite numbers and non-plain objects */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      if (Object.getPrototypeOf(value) !== Object.prototype) {
        return false;
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
  return `{${entries.join(',')}}`;
}
