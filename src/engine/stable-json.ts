/**
 * Canonical JSON: object keys sorted by code unit, no whitespace.
 * Cache keys and manifest comparisons hash this form so that key order in
 * the input never changes a digest.
 */

import { createHash } from 'crypto';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue | undefined };

export function stableStringify(value: JsonValue | undefined): string {
  if (value === undefined) {
    throw new TypeError('stableStringify: undefined has no JSON form');
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map((item) => stableStringify(item)).join(',') + ']';
  }
  const keys = Object.keys(value)
    .filter((k) => value[k] !== undefined)
    .sort();
  return '{' + keys.map((k) => JSON.stringify(k) + ':' + stableStringify(value[k])).join(',') + '}';
}

/** SHA-256 hex digest of the canonical JSON form. */
export function stableDigest(value: JsonValue): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex');
}
