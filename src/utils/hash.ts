/**
 * Hashing utilities for cache keys and content verification
 */

import { createHash } from 'crypto';

const CACHE_KEY_VERSION = 'engine_result.v1';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * JSON with object keys sorted at every depth. Dates serialize as ISO strings
 * and non-finite numbers keep their name, so `Infinity` and `null` differ.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return 'null';
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (typeof value === 'number' && !Number.isFinite(value)) return JSON.stringify(String(value));
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const pairs = Object.entries(value)
    .filter(([, entry]) => entry !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, entry]) => JSON.stringify(key) + ':' + stableStringify(entry));
  return '{' + pairs.join(',') + '}';
}

export function contentHash(content: unknown): string {
  return sha256(stableStringify(content));
}

/** Fingerprint of an engine input, independent of object key order. */
export function scoreCacheKey(series: unknown, auxiliary?: unknown): string {
  return contentHash({
    version: CACHE_KEY_VERSION,
    series,
    auxiliary: auxiliary ?? null,
  });
}
