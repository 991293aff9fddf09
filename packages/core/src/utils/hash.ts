/**
 * Content hashing for the fallback classifier.
 * A djb2-style 32-bit hash; fast and stable, not cryptographically strong.
 */

/** Number of leading characters / bytes that contribute to a content hash. */
export const HASH_PREFIX_LENGTH = 100;

function step(hash: number, code: number): number {
  return (((hash << 5) + hash) ^ code) >>> 0; // keep unsigned 32-bit
}

export function hashString(str: string): number {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = step(hash, str.charCodeAt(i));
  }
  return hash;
}

export function hashBytes(bytes: Uint8Array): number {
  let hash = 5381;
  for (let i = 0; i < bytes.length; i++) {
    hash = step(hash, bytes[i]);
  }
  return hash;
}

/**
 * Hash of the first `HASH_PREFIX_LENGTH` characters (text) or bytes (binary).
 * An ASCII string and its byte encoding hash to the same value.
 */
export function hashContent(input: string | Uint8Array): number {
  return typeof input === 'string'
    ? hashString(input.slice(0, HASH_PREFIX_LENGTH))
    : hashBytes(input.subarray(0, HASH_PREFIX_LENGTH));
}
