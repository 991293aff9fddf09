/**
 * Decodes audio payloads into bytes.
 *
 * Rejections are returned as `DecodeOutcome` values; nothing here throws.
 * Size is enforced before any decoding work so oversized payloads never
 * reach the model.
 */
import type { DecodeOutcome } from '../types';

/** Largest decoded payload accepted for inference. */
export const MAX_DECODED_BYTES = 3_000_000;

/** Anything shorter than this (encoded characters, or upload bytes) is not audio. */
export const MIN_PAYLOAD_LENGTH = 10;

const DATA_URL_PREFIX = /^data:[^,]*;base64,/i;
const WHITESPACE = /[\n\r \t]/g;
const NON_BASE64_CHAR = /[^A-Za-z0-9+/=]/;

/**
 * Remove copy-paste damage (line breaks, spaces, tabs) and any
 * `data:<mime>;base64,` prefix.
 */
export function cleanBase64(text: string): string {
  return text.replace(WHITESPACE, '').replace(DATA_URL_PREFIX, '');
}

/** Standard alphabet, length a multiple of 4, at most two trailing `=`. */
export function isStrictBase64(base64: string): boolean {
  if (base64.length % 4 !== 0 || NON_BASE64_CHAR.test(base64)) {
    return false;
  }
  const firstPad = base64.indexOf('=');
  return firstPad === -1 || (firstPad >= base64.length - 2 && /^=+$/.test(base64.slice(firstPad)));
}

/** Decoded size of a well-formed base64 string, without decoding it. */
export function decodedLength(base64: string): number {
  const padding = base64.endsWith('==') ? 2 : base64.endsWith('=') ? 1 : 0;
  return (base64.length / 4) * 3 - padding;
}

function tooLarge(size: number): DecodeOutcome {
  return {
    kind: 'rejected',
    reason: 'too_large',
    message: `Decoded audio is ${size} bytes; the limit is ${MAX_DECODED_BYTES}`,
  };
}

export function decodeBase64Payload(text: string): DecodeOutcome {
  const cleaned = cleanBase64(text);

  if (cleaned.length === 0) {
    return { kind: 'rejected', reason: 'empty', message: 'Audio payload is empty' };
  }
  if (cleaned.length < MIN_PAYLOAD_LENGTH) {
    return {
      kind: 'rejected',
      reason: 'too_short',
      message: `Audio payload is ${cleaned.length} characters; at least ${MIN_PAYLOAD_LENGTH} are required`,
    };
  }
  if (!isStrictBase64(cleaned)) {
    return { kind: 'rejected', reason: 'invalid_encoding', message: 'Audio payload is not valid base64' };
  }

  const size = decodedLength(cleaned);
  if (size > MAX_DECODED_BYTES) {
    return tooLarge(size);
  }

  return { kind: 'decoded', bytes: Buffer.from(cleaned, 'base64') };
}

export function decodeUpload(bytes: Uint8Array): DecodeOutcome {
  if (bytes.length === 0) {
    return { kind: 'rejected', reason: 'empty', message: 'Uploaded file is empty' };
  }
  if (bytes.length < MIN_PAYLOAD_LENGTH) {
    return {
      kind: 'rejected',
      reason: 'too_short',
      message: `Uploaded file is ${bytes.length} bytes; at least ${MIN_PAYLOAD_LENGTH} are required`,
    };
  }
  if (bytes.length > MAX_DECODED_BYTES) {
    return tooLarge(bytes.length);
  }
  return { kind: 'decoded', bytes: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength) };
}
