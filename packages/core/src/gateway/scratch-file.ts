/**
 * Per-request scratch files for handing audio to the classifier.
 */
import { randomUUID } from 'crypto';
import { rm, writeFile } from 'fs/promises';
import { join } from 'path';

const DEFAULT_EXTENSION = 'wav';
const MAX_EXTENSION_LENGTH = 10;

/**
 * Reduce a caller-supplied format ("WAV", ".mp3", "../x") to a safe file
 * extension.
 */
export function sanitizeExtension(format: string): string {
  const cleaned = format.toLowerCase().replace(/[^a-z0-9]/g, '').slice(0, MAX_EXTENSION_LENGTH);
  return cleaned || DEFAULT_EXTENSION;
}

/**
 * Write `bytes` to `<dir>/<uuid>.<ext>`, run `use` with the path, and remove
 * the file when `use` settles, whether it resolved or rejected.
 */
export async function withScratchFile<T>(
  dir: string,
  bytes: Uint8Array,
  format: string,
  use: (path: string) => Promise<T>
): Promise<T> {
  const path = join(dir, `${randomUUID()}.${sanitizeExtension(format)}`);
  try {
    await writeFile(path, bytes);
    return await use(path);
  } finally {
    await rm(path, { force: true });
  }
}
