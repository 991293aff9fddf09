/**
 * Service configuration read from the environment.
 *
 * Environment variables:
 *   PORT                     — TCP port to listen on (default: 8000)
 *   UPLOAD_MODEL_TIMEOUT_MS  — Model budget for POST /deepfake (default: 10000)
 *   DETECT_MODEL_TIMEOUT_MS  — Model budget for POST /detect-with-model (default: 8000)
 *   PARSE_TIMEOUT_MS         — Budget for reading a detect request body (default: 2000)
 *   MAX_BODY_BYTES           — Body / upload size limit in bytes (default: 8388608)
 *   SCRATCH_DIR              — Directory for per-request audio files (default: OS temp dir)
 *   RATE_LIMIT_PER_MINUTE    — Requests per minute per IP; 0 disables (default: 0)
 *   ALLOWED_ORIGINS          — Comma-separated CORS allow-list; unset allows any origin
 */
import { tmpdir } from 'os';

export interface ServiceConfig {
  port: number;
  uploadModelTimeoutMs: number;
  detectModelTimeoutMs: number;
  parseTimeoutMs: number;
  maxBodyBytes: number;
  scratchDir: string;
  rateLimitPerMinute: number;
  allowedOrigins: Set<string>;
}

function readInt(name: string, fallback: number, min = 1): number {
  const value = Number.parseInt(process.env[name]?.trim() ?? '', 10);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

/**
 * Parse `ALLOWED_ORIGINS` into a Set. An empty set means any origin.
 */
export function getAllowedOrigins(): Set<string> {
  const raw = process.env.ALLOWED_ORIGINS ?? '';
  return new Set(
    raw
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean)
  );
}

export function getServiceConfig(): ServiceConfig {
  return {
    port: readInt('PORT', 8000),
    uploadModelTimeoutMs: readInt('UPLOAD_MODEL_TIMEOUT_MS', 10_000),
    detectModelTimeoutMs: readInt('DETECT_MODEL_TIMEOUT_MS', 8_000),
    parseTimeoutMs: readInt('PARSE_TIMEOUT_MS', 2_000),
    maxBodyBytes: readInt('MAX_BODY_BYTES', 8 * 1024 * 1024),
    scratchDir: process.env.SCRATCH_DIR?.trim() || tmpdir(),
    rateLimitPerMinute: readInt('RATE_LIMIT_PER_MINUTE', 0, 0),
    allowedOrigins: getAllowedOrigins(),
  };
}
