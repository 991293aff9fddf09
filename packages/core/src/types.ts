/**
 * Core types for the VoiceVerdict speech classification service.
 */

/** Wire labels returned to callers. `'error'` is reserved for input-validation failures. */
export type Classification = 'Human' | 'AI-generated' | 'error';

/** Labels a classifier can assign to usable audio. */
export type SpeechLabel = Exclude<Classification, 'error'>;

export interface ClassificationResult {
  classification: Classification;
  /** 0–1 */
  confidence: number;
  explanation: string;
}

/**
 * Canonical request extracted from a loosely-shaped JSON / form body.
 */
export interface DetectionRequest {
  /** Base64 text as received (not yet cleaned). */
  audioPayload: string;
  /** Free-form container hint, e.g. "wav" or "mp3". */
  audioFormat: string;
  /** Informational only; never used for classification. */
  language: string;
}

/** Raw multipart upload. */
export interface UploadedAudio {
  bytes: Uint8Array;
  fileName?: string;
}

/**
 * Everything the HTTP layer managed to read from a request body.
 * Each source is parsed independently by `parseBody`.
 */
export interface BodySources {
  /** Body read as text (any non-multipart content type). */
  text?: string;
  /** Value of the Content-Type header. */
  contentType?: string;
  /** Fields produced by the multipart parser. */
  fields?: Record<string, unknown>;
}

export type ParseOutcome =
  | { kind: 'parsed'; fields: Record<string, unknown> }
  | { kind: 'parse_failed' };

export type DecodeRejection = 'empty' | 'too_short' | 'too_large' | 'invalid_encoding';

export type DecodeOutcome =
  | { kind: 'decoded'; bytes: Buffer }
  | { kind: 'rejected'; reason: DecodeRejection; message: string };

export type ModelOutcome =
  | { kind: 'success'; classification: SpeechLabel; confidence: number }
  | { kind: 'timeout' }
  | { kind: 'unavailable' }
  | { kind: 'failure'; cause: Error };

/** Label space of the acoustic model. */
export type ModelLabel = 'FAKE' | 'REAL';

/**
 * The external inference capability. Implementations must honour `signal`
 * where they can; the gateway stops waiting either way once it fires.
 */
export interface Classifier {
  classify(audioPath: string, signal: AbortSignal): Promise<ModelLabel>;
}

/** Process-wide model state, fixed once at startup. */
export type ModelState =
  | { readonly modelLoaded: false }
  | { readonly modelLoaded: true; readonly classifier: Classifier };

export const MODEL_NOT_LOADED: ModelState = { modelLoaded: false };
