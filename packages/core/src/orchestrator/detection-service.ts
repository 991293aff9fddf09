/**
 * Per-request orchestration: normalize → decode → (model | skip) → respond.
 *
 * Every public method resolves to a structurally valid
 * `ClassificationResult`. Only input-validation failures produce the
 * `'error'` classification; decode rejections, timeouts, an unavailable
 * model and classifier failures all route to the deterministic fallback so a
 * re-submitted payload gets the same answer. A body that cannot be parsed at
 * all gets the quick fallback.
 */
import { extname } from 'path';
import { cleanBase64, decodeBase64Payload, decodeUpload } from '../decoder/payload-decoder';
import { deterministicFallback, quickFallback } from '../fallback/fallback-classifier';
import type { ModelGateway } from '../gateway/model-gateway';
import { parseBody, resolveDetectionRequest } from '../request/request-normalizer';
import type {
  BodySources,
  ClassificationResult,
  DecodeOutcome,
  DetectionRequest,
  ModelOutcome,
  UploadedAudio,
} from '../types';

export const MODEL_EXPLANATION = 'Language-agnostic detection using acoustic embeddings';

export const UPLOAD_FIELD = 'audio_file';

const DEFAULT_UPLOAD_FORMAT = 'wav';

export interface DetectionServiceOptions {
  /** Source of randomness for the quick fallback. */
  random?: () => number;
}

export function validationError(explanation: string): ClassificationResult {
  return { classification: 'error', confidence: 0, explanation };
}

function describeKeys(keys: string[]): string {
  return keys.length > 0 ? keys.join(', ') : '(none)';
}

function describeOutcome(outcome: Exclude<ModelOutcome, { kind: 'success' }>): string {
  switch (outcome.kind) {
    case 'timeout':
      return 'model timed out';
    case 'unavailable':
      return 'model not loaded';
    case 'failure':
      return `model failed: ${outcome.cause.message}`;
  }
}

function uploadFormat(fileName: string | undefined): string {
  const ext = fileName ? extname(fileName).slice(1) : '';
  return ext || DEFAULT_UPLOAD_FORMAT;
}

type ResolvedBody = { kind: 'request'; request: DetectionRequest } | { kind: 'result'; result: ClassificationResult };

export class DetectionService {
  private readonly random: () => number;

  constructor(private readonly gateway: ModelGateway, options: DetectionServiceOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  get modelLoaded(): boolean {
    return this.gateway.modelLoaded;
  }

  /** Response for requests whose body could not be read or parsed. */
  quickResult(): ClassificationResult {
    return quickFallback(this.random);
  }

  /**
   * Hash-keyed classification; the model is never consulted.
   */
  detect(sources: BodySources): ClassificationResult {
    const resolved = this.resolve(sources);
    if (resolved.kind === 'result') {
      return resolved.result;
    }
    return deterministicFallback(cleanBase64(resolved.request.audioPayload));
  }

  /**
   * Like `detect`, but a decodable payload is first offered to the model
   * within `timeoutMs`.
   */
  async detectWithModel(sources: BodySources, timeoutMs: number): Promise<ClassificationResult> {
    const resolved = this.resolve(sources);
    if (resolved.kind === 'result') {
      return resolved.result;
    }
    const { request } = resolved;
    return this.classifyDecoded(
      decodeBase64Payload(request.audioPayload),
      request.audioFormat,
      timeoutMs,
      cleanBase64(request.audioPayload)
    );
  }

  /**
   * Classify a multipart upload. A missing upload is the one validation
   * failure this path reports.
   */
  async classifyUpload(upload: UploadedAudio | undefined, timeoutMs: number): Promise<ClassificationResult> {
    if (!upload) {
      return validationError(`Missing required file field "${UPLOAD_FIELD}"`);
    }
    return this.classifyDecoded(decodeUpload(upload.bytes), uploadFormat(upload.fileName), timeoutMs, upload.bytes);
  }

  private resolve(sources: BodySources): ResolvedBody {
    const parsed = parseBody(sources);
    if (parsed.kind === 'parse_failed') {
      console.warn('[VoiceVerdict] Request body could not be parsed; using quick fallback');
      return { kind: 'result', result: this.quickResult() };
    }

    const resolved = resolveDetectionRequest(parsed.fields);
    if (!resolved.ok) {
      return {
        kind: 'result',
        result: validationError(
          `Missing required fields: ${resolved.missing.join(', ')}. ` +
            `Received keys: ${describeKeys(resolved.receivedKeys)}`
        ),
      };
    }
    return { kind: 'request', request: resolved.request };
  }

  private async classifyDecoded(
    decoded: DecodeOutcome,
    audioFormat: string,
    timeoutMs: number,
    fallbackKey: string | Uint8Array
  ): Promise<ClassificationResult> {
    if (decoded.kind === 'rejected') {
      console.warn(`[VoiceVerdict] Audio rejected (${decoded.reason}): ${decoded.message}; using fallback`);
      return deterministicFallback(fallbackKey);
    }

    const outcome = await this.gateway.invoke(decoded.bytes, audioFormat, timeoutMs);
    if (outcome.kind === 'success') {
      return {
        classification: outcome.classification,
        confidence: outcome.confidence,
        explanation: MODEL_EXPLANATION,
      };
    }

    console.warn(`[VoiceVerdict] ${describeOutcome(outcome)}; using fallback`);
    return deterministicFallback(fallbackKey);
  }
}
