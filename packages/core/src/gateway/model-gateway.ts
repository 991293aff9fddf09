/**
 * Bounded-time access to the external classifier.
 *
 * `invoke` never rejects. Whatever happens to the classifier (not loaded,
 * slow, throwing) is reported as a `ModelOutcome` for the orchestrator to
 * route. On timeout the classifier's signal is aborted and the call is
 * abandoned; the scratch file is removed before `invoke` returns.
 */
import { tmpdir } from 'os';
import type { Classifier, ModelLabel, ModelOutcome, ModelState, SpeechLabel } from '../types';
import { withScratchFile } from './scratch-file';

/**
 * The model reports a label only, so successful inferences carry this fixed
 * confidence rather than a calibrated probability.
 */
export const MODEL_CONFIDENCE = 0.85;

const LABELS: Record<ModelLabel, SpeechLabel> = {
  FAKE: 'AI-generated',
  REAL: 'Human',
};

function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}

export interface ModelGatewayOptions {
  /** Directory for scratch files. Defaults to the OS temp directory. */
  scratchDir?: string;
}

export class ModelGateway {
  private readonly scratchDir: string;

  constructor(private readonly state: ModelState, options: ModelGatewayOptions = {}) {
    this.scratchDir = options.scratchDir ?? tmpdir();
  }

  get modelLoaded(): boolean {
    return this.state.modelLoaded;
  }

  async invoke(audio: Uint8Array, audioFormat: string, timeoutMs: number): Promise<ModelOutcome> {
    if (!this.state.modelLoaded) {
      return { kind: 'unavailable' };
    }
    const { classifier } = this.state;

    try {
      return await withScratchFile(this.scratchDir, audio, audioFormat, (path) =>
        this.race(classifier, path, timeoutMs)
      );
    } catch (err) {
      // Scratch file could not be written or removed.
      return { kind: 'failure', cause: toError(err) };
    }
  }

  private async race(classifier: Classifier, path: string, timeoutMs: number): Promise<ModelOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<ModelOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ kind: 'timeout' });
      }, timeoutMs);
    });

    const inference = this.attempt(classifier, path, controller.signal);

    try {
      return await Promise.race([inference, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Settles to an outcome either way, so an abandoned call cannot surface as
   * an unhandled rejection.
   */
  private async attempt(classifier: Classifier, path: string, signal: AbortSignal): Promise<ModelOutcome> {
    try {
      const label = await classifier.classify(path, signal);
      if (label !== 'FAKE' && label !== 'REAL') {
        return { kind: 'failure', cause: new Error(`Unexpected classifier label: ${String(label)}`) };
      }
      return { kind: 'success', classification: LABELS[label], confidence: MODEL_CONFIDENCE };
    } catch (err) {
      return { kind: 'failure', cause: toError(err) };
    }
  }
}
