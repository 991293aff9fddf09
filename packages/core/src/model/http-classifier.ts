/**
 * HTTP client for an acoustic-model inference sidecar.
 *
 * The sidecar owns feature extraction and model execution. This service only
 * hands it audio and reads back a two-way label.
 *
 * Environment variables:
 *   MODEL_ENDPOINT         — Base URL of the sidecar, e.g. http://localhost:8501.
 *                            When unset, the model is reported as not loaded and
 *                            every request is answered by the fallback classifier.
 *   MODEL_API_KEY          — Optional bearer token sent to the sidecar.
 *   MODEL_LOAD_TIMEOUT_MS  — Budget for the startup health probe (default: 5000).
 *
 * Sidecar contract:
 *   GET  {endpoint}/health    — any 2xx means the model is loaded.
 *   POST {endpoint}/classify  — body: raw audio bytes, header X-Audio-Format;
 *                               response: { "label": "FAKE" | "REAL" }.
 */
import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { Classifier, ModelLabel, ModelState } from '../types';
import { MODEL_NOT_LOADED } from '../types';

export interface ModelConfig {
  endpoint: string;
  apiKey: string;
  loadTimeoutMs: number;
}

const DEFAULT_LOAD_TIMEOUT_MS = 5000;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw?.trim() ?? '', 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Read the sidecar configuration from the environment.
 * Returns null when `MODEL_ENDPOINT` is not set.
 */
export function getModelConfig(): ModelConfig | null {
  const endpoint = process.env.MODEL_ENDPOINT?.trim();
  if (!endpoint) {
    return null;
  }
  return {
    endpoint: endpoint.replace(/\/$/, ''),
    apiKey: process.env.MODEL_API_KEY?.trim() ?? '',
    loadTimeoutMs: parsePositiveInt(process.env.MODEL_LOAD_TIMEOUT_MS, DEFAULT_LOAD_TIMEOUT_MS),
  };
}

function parseLabel(data: unknown): ModelLabel | null {
  if (typeof data !== 'object' || data === null || !('label' in data)) {
    return null;
  }
  const label = typeof data.label === 'string' ? data.label.trim().toUpperCase() : '';
  return label === 'FAKE' || label === 'REAL' ? label : null;
}

export class HttpClassifier implements Classifier {
  constructor(private readonly config: ModelConfig) {}

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return {
      ...extra,
      ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
    };
  }

  /**
   * Ask the sidecar whether a model is loaded.
   *
   * @throws When the sidecar is unreachable or answers non-2xx.
   */
  async ping(signal?: AbortSignal): Promise<void> {
    const response = await fetch(`${this.config.endpoint}/health`, {
      headers: this.headers(),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Model sidecar HTTP ${response.status}: ${response.statusText}`);
    }
  }

  /**
   * @throws When the sidecar answers non-2xx, returns an unknown label, or the
   *         request is aborted.
   */
  async classify(audioPath: string, signal: AbortSignal): Promise<ModelLabel> {
    const audio = await readFile(audioPath, { signal });
    const response = await fetch(`${this.config.endpoint}/classify`, {
      method: 'POST',
      headers: this.headers({
        'Content-Type': 'application/octet-stream',
        'X-Audio-Format': extname(audioPath).slice(1),
      }),
      body: new Uint8Array(audio),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Model sidecar HTTP ${response.status}: ${response.statusText}`);
    }

    const label = parseLabel(await response.json());
    if (!label) {
      throw new Error('Model sidecar returned no FAKE/REAL label');
    }
    return label;
  }
}

/**
 * Startup phase: decide once whether the model is usable.
 * Never throws; an unreachable sidecar yields `{ modelLoaded: false }`.
 */
export async function loadModel(config: ModelConfig | null = getModelConfig()): Promise<ModelState> {
  if (!config) {
    console.log('[VoiceVerdict] MODEL_ENDPOINT not set; serving fallback classifications only');
    return MODEL_NOT_LOADED;
  }

  const classifier = new HttpClassifier(config);
  try {
    await classifier.ping(AbortSignal.timeout(config.loadTimeoutMs));
    console.log('[VoiceVerdict] Model sidecar ready:', config.endpoint);
    return { modelLoaded: true, classifier };
  } catch (err) {
    console.error('[VoiceVerdict] Model sidecar unavailable:', err instanceof Error ? err.message : err);
    return MODEL_NOT_LOADED;
  }
}
