/**
 * Unit tests for request orchestration.
 */
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { deterministicFallback } from '../src/fallback/fallback-classifier';
import { ModelGateway } from '../src/gateway/model-gateway';
import { DetectionService, MODEL_EXPLANATION } from '../src/orchestrator/detection-service';
import type { BodySources, Classifier, ModelLabel } from '../src/types';
import { MODEL_NOT_LOADED } from '../src/types';

const PAYLOAD = Buffer.from('RIFF$...WAVEfmt detection test').toString('base64');

function jsonBody(body: Record<string, unknown>): BodySources {
  return { text: JSON.stringify(body), contentType: 'application/json' };
}

let scratchDir: string;

beforeEach(() => {
  scratchDir = mkdtempSync(join(tmpdir(), 'voiceverdict-service-'));
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
  rmSync(scratchDir, { recursive: true, force: true });
});

function serviceWith(classifier?: Classifier): DetectionService {
  const state = classifier ? { modelLoaded: true as const, classifier } : MODEL_NOT_LOADED;
  return new DetectionService(new ModelGateway(state, { scratchDir }), { random: () => 0 });
}

function answering(label: ModelLabel): Classifier & { classify: jest.Mock } {
  return { classify: jest.fn().mockResolvedValue(label) };
}

describe('DetectionService.detect', () => {
  test('returns the same verdict for the same payload', () => {
    const service = serviceWith();
    const body = jsonBody({ audio_base64: 'QQ==', audio_format: 'wav', language: 'en' });
    const first = service.detect(body);
    expect(first).toEqual({
      classification: 'Human',
      confidence: 0.87,
      explanation: 'Voice quality fluctuates as expected for human speech',
    });
    expect(service.detect(body)).toEqual(first);
  });

  test('uses the quick fallback for an unparseable body', () => {
    expect(serviceWith().detect({ text: 'not json', contentType: 'application/json' })).toEqual({
      classification: 'AI-generated',
      confidence: 0.75,
      explanation: 'Spectral envelope is unusually smooth across voiced segments',
    });
  });

  test('reports missing fields with the received keys', () => {
    expect(serviceWith().detect(jsonBody({ language: 'en' }))).toEqual({
      classification: 'error',
      confidence: 0,
      explanation: 'Missing required fields: audio_format, audio_base64. Received keys: language',
    });
  });

  test('reports an empty object', () => {
    expect(serviceWith().detect(jsonBody({})).explanation).toBe(
      'Missing required fields: language, audio_format, audio_base64. Received keys: (none)'
    );
  });

  test('never consults the model', () => {
    const classifier = answering('REAL');
    const result = serviceWith(classifier).detect(jsonBody({ audio_base64: PAYLOAD, audio_format: 'wav', language: 'en' }));
    expect(classifier.classify).not.toHaveBeenCalled();
    expect(result).toEqual(deterministicFallback(PAYLOAD));
  });

  test('keys the fallback on the cleaned payload', () => {
    const service = serviceWith();
    const damaged = `${PAYLOAD.slice(0, 10)}\n${PAYLOAD.slice(10)}`;
    expect(service.detect(jsonBody({ audio_base64: damaged, audio_format: 'wav', language: 'en' }))).toEqual(
      service.detect(jsonBody({ audio_base64: PAYLOAD, audio_format: 'wav', language: 'en' }))
    );
  });
});

describe('DetectionService.detectWithModel', () => {
  const body = jsonBody({ audio_base64: PAYLOAD, audio_format: 'wav', language: 'en' });

  test('returns the model verdict on success', async () => {
    await expect(serviceWith(answering('REAL')).detectWithModel(body, 1000)).resolves.toEqual({
      classification: 'Human',
      confidence: 0.85,
      explanation: MODEL_EXPLANATION,
    });
  });

  test('falls back deterministically when the classifier throws', async () => {
    const classifier: Classifier = { classify: jest.fn().mockRejectedValue(new Error('internal error')) };
    await expect(serviceWith(classifier).detectWithModel(body, 1000)).resolves.toEqual(deterministicFallback(PAYLOAD));
  });

  test('falls back deterministically when the model is not loaded', async () => {
    await expect(serviceWith().detectWithModel(body, 1000)).resolves.toEqual(deterministicFallback(PAYLOAD));
  });

  test('falls back when the classifier hangs', async () => {
    const classifier: Classifier = { classify: () => new Promise<ModelLabel>(() => undefined) };
    const started = Date.now();
    await expect(serviceWith(classifier).detectWithModel(body, 50)).resolves.toEqual(deterministicFallback(PAYLOAD));
    expect(Date.now() - started).toBeLessThan(1000);
  });

  test('does not call the model for an undecodable payload', async () => {
    const classifier = answering('FAKE');
    const result = await serviceWith(classifier).detectWithModel(
      jsonBody({ audio_base64: 'QQ==', audio_format: 'wav', language: 'en' }),
      1000
    );
    expect(classifier.classify).not.toHaveBeenCalled();
    expect(result).toEqual(deterministicFallback('QQ=='));
  });

  test('still validates fields', async () => {
    const result = await serviceWith(answering('FAKE')).detectWithModel(jsonBody({ audio_base64: PAYLOAD }), 1000);
    expect(result.classification).toBe('error');
  });
});

describe('DetectionService.classifyUpload', () => {
  const bytes = Buffer.from('RIFF$...WAVEfmt upload test');

  test('reports a missing upload', async () => {
    await expect(serviceWith().classifyUpload(undefined, 1000)).resolves.toEqual({
      classification: 'error',
      confidence: 0,
      explanation: 'Missing required file field "audio_file"',
    });
  });

  test('passes the file extension to the gateway', async () => {
    const classifier = answering('FAKE');
    const result = await serviceWith(classifier).classifyUpload({ bytes, fileName: 'clip.MP3' }, 1000);
    expect(result.classification).toBe('AI-generated');
    const [path] = classifier.classify.mock.calls[0];
    expect(String(path).endsWith('.mp3')).toBe(true);
  });

  test('defaults the format to wav', async () => {
    const classifier = answering('REAL');
    await serviceWith(classifier).classifyUpload({ bytes }, 1000);
    const [path] = classifier.classify.mock.calls[0];
    expect(String(path).endsWith('.wav')).toBe(true);
  });

  test('falls back on the upload bytes when inference fails', async () => {
    const classifier: Classifier = { classify: jest.fn().mockRejectedValue(new Error('bad audio')) };
    await expect(serviceWith(classifier).classifyUpload({ bytes }, 1000)).resolves.toEqual(deterministicFallback(bytes));
  });

  test('falls back without inference for a tiny upload', async () => {
    const classifier = answering('REAL');
    const tiny = Buffer.from('RIFF');
    await expect(serviceWith(classifier).classifyUpload({ bytes: tiny }, 1000)).resolves.toEqual(
      deterministicFallback(tiny)
    );
    expect(classifier.classify).not.toHaveBeenCalled();
  });
});
