/**
 * Extracts a canonical `DetectionRequest` from loosely-shaped request bodies.
 *
 * Callers send the same three fields as JSON, urlencoded or multipart forms,
 * under several spellings. Every source that parses contributes to one merged
 * field map (later sources override earlier ones); a source that fails to
 * parse is skipped.
 */
import type { BodySources, DetectionRequest, ParseOutcome } from '../types';

export type LogicalField = keyof DetectionRequest;

/**
 * Accepted spellings per logical field, in lookup order. Keys are matched
 * after `trim().toLowerCase()`.
 */
export const FIELD_ALIASES: Readonly<Record<LogicalField, readonly string[]>> = {
  audioPayload: ['audio_base64', 'audiobase64', 'audio_base64_format', 'audio base64', 'audio-base64'],
  audioFormat: ['audio_format', 'audioformat', 'audio format', 'audio-format'],
  language: ['language', 'lang'],
};

/** Canonical wire names, in the order validation messages list them. */
const WIRE_NAMES: ReadonlyArray<[LogicalField, string]> = [
  ['language', 'language'],
  ['audioFormat', 'audio_format'],
  ['audioPayload', 'audio_base64'],
];

const FORM_CONTENT_TYPE = /^application\/x-www-form-urlencoded\b/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function parseUrlEncoded(text: string): Record<string, unknown> {
  return Object.fromEntries(new URLSearchParams(text));
}

/**
 * Merge every parseable source into a single map keyed by normalized
 * (trimmed, lower-cased) field name.
 */
export function parseBody(sources: BodySources): ParseOutcome {
  const parsedSources: Record<string, unknown>[] = [];

  if (sources.text !== undefined) {
    const json = parseJsonObject(sources.text);
    if (json) parsedSources.push(json);

    if (sources.contentType && FORM_CONTENT_TYPE.test(sources.contentType)) {
      parsedSources.push(parseUrlEncoded(sources.text));
    }
  }

  if (sources.fields) {
    parsedSources.push(sources.fields);
  }

  if (parsedSources.length === 0) {
    return { kind: 'parse_failed' };
  }

  // Null prototype: a "__proto__" key is stored as data.
  const fields: Record<string, unknown> = Object.create(null);
  for (const source of parsedSources) {
    for (const [key, value] of Object.entries(source)) {
      fields[key.trim().toLowerCase()] = value;
    }
  }
  return { kind: 'parsed', fields };
}

function resolveField(fields: Record<string, unknown>, field: LogicalField): string | undefined {
  for (const alias of FIELD_ALIASES[field]) {
    if (!Object.hasOwn(fields, alias)) continue;
    const value = fields[alias];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return undefined;
}

export type ResolveOutcome =
  | { ok: true; request: DetectionRequest }
  | { ok: false; missing: string[]; receivedKeys: string[] };

/**
 * Resolve the logical fields through `FIELD_ALIASES`. All three are required.
 */
export function resolveDetectionRequest(fields: Record<string, unknown>): ResolveOutcome {
  const language = resolveField(fields, 'language');
  const audioFormat = resolveField(fields, 'audioFormat');
  const audioPayload = resolveField(fields, 'audioPayload');

  if (language === undefined || audioFormat === undefined || audioPayload === undefined) {
    const resolved: Record<LogicalField, string | undefined> = { language, audioFormat, audioPayload };
    const missing = WIRE_NAMES.filter(([field]) => resolved[field] === undefined).map(([, name]) => name);
    return { ok: false, missing, receivedKeys: Object.keys(fields) };
  }

  return {
    ok: true,
    request: { audioPayload, audioFormat: audioFormat.trim(), language: language.trim() },
  };
}
