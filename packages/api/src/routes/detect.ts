/**
 * POST /detect and POST /detect-with-model
 *
 * Automated-caller endpoints. Accept JSON, urlencoded or multipart bodies
 * whose field names vary in spelling and case:
 *
 * ```json
 * { "audio_base64": "UklGRi...", "audio_format": "wav", "language": "en" }
 * ```
 *
 * Respond with:
 * ```json
 * { "classification": "Human", "confidence": 0.82, "explanation": "..." }
 * ```
 *
 * Both routes always answer HTTP 200 with a result. Missing fields give
 * `"classification": "error"`; an unreadable body gives the quick fallback.
 * `/detect` classifies from the payload's content hash only;
 * `/detect-with-model` asks the model first and falls back on any failure.
 */
import express, { Router, Request, Response } from 'express';
import multer from 'multer';
import type { IncomingMessage } from 'http';
import type { BodySources, DetectionService } from '@voiceverdict/core';
import type { ServiceConfig } from '../config';
import {
  endParseDeadline,
  quickFallbackOnError,
  sendResult,
  startParseDeadline,
} from '../middleware/parse-deadline';

/** Only text fields are read; any file part aborts the parse. */
const MAX_MULTIPART_FIELDS = 16;

function isMultipart(req: IncomingMessage): boolean {
  return /^multipart\//i.test(req.headers['content-type'] ?? '');
}

/**
 * Collect what the body parsers produced. Non-multipart bodies arrive as
 * text; multipart bodies as a field object.
 */
export function collectBodySources(req: Request): BodySources {
  const body: unknown = req.body;
  const contentType = req.headers['content-type'];

  if (typeof body === 'string') {
    return { text: body, contentType };
  }
  if (isMultipart(req) && typeof body === 'object' && body !== null) {
    return { contentType, fields: Object.fromEntries(Object.entries(body)) };
  }
  return { contentType };
}

export interface DetectRouterOptions {
  /** Offer decodable payloads to the model before falling back. */
  withModel: boolean;
}

export function createDetectRouter(
  service: DetectionService,
  config: ServiceConfig,
  options: DetectRouterOptions
): Router {
  const router = Router();
  const fallback = () => service.quickResult();

  const readText = express.text({ type: (req) => !isMultipart(req), limit: config.maxBodyBytes });
  const readMultipart = multer({
    storage: multer.memoryStorage(),
    limits: { files: 0, fields: MAX_MULTIPART_FIELDS, fieldSize: config.maxBodyBytes },
  }).none();

  router.post(
    '/',
    startParseDeadline(config.parseTimeoutMs, fallback),
    readText,
    readMultipart,
    endParseDeadline,
    async (req: Request, res: Response) => {
      if (res.headersSent) {
        return;
      }
      const sources = collectBodySources(req);
      const result = options.withModel
        ? await service.detectWithModel(sources, config.detectModelTimeoutMs)
        : service.detect(sources);
      sendResult(res, result);
    }
  );

  router.use(quickFallbackOnError(fallback));

  return router;
}
