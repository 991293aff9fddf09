/**
 * POST /deepfake
 *
 * Interactive upload endpoint. Accepts a multipart body with the audio file
 * in the `audio_file` field and responds with a `ClassificationResult`.
 *
 * Error responses:
 *   400 — no `audio_file` upload, or the multipart body could not be read
 *         (body is a result with `"classification": "error"`)
 *
 * A file over MAX_BODY_BYTES is a size rejection, not a validation error: it
 * is never read, so it gets the quick fallback with HTTP 200.
 */
import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { UPLOAD_FIELD, validationError } from '@voiceverdict/core';
import type { DetectionService } from '@voiceverdict/core';
import type { ServiceConfig } from '../config';

export function createDeepfakeRouter(service: DetectionService, config: ServiceConfig): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxBodyBytes, files: 1 },
  });

  router.post('/', upload.single(UPLOAD_FIELD), async (req: Request, res: Response) => {
    const file = req.file;
    const result = await service.classifyUpload(
      file ? { bytes: file.buffer, fileName: file.originalname } : undefined,
      config.uploadModelTimeoutMs
    );
    res.status(result.classification === 'error' ? 400 : 200).json(result);
  });

  router.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.warn('[VoiceVerdict API] Upload rejected:', err instanceof Error ? err.message : err);
    if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
      res.json(service.quickResult());
      return;
    }
    const reason = err instanceof multer.MulterError ? err.code : 'UNREADABLE_UPLOAD';
    res.status(400).json(validationError(`Upload rejected: ${reason}`));
  });

  return router;
}
