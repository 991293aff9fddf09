/**
 * GET /        — service description
 * GET /health  — liveness probe
 *
 * Both report whether the acoustic model was loaded at startup. Neither
 * touches the model.
 */
import { Router, Request, Response } from 'express';
import type { DetectionService } from '@voiceverdict/core';

export const SERVICE_VERSION = '1.0.0';

export const ENDPOINTS = ['/', '/health', '/deepfake', '/detect', '/detect-with-model'] as const;

export function createHealthRouter(service: DetectionService, startedAt: number): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'API is working',
      model_loaded: service.modelLoaded,
      version: SERVICE_VERSION,
      endpoints: ENDPOINTS,
    });
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      model_loaded: service.modelLoaded,
      uptime: Math.max(0, Math.floor((Date.now() - startedAt) / 1000)),
    });
  });

  return router;
}
