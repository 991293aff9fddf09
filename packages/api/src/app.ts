/**
 * Express application factory for the VoiceVerdict API.
 *
 * Creates and configures a fully-wired Express app without starting a
 * TCP listener. This separation allows `index.ts` to start the server
 * and tests to import `createApp()` directly without binding a port.
 *
 * Layers (applied in order):
 *  1. `helmet`          — sets secure HTTP response headers.
 *  2. `cors`            — allow-list from ALLOWED_ORIGINS, any origin when unset.
 *  3. `rateLimit`       — per-IP limiter, only when RATE_LIMIT_PER_MINUTE > 0.
 *  4. `authMiddleware`  — validates the shared key when API_KEY is set.
 *  5. Routes            — health, deepfake, detect, detect-with-model.
 *
 * Body parsing is per route: the detect routes read any content type
 * themselves and the upload route uses multer.
 */
import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { rateLimit } from 'express-rate-limit';
import { DetectionService, MODEL_NOT_LOADED, ModelGateway } from '@voiceverdict/core';
import type { ModelState } from '@voiceverdict/core';
import { getServiceConfig, ServiceConfig } from './config';
import { authMiddleware } from './middleware/auth';
import { createDeepfakeRouter } from './routes/deepfake';
import { createDetectRouter } from './routes/detect';
import { createHealthRouter } from './routes/health';

export interface CreateAppOptions {
  /** Outcome of the startup model-loading phase. Defaults to not loaded. */
  modelState?: ModelState;
  config?: ServiceConfig;
  /** Source of randomness for the quick fallback. */
  random?: () => number;
  /** Epoch millis used for `uptime`. Defaults to now. */
  startedAt?: number;
}

export function createApp(options: CreateAppOptions = {}): express.Application {
  const config = options.config ?? getServiceConfig();
  const gateway = new ModelGateway(options.modelState ?? MODEL_NOT_LOADED, { scratchDir: config.scratchDir });
  const service = new DetectionService(gateway, { random: options.random });

  const app = express();

  // ── Security headers ───────────────────────────────────────────────────────
  app.use(helmet());

  // ── CORS ───────────────────────────────────────────────────────────────────
  app.use(
    cors({
      origin: (origin, callback) => {
        // Server-to-server (no Origin header) or no allow-list — allow.
        if (!origin || config.allowedOrigins.size === 0 || config.allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }
        callback(null, false);
      },
      methods: ['POST', 'GET', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
    })
  );

  // ── Rate limiting ──────────────────────────────────────────────────────────
  if (config.rateLimitPerMinute > 0) {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        limit: config.rateLimitPerMinute,
        standardHeaders: true,
        legacyHeaders: false,
        message: { error: 'Too many requests, please try again later.' },
      })
    );
  }

  // ── Authentication ─────────────────────────────────────────────────────────
  app.use(authMiddleware);

  // ── Routes ─────────────────────────────────────────────────────────────────
  app.use('/', createHealthRouter(service, options.startedAt ?? Date.now()));
  app.use('/deepfake', createDeepfakeRouter(service, config));
  app.use('/detect', createDetectRouter(service, config, { withModel: false }));
  app.use('/detect-with-model', createDetectRouter(service, config, { withModel: true }));

  // ── 404 fallback ───────────────────────────────────────────────────────────
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
