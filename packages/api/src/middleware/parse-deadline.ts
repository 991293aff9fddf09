/**
 * Body-read deadline for the automated-caller routes.
 *
 * `startParseDeadline` is installed before the body parsers and
 * `endParseDeadline` right after them. If the body has not been read when the
 * deadline fires, the request is answered with the quick fallback; a handler
 * that runs later finds the response already sent and does nothing.
 *
 * `quickFallbackOnError` turns any body-parser error (oversized payload,
 * unsupported charset, aborted upload, malformed multipart) into the same
 * quick fallback, so these routes never answer with an HTTP error.
 */
import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import type { ClassificationResult } from '@voiceverdict/core';

const deadlines = new WeakMap<Response, NodeJS.Timeout>();

export function clearParseDeadline(res: Response): void {
  const timer = deadlines.get(res);
  if (timer) {
    clearTimeout(timer);
    deadlines.delete(res);
  }
}

/** Send `result` unless something (e.g. the deadline) already answered. */
export function sendResult(res: Response, result: ClassificationResult): void {
  if (!res.headersSent) {
    res.json(result);
  }
}

function describe(req: Request): string {
  return `${req.method} ${req.originalUrl}`;
}

export function startParseDeadline(timeoutMs: number, fallback: () => ClassificationResult): RequestHandler {
  return (req, res, next) => {
    const timer = setTimeout(() => {
      deadlines.delete(res);
      if (!res.headersSent) {
        console.warn(`[VoiceVerdict API] ${describe(req)}: body not read within ${timeoutMs}ms; using quick fallback`);
        res.json(fallback());
      }
    }, timeoutMs);
    deadlines.set(res, timer);
    res.on('close', () => clearParseDeadline(res));
    next();
  };
}

export const endParseDeadline: RequestHandler = (_req, res, next) => {
  clearParseDeadline(res);
  next();
};

export function quickFallbackOnError(fallback: () => ClassificationResult): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    clearParseDeadline(res);
    console.warn(
      `[VoiceVerdict API] ${describe(req)}: body unreadable (${err instanceof Error ? err.message : String(err)}); using quick fallback`
    );
    sendResult(res, fallback());
  };
}
