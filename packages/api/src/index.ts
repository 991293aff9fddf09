/**
 * Entry point for the VoiceVerdict API server.
 *
 * Startup runs once, before any request is accepted: the model sidecar is
 * probed (see `loadModel` in @voiceverdict/core) and the outcome is fixed for
 * the life of the process. Then the server listens on PORT (default 8000).
 *
 * See `config.ts` and `@voiceverdict/core`'s `http-classifier.ts` for the
 * environment variables each part reads.
 */
import { loadModel } from '@voiceverdict/core';
import { createApp } from './app';
import { getServiceConfig } from './config';

async function main(): Promise<void> {
  const config = getServiceConfig();
  const modelState = await loadModel();
  const app = createApp({ modelState, config });

  app.listen(config.port, () => {
    console.log(`[VoiceVerdict API] Listening on port ${config.port} (model_loaded=${modelState.modelLoaded})`);
  });
}

main().catch((err: unknown) => {
  console.error('[VoiceVerdict API] Startup failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
