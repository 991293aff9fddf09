/**
 * Public API of @voiceverdict/core
 */
export * from './types';
export * from './utils/hash';
export * from './request/request-normalizer';
export * from './decoder/payload-decoder';
export * from './fallback/fallback-classifier';
export * from './gateway/scratch-file';
export * from './gateway/model-gateway';
export * from './model/http-classifier';
export * from './orchestrator/detection-service';
