export * from './shared/types/live-types.js';
export { createLogger, parseLogLevel, resolveLogLevel } from './shared/lib/logger.js';
export type { Logger, LogLevelName } from './shared/lib/logger.js';
export { LiveInputError, LiveSessionClosedError, LiveTransportError } from './sdk/errors.js';
export { DEFAULT_PCM_SAMPLE_RATE, loadEnv } from './sdk/lib/env.js';
export type { LiveSdkEnv } from './sdk/lib/env.js';
export { loadEnvFile } from './sdk/lib/load-env-file.js';
export { createWsTransport, openWsTransport } from './sdk/lib/ws-transport.js';
export type { LiveTransport } from './sdk/lib/ws-transport.js';
export { buildClientMessage, classifyInput } from './sdk/live/classify-input.js';
export { normalizeBlob } from './sdk/live/normalize-blob.js';
export { normalizeClientContent, normalizeContent, normalizePart, normalizeTurns } from './sdk/live/normalize-content.js';
export { normalizeRealtimeInput } from './sdk/live/normalize-realtime-input.js';
export { FUNCTION_RESPONSE_REQUIRES_ID, normalizeToolResponse } from './sdk/live/normalize-tool-response.js';
export { LiveSession } from './sdk/live/live-session.js';
export type { LiveSessionOptions, SendClientContentOptions } from './sdk/live/live-session.js';
export { createLiveSession } from './sdk/live/create-live-session.js';
export type { CreateLiveSessionOptions } from './sdk/live/create-live-session.js';
