import { createLogger } from '../../shared/lib/logger.js';
import { loadEnv } from '../lib/env.js';
import { loadEnvFile } from '../lib/load-env-file.js';
import type { LiveTransport } from '../lib/ws-transport.js';
import { LiveSession, type LiveSessionOptions } from './live-session.js';

export interface CreateLiveSessionOptions extends Omit<LiveSessionOptions, 'transport'> {
  /** Dotenv file read before the environment is resolved. */
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}

export const createLiveSession = (transport: LiveTransport, options: CreateLiveSessionOptions = {}): LiveSession => {
  const source = options.env ?? process.env;

  if (options.envFile) {
    loadEnvFile(options.envFile, source);
  }

  const env = loadEnv(source);

  return new LiveSession({
    transport,
    vertexai: options.vertexai ?? env.vertexai,
    pcmSampleRate: options.pcmSampleRate ?? env.pcmSampleRate,
    logger: options.logger ?? createLogger('live:session', env.logLevel)
  });
};
