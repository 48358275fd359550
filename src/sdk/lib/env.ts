import { parseLogLevel, resolveLogLevel, type LogLevelName } from '../../shared/lib/logger.js';

export interface LiveSdkEnv {
  vertexai: boolean;
  pcmSampleRate: number;
  logLevel: LogLevelName;
}

export const DEFAULT_PCM_SAMPLE_RATE = 16000;

const parseBoolean = (value: string | undefined): boolean => {
  if (!value) {
    return false;
  }

  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
};

const parseSampleRate = (value: string | undefined): number => {
  if (!value) {
    return DEFAULT_PCM_SAMPLE_RATE;
  }

  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 8000 || parsed > 48000) {
    return DEFAULT_PCM_SAMPLE_RATE;
  }

  return parsed;
};

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): LiveSdkEnv => ({
  vertexai: parseBoolean(source.LIVE_USE_VERTEXAI),
  pcmSampleRate: parseSampleRate(source.LIVE_PCM_SAMPLE_RATE),
  logLevel: parseLogLevel(source.LOG_LEVEL) ?? resolveLogLevel(source)
});
