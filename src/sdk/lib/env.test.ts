import { describe, expect, it } from 'vitest';
import { DEFAULT_PCM_SAMPLE_RATE, loadEnv } from './env.js';

describe('loadEnv', () => {
  it('falls back to defaults', () => {
    expect(loadEnv({})).toEqual({
      vertexai: false,
      pcmSampleRate: DEFAULT_PCM_SAMPLE_RATE,
      logLevel: 'warn'
    });
  });

  it('reads configured values', () => {
    expect(
      loadEnv({
        LIVE_USE_VERTEXAI: 'TRUE',
        LIVE_PCM_SAMPLE_RATE: '24000',
        LOG_LEVEL: 'debug'
      })
    ).toEqual({
      vertexai: true,
      pcmSampleRate: 24000,
      logLevel: 'debug'
    });
  });

  it('stays silent under test', () => {
    expect(loadEnv({ NODE_ENV: 'test' }).logLevel).toBe('silent');
  });

  it.each(['abc', '7999', '48001', '16000.5'])('ignores an invalid sample rate of %s', (value) => {
    expect(loadEnv({ LIVE_PCM_SAMPLE_RATE: value }).pcmSampleRate).toBe(16000);
  });
});
