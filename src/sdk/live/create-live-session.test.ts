import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { createFakeTransport } from '../test-utils/fake-transport.js';
import { createLiveSession } from './create-live-session.js';

describe('createLiveSession', () => {
  it('takes the sample rate and backend from the environment', async () => {
    const { transport, messageAt } = createFakeTransport();
    const session = createLiveSession(transport, {
      env: { NODE_ENV: 'test', LIVE_USE_VERTEXAI: '1', LIVE_PCM_SAMPLE_RATE: '24000' }
    });

    await session.sendRealtimeInput(Float32Array.from([0]));
    await session.sendToolResponse({ name: 'lookup', response: { ok: true } });

    expect(session.vertexai).toBe(true);
    expect(messageAt(0).realtime_input.media_chunks[0].mime_type).toBe('audio/pcm;rate=24000');
    expect(messageAt(1).tool_response.function_responses).toEqual([{ name: 'lookup', response: { ok: true } }]);
  });

  it('lets explicit options win over the environment', () => {
    const { transport } = createFakeTransport();
    const session = createLiveSession(transport, {
      env: { NODE_ENV: 'test', LIVE_USE_VERTEXAI: 'true' },
      vertexai: false
    });

    expect(session.vertexai).toBe(false);
  });

  it('loads a dotenv file into the given environment', () => {
    const dir = mkdtempSync(join(tmpdir(), 'live-session-'));
    const file = join(dir, '.env');
    writeFileSync(file, 'LIVE_USE_VERTEXAI=yes\n');
    const env: NodeJS.ProcessEnv = { NODE_ENV: 'test' };

    try {
      const session = createLiveSession(createFakeTransport().transport, { env, envFile: file });

      expect(env.LIVE_USE_VERTEXAI).toBe('yes');
      expect(session.vertexai).toBe(true);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
