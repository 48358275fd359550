import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadEnvFile } from './load-env-file.js';

describe('loadEnvFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'live-env-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('applies new keys and keeps existing ones', () => {
    const file = join(dir, '.env');
    writeFileSync(
      file,
      ['# live settings', 'LIVE_USE_VERTEXAI=true', 'export LOG_LEVEL="debug"', 'ALREADY=from-file', 'bad line', '=novalue', ''].join('\n')
    );
    const target: NodeJS.ProcessEnv = { ALREADY: 'set' };

    expect(loadEnvFile(file, target)).toEqual(['LIVE_USE_VERTEXAI', 'LOG_LEVEL']);
    expect(target).toEqual({
      ALREADY: 'set',
      LIVE_USE_VERTEXAI: 'true',
      LOG_LEVEL: 'debug'
    });
  });

  it('ignores a missing file', () => {
    const target: NodeJS.ProcessEnv = {};

    expect(loadEnvFile(join(dir, 'missing.env'), target)).toEqual([]);
    expect(target).toEqual({});
  });
});
