import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, parseLogLevel, resolveLogLevel } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes at or above its level with a namespace prefix', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = createLogger('live', 'warn');

    log.warn('slow socket', { ms: 40 });
    log.debug('hidden');

    expect(warn).toHaveBeenCalledWith('[live]', 'slow socket', { ms: 40 });
    expect(debug).not.toHaveBeenCalled();
  });

  it('creates child namespaces at the same level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const child = createLogger('live', 'error').child('session');

    child.error('boom');

    expect(child.namespace).toBe('live:session');
    expect(child.level).toBe('error');
    expect(error).toHaveBeenCalledWith('[live:session]', 'boom');
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('live', 'silent').error('boom');

    expect(error).not.toHaveBeenCalled();
  });

  it('resolves the level from the environment', () => {
    expect(parseLogLevel(' INFO ')).toBe('info');
    expect(parseLogLevel('verbose')).toBeNull();
    expect(resolveLogLevel({ LOG_LEVEL: 'debug', NODE_ENV: 'test' })).toBe('debug');
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('silent');
    expect(resolveLogLevel({})).toBe('warn');
  });
});
