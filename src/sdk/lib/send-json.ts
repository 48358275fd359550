import type { Logger } from '../../shared/lib/logger.js';
import type { LiveTransport } from './ws-transport.js';

export const sendJson = async (transport: LiveTransport, payload: unknown, log?: Logger): Promise<number> => {
  const text = JSON.stringify(payload);

  try {
    await transport.send(text);
  } catch (error) {
    log?.error('Failed to write frame.', error instanceof Error ? error.message : error);
    throw error;
  }

  return Buffer.byteLength(text);
};
