import { vi } from 'vitest';
import type { LiveTransport } from '../lib/ws-transport.js';

export const createFakeTransport = () => {
  const frames: string[] = [];

  const transport = {
    send: vi.fn(async (text: string) => {
      frames.push(text);
    }),
    close: vi.fn(async () => undefined)
  } satisfies LiveTransport;

  const messageAt = (index = 0) => JSON.parse(frames[index] ?? 'null');

  return { transport, frames, messageAt };
};

export const jpegBytes = Uint8Array.from([0xff, 0xd8, 0xff, 0xe0]);

export const zeroBytes = () => new Uint8Array(6);
