import type { BinaryData } from '../../shared/types/live-types.js';

export const encodeBase64 = (data: BinaryData): string => {
  if (typeof data === 'string') {
    return data;
  }

  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
};

// Samples are clamped to [-1, 1] and written as 16-bit little-endian PCM.
export const float32ToBase64Pcm = (input: Float32Array): string => {
  const pcm = new Int16Array(input.length);

  for (let index = 0; index < input.length; index += 1) {
    const clamped = Math.max(-1, Math.min(1, input[index]));
    pcm[index] = clamped < 0 ? clamped * 32768 : clamped * 32767;
  }

  const bytes = Buffer.alloc(pcm.length * 2);

  pcm.forEach((sample, index) => {
    bytes.writeInt16LE(sample, index * 2);
  });

  return bytes.toString('base64');
};

export const pcmMimeType = (sampleRate: number): string => `audio/pcm;rate=${sampleRate}`;
