import { describe, expect, it } from 'vitest';
import { encodeBase64, float32ToBase64Pcm, pcmMimeType } from './encode-base64.js';

describe('encodeBase64', () => {
  it('encodes bytes', () => {
    expect(encodeBase64(new Uint8Array(6))).toBe('AAAAAAAA');
  });

  it('encodes only the viewed slice of a larger buffer', () => {
    const backing = Uint8Array.from([9, 1, 2, 3, 9]);
    const encoded = encodeBase64(backing.subarray(1, 4));

    expect(encoded).toBe('AQID');
    expect([...Buffer.from(encoded, 'base64')]).toEqual([1, 2, 3]);
  });

  it('leaves strings alone', () => {
    expect(encodeBase64('already-base64')).toBe('already-base64');
  });
});

describe('float32ToBase64Pcm', () => {
  it('writes little-endian 16-bit samples', () => {
    expect(float32ToBase64Pcm(Float32Array.from([0, 1, -1]))).toBe('AAD/fwCA');
  });

  it('clamps samples outside [-1, 1]', () => {
    expect(float32ToBase64Pcm(Float32Array.from([2, -3]))).toBe('/38AgA==');
  });
});

describe('pcmMimeType', () => {
  it('declares the sample rate', () => {
    expect(pcmMimeType(24000)).toBe('audio/pcm;rate=24000');
  });
});
