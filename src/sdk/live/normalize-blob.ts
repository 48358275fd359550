import type { MediaBlob, WireBlob } from '../../shared/types/live-types.js';
import { LiveInputError } from '../errors.js';
import { detectImageMimeType } from '../lib/detect-image-mime.js';
import { encodeBase64, float32ToBase64Pcm, pcmMimeType } from '../lib/encode-base64.js';
import { blobSchema, hasAnyKey, isDict, parseInput } from '../lib/input-schemas.js';
import { DEFAULT_PCM_SAMPLE_RATE } from '../lib/env.js';

export interface MediaOptions {
  pcmSampleRate?: number;
}

export const isBlobLike = (value: unknown): boolean => {
  return isDict(value) && value.data !== undefined && hasAnyKey(value, ['mimeType', 'mime_type']);
};

export const toWireBlob = (blob: MediaBlob): WireBlob => ({
  data: encodeBase64(blob.data),
  mime_type: blob.mimeType
});

export const rawMediaToWireBlob = (media: Uint8Array | Float32Array, options: MediaOptions = {}): WireBlob => {
  if (media instanceof Float32Array) {
    return {
      data: float32ToBase64Pcm(media),
      mime_type: pcmMimeType(options.pcmSampleRate ?? DEFAULT_PCM_SAMPLE_RATE)
    };
  }

  const mimeType = detectImageMimeType(media);

  if (!mimeType) {
    throw new LiveInputError(
      'Could not detect the media type of raw bytes. Pass a blob with an explicit mimeType instead.'
    );
  }

  return {
    data: encodeBase64(media),
    mime_type: mimeType
  };
};

export const normalizeBlob = (input: unknown, options: MediaOptions = {}): WireBlob => {
  if (input instanceof Uint8Array || input instanceof Float32Array) {
    return rawMediaToWireBlob(input, options);
  }

  return toWireBlob(parseInput(blobSchema, input, 'blob'));
};
