import type { LiveClientMessage, WireRealtimeInput } from '../../shared/types/live-types.js';
import { LiveInputError } from '../errors.js';
import { hasAnyKey, isDict, parseInput, realtimeInputSchema } from '../lib/input-schemas.js';
import { normalizeBlob, type MediaOptions } from './normalize-blob.js';

const EMPTY_MEDIA_CHUNKS = 'Realtime input requires at least one media chunk.';

// `text` is left out: on its own it reads as a content part.
export const REALTIME_INPUT_KEYS = [
  'mediaChunks',
  'media_chunks',
  'audio',
  'video',
  'activityStart',
  'activity_start',
  'activityEnd',
  'activity_end',
  'audioStreamEnd',
  'audio_stream_end'
] as const;

export const isRealtimeInputLike = (value: unknown): boolean =>
  isDict(value) && hasAnyKey(value, REALTIME_INPUT_KEYS);

const normalizeEnvelope = (input: unknown, options: MediaOptions): WireRealtimeInput => {
  const envelope = parseInput(realtimeInputSchema, input, 'realtime input');
  const wire: WireRealtimeInput = {};

  if (envelope.mediaChunks) {
    if (envelope.mediaChunks.length === 0) {
      throw new LiveInputError(EMPTY_MEDIA_CHUNKS);
    }

    wire.media_chunks = envelope.mediaChunks.map((chunk) => normalizeBlob(chunk, options));
  }

  if (envelope.audio !== undefined) {
    wire.audio = normalizeBlob(envelope.audio, options);
  }

  if (envelope.video !== undefined) {
    wire.video = normalizeBlob(envelope.video, options);
  }

  if (envelope.text !== undefined) {
    wire.text = envelope.text;
  }

  if (envelope.activityStart) {
    wire.activity_start = {};
  }

  if (envelope.activityEnd) {
    wire.activity_end = {};
  }

  if (envelope.audioStreamEnd !== undefined) {
    wire.audio_stream_end = envelope.audioStreamEnd;
  }

  if (Object.keys(wire).length === 0) {
    throw new LiveInputError('Invalid realtime input: no field is set.');
  }

  return wire;
};

export const normalizeRealtimeInput = (input: unknown, options: MediaOptions = {}): LiveClientMessage => {
  if (Array.isArray(input)) {
    if (input.length === 0) {
      throw new LiveInputError(EMPTY_MEDIA_CHUNKS);
    }

    return {
      realtime_input: {
        media_chunks: input.map((chunk) => normalizeBlob(chunk, options))
      }
    };
  }

  if (isRealtimeInputLike(input) || (isDict(input) && typeof input.text === 'string' && input.data === undefined)) {
    return {
      realtime_input: normalizeEnvelope(input, options)
    };
  }

  return {
    realtime_input: {
      media_chunks: [normalizeBlob(input, options)]
    }
  };
};
