import type { LiveClientMessage, LiveMessageKind } from '../../shared/types/live-types.js';
import { LiveInputError } from '../errors.js';
import { hasAnyKey, isDict, isRawMedia } from '../lib/input-schemas.js';
import { isBlobLike, type MediaOptions } from './normalize-blob.js';
import { isClientContentLike, normalizeClientContent } from './normalize-content.js';
import { isRealtimeInputLike, normalizeRealtimeInput } from './normalize-realtime-input.js';
import { isFunctionResponseLike, isToolResponseLike, normalizeToolResponse } from './normalize-tool-response.js';

export interface BuildMessageOptions extends MediaOptions {
  endOfTurn?: boolean;
  vertexai?: boolean;
}

const describeValue = (value: unknown): string => {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  return typeof value;
};

const PART_KEYS = [
  'text',
  'inlineData',
  'inline_data',
  'fileData',
  'file_data',
  'functionCall',
  'function_call',
  'functionResponse',
  'function_response',
  'uri',
  'parts'
] as const;

const isMediaItem = (value: unknown): boolean => isRawMedia(value) || isBlobLike(value);

export const classifyInput = (input: unknown): LiveMessageKind => {
  if (typeof input === 'string') {
    return 'client_content';
  }

  if (isRawMedia(input)) {
    return 'realtime_input';
  }

  if (Array.isArray(input)) {
    if (input.length === 0) {
      throw new LiveInputError('Cannot send an empty list.');
    }

    if (input.every(isFunctionResponseLike)) {
      return 'tool_response';
    }

    if (input.every(isMediaItem)) {
      return 'realtime_input';
    }

    return 'client_content';
  }

  if (!isDict(input)) {
    throw new LiveInputError(`Unsupported input type: ${describeValue(input)}.`);
  }

  if (isClientContentLike(input)) {
    return 'client_content';
  }

  if (isRealtimeInputLike(input) || isBlobLike(input)) {
    return 'realtime_input';
  }

  if (isToolResponseLike(input) || isFunctionResponseLike(input)) {
    return 'tool_response';
  }

  if (hasAnyKey(input, PART_KEYS)) {
    return 'client_content';
  }

  throw new LiveInputError(`Unsupported input type: ${describeValue(input)}.`);
};

export const buildClientMessage = (input: unknown, options: BuildMessageOptions = {}): LiveClientMessage => {
  const kind = classifyInput(input);

  if (kind === 'realtime_input') {
    return normalizeRealtimeInput(input, options);
  }

  if (kind === 'tool_response') {
    return normalizeToolResponse(input, options);
  }

  return normalizeClientContent(input, {
    ...options,
    turnComplete: options.endOfTurn ?? false
  });
};
