import type {
  LiveClientMessage,
  WireContent,
  WireFileData,
  WireFunctionCall,
  WireFunctionResponse,
  WirePart
} from '../../shared/types/live-types.js';
import { LiveInputError } from '../errors.js';
import {
  clientContentSchema,
  contentSchema,
  hasAnyKey,
  isDict,
  isRawMedia,
  parseInput,
  partSchema,
  uploadedFileSchema
} from '../lib/input-schemas.js';
import { isBlobLike, normalizeBlob, toWireBlob, type MediaOptions } from './normalize-blob.js';

export interface ClientContentOptions extends MediaOptions {
  turnComplete?: boolean;
}

const EMPTY_TURNS = 'Client content requires at least one turn or part.';

export const CLIENT_CONTENT_KEYS = ['turns', 'turnComplete', 'turn_complete'] as const;

export const isContentLike = (value: unknown): boolean => isDict(value) && value.parts !== undefined;

export const isUploadedFileLike = (value: unknown): boolean => isDict(value) && typeof value.uri === 'string';

export const isClientContentLike = (value: unknown): boolean =>
  isDict(value) && hasAnyKey(value, CLIENT_CONTENT_KEYS);

const toWireFileData = (fileUri: string, mimeType: string | undefined): WireFileData =>
  mimeType === undefined ? { file_uri: fileUri } : { file_uri: fileUri, mime_type: mimeType };

const toWireFunctionCall = (call: WireFunctionCall): WireFunctionCall => {
  const wire: WireFunctionCall = { name: call.name };

  if (call.id !== undefined) {
    wire.id = call.id;
  }

  if (call.args !== undefined) {
    wire.args = call.args;
  }

  return wire;
};

export const toWireFunctionResponse = (response: WireFunctionResponse): WireFunctionResponse =>
  response.id === undefined
    ? { name: response.name, response: response.response }
    : { id: response.id, name: response.name, response: response.response };

export const normalizePart = (input: unknown, options: MediaOptions = {}): WirePart => {
  if (typeof input === 'string') {
    return { text: input };
  }

  if (isRawMedia(input) || isBlobLike(input)) {
    return { inlineData: normalizeBlob(input, options) };
  }

  if (isUploadedFileLike(input)) {
    const file = parseInput(uploadedFileSchema, input, 'file');
    return { fileData: toWireFileData(file.uri, file.mimeType) };
  }

  if (!isDict(input)) {
    throw new LiveInputError(`Unsupported part input: ${input === null ? 'null' : typeof input}.`);
  }

  const part = parseInput(partSchema, input, 'part');
  const wire: WirePart = {};

  if (part.text !== undefined) {
    wire.text = part.text;
  }

  if (part.inlineData) {
    wire.inlineData = toWireBlob(part.inlineData);
  }

  if (part.fileData) {
    wire.fileData = toWireFileData(part.fileData.fileUri, part.fileData.mimeType);
  }

  if (part.functionCall) {
    wire.functionCall = toWireFunctionCall(part.functionCall);
  }

  if (part.functionResponse) {
    wire.functionResponse = toWireFunctionResponse(part.functionResponse);
  }

  if (Object.keys(wire).length === 0) {
    throw new LiveInputError('Invalid part: no field is set.');
  }

  return wire;
};

export const normalizeContent = (input: unknown, options: MediaOptions = {}): WireContent => {
  const content = parseInput(contentSchema, input, 'content');
  const parts = content.parts.map((part) => normalizePart(part, options));

  return content.role === undefined ? { parts } : { role: content.role, parts };
};

/**
 * Turns a loose value into an ordered list of turns. Consecutive part-like
 * items share a single `user` turn; content items stay separate turns.
 */
export const normalizeTurns = (input: unknown, options: MediaOptions = {}): WireContent[] => {
  const items = Array.isArray(input) ? input : [input];

  if (items.length === 0) {
    throw new LiveInputError(EMPTY_TURNS);
  }

  const turns: WireContent[] = [];
  let pending: WireContent | null = null;

  for (const item of items) {
    if (isContentLike(item)) {
      pending = null;
      turns.push(normalizeContent(item, options));
      continue;
    }

    if (!pending) {
      pending = { role: 'user', parts: [] };
      turns.push(pending);
    }

    pending.parts.push(normalizePart(item, options));
  }

  return turns;
};

export const normalizeClientContent = (input: unknown, options: ClientContentOptions = {}): LiveClientMessage => {
  if (input === undefined) {
    return {
      client_content: options.turnComplete === undefined ? {} : { turn_complete: options.turnComplete }
    };
  }

  if (isClientContentLike(input)) {
    const envelope = parseInput(clientContentSchema, input, 'client content');

    if (envelope.turns?.length === 0) {
      throw new LiveInputError(EMPTY_TURNS);
    }

    const turnComplete = envelope.turnComplete ?? options.turnComplete;

    return {
      client_content: {
        ...(envelope.turns ? { turns: envelope.turns.map((turn) => normalizeContent(turn, options)) } : {}),
        ...(turnComplete === undefined ? {} : { turn_complete: turnComplete })
      }
    };
  }

  const turns = normalizeTurns(input, options);

  return {
    client_content: options.turnComplete === undefined ? { turns } : { turns, turn_complete: options.turnComplete }
  };
};
