import type { LiveClientMessage } from '../../shared/types/live-types.js';
import { LiveInputError } from '../errors.js';
import { functionResponseSchema, hasAnyKey, isDict, parseInput, toolResponseSchema } from '../lib/input-schemas.js';
import { toWireFunctionResponse } from './normalize-content.js';

export interface ToolResponseOptions {
  vertexai?: boolean;
}

export const TOOL_RESPONSE_KEYS = ['functionResponses', 'function_responses'] as const;

export const FUNCTION_RESPONSE_REQUIRES_ID =
  'Function responses must carry the `id` of the function call they answer unless the session targets Vertex AI.';

export const isToolResponseLike = (value: unknown): boolean => isDict(value) && hasAnyKey(value, TOOL_RESPONSE_KEYS);

export const isFunctionResponseLike = (value: unknown): boolean =>
  isDict(value) && typeof value.name === 'string' && value.response !== undefined && value.parts === undefined;

const collectResponses = (input: unknown): unknown[] => {
  if (Array.isArray(input)) {
    return input;
  }

  if (isToolResponseLike(input)) {
    return parseInput(toolResponseSchema, input, 'tool response').functionResponses;
  }

  return [input];
};

export const normalizeToolResponse = (input: unknown, options: ToolResponseOptions = {}): LiveClientMessage => {
  const items = collectResponses(input);

  if (items.length === 0) {
    throw new LiveInputError('Tool response requires at least one function response.');
  }

  const functionResponses = items.map((item, index) =>
    parseInput(functionResponseSchema, item, `function response at index ${index}`)
  );

  if (!options.vertexai && functionResponses.some((response) => response.id === undefined)) {
    throw new LiveInputError(FUNCTION_RESPONSE_REQUIRES_ID);
  }

  return {
    tool_response: {
      function_responses: functionResponses.map(toWireFunctionResponse)
    }
  };
};
