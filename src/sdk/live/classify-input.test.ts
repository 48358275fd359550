import { describe, expect, it } from 'vitest';
import { LiveInputError } from '../errors.js';
import { jpegBytes } from '../test-utils/fake-transport.js';
import { buildClientMessage, classifyInput } from './classify-input.js';

describe('classifyInput', () => {
  it.each([
    ['text', 'hello'],
    ['a part', { text: 'hello' }],
    ['a content', { parts: [{ text: 'hello' }] }],
    ['an uploaded file', { uri: 'files/abc' }],
    ['a client content envelope', { turn_complete: true }],
    ['a mixed list', ['hello', jpegBytes]]
  ])('routes %s to client_content', (_label, input) => {
    expect(classifyInput(input)).toBe('client_content');
  });

  it.each([
    ['raw bytes', jpegBytes],
    ['float samples', new Float32Array(2)],
    ['a blob', { data: 'AAAA', mime_type: 'audio/pcm' }],
    ['a realtime envelope', { mediaChunks: [] }],
    ['an activity marker', { activityStart: {} }],
    ['a list of media', [jpegBytes, { data: 'AAAA', mimeType: 'image/png' }]]
  ])('routes %s to realtime_input', (_label, input) => {
    expect(classifyInput(input)).toBe('realtime_input');
  });

  it.each([
    ['a function response', { id: '1', name: 'f', response: {} }],
    ['a tool envelope', { functionResponses: [] }],
    ['a list of function responses', [{ id: '1', name: 'f', response: {} }]]
  ])('routes %s to tool_response', (_label, input) => {
    expect(classifyInput(input)).toBe('tool_response');
  });

  it('rejects values with no envelope', () => {
    expect(() => classifyInput(42)).toThrow('Unsupported input type: number.');
    expect(() => classifyInput(null)).toThrow('Unsupported input type: null.');
    expect(() => classifyInput([])).toThrow(LiveInputError);
    expect(() => classifyInput({ foo: 1 })).toThrow('Unsupported input type: object.');
  });
});

describe('buildClientMessage', () => {
  it('maps endOfTurn onto turn_complete', () => {
    expect(buildClientMessage('hi', { endOfTurn: true })).toEqual({
      client_content: { turns: [{ role: 'user', parts: [{ text: 'hi' }] }], turn_complete: true }
    });
    expect(buildClientMessage('hi')).toEqual({
      client_content: { turns: [{ role: 'user', parts: [{ text: 'hi' }] }], turn_complete: false }
    });
  });
});
