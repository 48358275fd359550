import { z } from 'zod';
import { LiveInputError } from '../errors.js';

export const isObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

export const isRawMedia = (value: unknown): value is Uint8Array | Float32Array => {
  return value instanceof Uint8Array || value instanceof Float32Array;
};

export const isDict = (value: unknown): value is Record<string, unknown> => {
  return isObject(value) && !isRawMedia(value);
};

export const hasAnyKey = (value: Record<string, unknown>, keys: readonly string[]): boolean => {
  return keys.some((key) => value[key] !== undefined);
};

// Dictionaries may spell keys the way the wire does; map them onto the typed names.
const renameKeys = (value: unknown, aliases: Record<string, string>): unknown => {
  if (!isDict(value)) {
    return value;
  }

  const renamed: Record<string, unknown> = {};

  for (const [key, entry] of Object.entries(value)) {
    const target = aliases[key] ?? key;

    if (target !== key && value[target] !== undefined) {
      continue;
    }

    renamed[target] = entry;
  }

  return renamed;
};

const withAliases = <T extends z.ZodTypeAny>(aliases: Record<string, string>, schema: T) =>
  z.preprocess((value) => renameKeys(value, aliases), schema);

const binaryDataSchema = z.union([z.instanceof(Uint8Array), z.string()]);

const emptyObjectSchema = z.object({}).strict();

export const blobSchema = withAliases(
  { mime_type: 'mimeType' },
  z
    .object({
      data: binaryDataSchema,
      mimeType: z.string().min(1)
    })
    .strict()
);

export const fileDataSchema = withAliases(
  { file_uri: 'fileUri', mime_type: 'mimeType' },
  z
    .object({
      fileUri: z.string().min(1),
      mimeType: z.string().optional()
    })
    .strict()
);

export const uploadedFileSchema = withAliases(
  { mime_type: 'mimeType', display_name: 'displayName' },
  z.object({
    uri: z.string().min(1),
    mimeType: z.string().optional(),
    name: z.string().optional(),
    displayName: z.string().optional()
  })
);

export const functionCallSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().min(1),
    args: z.record(z.unknown()).optional()
  })
  .strict();

export const functionResponseSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().min(1),
    response: z.record(z.unknown())
  })
  .strict();

export const partSchema = withAliases(
  {
    inline_data: 'inlineData',
    file_data: 'fileData',
    function_call: 'functionCall',
    function_response: 'functionResponse'
  },
  z
    .object({
      text: z.string().optional(),
      inlineData: blobSchema.optional(),
      fileData: fileDataSchema.optional(),
      functionCall: functionCallSchema.optional(),
      functionResponse: functionResponseSchema.optional()
    })
    .strict()
);

export const contentSchema = z
  .object({
    role: z.string().optional(),
    parts: z.array(z.unknown())
  })
  .strict();

export const clientContentSchema = withAliases(
  { turn_complete: 'turnComplete' },
  z
    .object({
      turns: z.array(z.unknown()).optional(),
      turnComplete: z.boolean().optional()
    })
    .strict()
);

export const realtimeInputSchema = withAliases(
  {
    media_chunks: 'mediaChunks',
    activity_start: 'activityStart',
    activity_end: 'activityEnd',
    audio_stream_end: 'audioStreamEnd'
  },
  z
    .object({
      mediaChunks: z.array(z.unknown()).optional(),
      audio: z.unknown().optional(),
      video: z.unknown().optional(),
      text: z.string().optional(),
      activityStart: emptyObjectSchema.optional(),
      activityEnd: emptyObjectSchema.optional(),
      audioStreamEnd: z.boolean().optional()
    })
    .strict()
);

export const toolResponseSchema = withAliases(
  { function_responses: 'functionResponses' },
  z
    .object({
      functionResponses: z.array(z.unknown())
    })
    .strict()
);

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`).join('; ');

export const parseInput = <T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> => {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new LiveInputError(`Invalid ${label}: ${formatIssues(result.error)}`, { cause: result.error });
  }

  return result.data;
};
