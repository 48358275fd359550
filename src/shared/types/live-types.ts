/**
 * Binary payload. A string is taken to be base64 already and is sent as is.
 */
export type BinaryData = Uint8Array | string;

export type RawMedia = Uint8Array | Float32Array;

export type InputDict = Record<string, unknown>;

export interface MediaBlob {
  data: BinaryData;
  mimeType: string;
}

export interface FileData {
  fileUri: string;
  mimeType?: string;
}

/**
 * A file previously uploaded to the service, referenced by URI.
 */
export interface UploadedFile {
  uri: string;
  mimeType?: string;
  name?: string;
  displayName?: string;
}

export interface FunctionCall {
  id?: string;
  name: string;
  args?: Record<string, unknown>;
}

export interface FunctionResponse {
  id?: string;
  name: string;
  response: Record<string, unknown>;
}

export interface Part {
  text?: string;
  inlineData?: MediaBlob;
  fileData?: FileData;
  functionCall?: FunctionCall;
  functionResponse?: FunctionResponse;
}

export interface Content {
  role?: string;
  parts: Array<Part | InputDict>;
}

export interface LiveClientContent {
  turns?: Array<Content | InputDict>;
  turnComplete?: boolean;
}

export interface LiveClientRealtimeInput {
  mediaChunks?: Array<MediaBlob | RawMedia | InputDict>;
  audio?: MediaBlob | RawMedia;
  video?: MediaBlob | RawMedia;
  text?: string;
  activityStart?: Record<string, never>;
  activityEnd?: Record<string, never>;
  audioStreamEnd?: boolean;
}

export interface LiveClientToolResponse {
  functionResponses: Array<FunctionResponse | InputDict>;
}

export type PartInput = string | Part | MediaBlob | UploadedFile | RawMedia | InputDict;

export type ClientContentInput = PartInput | Content | LiveClientContent | Array<PartInput | Content>;

export type RealtimeMediaInput = MediaBlob | RawMedia | InputDict;

export type RealtimeInput = RealtimeMediaInput | LiveClientRealtimeInput | RealtimeMediaInput[];

export type ToolResponseInput =
  | FunctionResponse
  | LiveClientToolResponse
  | InputDict
  | Array<FunctionResponse | InputDict>;

export type LiveSendInput = ClientContentInput | RealtimeInput | ToolResponseInput;

// Wire shapes. Casing follows the service, including `inlineData` holding `mime_type`.

export interface WireBlob {
  data: string;
  mime_type: string;
}

export interface WireFileData {
  file_uri: string;
  mime_type?: string;
}

export interface WireFunctionCall {
  id?: string;
  name: string;
  args?: Record<string, unknown>;
}

export interface WireFunctionResponse {
  id?: string;
  name: string;
  response: Record<string, unknown>;
}

export interface WirePart {
  text?: string;
  inlineData?: WireBlob;
  fileData?: WireFileData;
  functionCall?: WireFunctionCall;
  functionResponse?: WireFunctionResponse;
}

export interface WireContent {
  role?: string;
  parts: WirePart[];
}

export interface WireClientContent {
  turns?: WireContent[];
  turn_complete?: boolean;
}

export interface WireRealtimeInput {
  media_chunks?: WireBlob[];
  audio?: WireBlob;
  video?: WireBlob;
  text?: string;
  activity_start?: Record<string, never>;
  activity_end?: Record<string, never>;
  audio_stream_end?: boolean;
}

export interface WireToolResponse {
  function_responses: WireFunctionResponse[];
}

export type LiveClientMessage =
  | {
      client_content: WireClientContent;
    }
  | {
      realtime_input: WireRealtimeInput;
    }
  | {
      tool_response: WireToolResponse;
    };

export type LiveMessageKind = 'client_content' | 'realtime_input' | 'tool_response';
