import type {
  ClientContentInput,
  LiveClientMessage,
  LiveMessageKind,
  LiveSendInput,
  RealtimeInput,
  ToolResponseInput
} from '../../shared/types/live-types.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';
import { LiveSessionClosedError } from '../errors.js';
import { DEFAULT_PCM_SAMPLE_RATE } from '../lib/env.js';
import { sendJson } from '../lib/send-json.js';
import type { LiveTransport } from '../lib/ws-transport.js';
import { buildClientMessage } from './classify-input.js';
import { normalizeClientContent } from './normalize-content.js';
import { normalizeRealtimeInput } from './normalize-realtime-input.js';
import { normalizeToolResponse } from './normalize-tool-response.js';

export interface LiveSessionOptions {
  transport: LiveTransport;
  /** Vertex AI sessions accept function responses without an `id`. */
  vertexai?: boolean;
  /** Sample rate declared for `Float32Array` audio. Defaults to 16000. */
  pcmSampleRate?: number;
  logger?: Logger;
}

export interface SendClientContentOptions {
  turnComplete?: boolean;
}

const kindOf = (message: LiveClientMessage): LiveMessageKind => {
  if ('client_content' in message) {
    return 'client_content';
  }

  if ('realtime_input' in message) {
    return 'realtime_input';
  }

  return 'tool_response';
};

/**
 * Send side of a live session over an already connected transport.
 *
 * Every call normalizes its input before touching the transport and then
 * writes exactly one frame, so a rejected input never produces a partial
 * write and frames go out in call order.
 */
export class LiveSession {
  readonly vertexai: boolean;
  private readonly transport: LiveTransport;
  private readonly pcmSampleRate: number;
  private readonly log: Logger;
  private closed: boolean;

  constructor(options: LiveSessionOptions) {
    this.transport = options.transport;
    this.vertexai = options.vertexai ?? false;
    this.pcmSampleRate = options.pcmSampleRate ?? DEFAULT_PCM_SAMPLE_RATE;
    this.log = options.logger ?? createLogger('live:session');
    this.closed = false;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Sends any supported input, picking the envelope from its shape. Text and
   * content become a client turn that completes only when `endOfTurn` is set.
   */
  async send(input: LiveSendInput, endOfTurn = false): Promise<void> {
    this.assertOpen();

    await this.write(
      buildClientMessage(input, {
        endOfTurn,
        vertexai: this.vertexai,
        pcmSampleRate: this.pcmSampleRate
      })
    );
  }

  async sendClientContent(input?: ClientContentInput, options: SendClientContentOptions = {}): Promise<void> {
    this.assertOpen();

    await this.write(
      normalizeClientContent(input, {
        turnComplete: options.turnComplete ?? true,
        pcmSampleRate: this.pcmSampleRate
      })
    );
  }

  async sendRealtimeInput(input: RealtimeInput): Promise<void> {
    this.assertOpen();

    await this.write(normalizeRealtimeInput(input, { pcmSampleRate: this.pcmSampleRate }));
  }

  async sendToolResponse(input: ToolResponseInput): Promise<void> {
    this.assertOpen();

    await this.write(normalizeToolResponse(input, { vertexai: this.vertexai }));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.log.debug('Closing live session.');
    await this.transport.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new LiveSessionClosedError();
    }
  }

  private async write(message: LiveClientMessage): Promise<void> {
    const size = await sendJson(this.transport, message, this.log);
    this.log.debug(`Sent ${kindOf(message)} frame.`, { bytes: size });
  }
}
