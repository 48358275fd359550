import { WebSocket as WsSocket } from 'ws';
import type { ClientOptions } from 'ws';
import { LiveTransportError } from '../errors.js';

/**
 * Outbound half of a live connection. One `send` call writes one text frame.
 */
export interface LiveTransport {
  send: (text: string) => Promise<void>;
  close: () => Promise<void>;
}

const describeState = (state: number): string => {
  switch (state) {
    case WsSocket.CONNECTING:
      return 'connecting';
    case WsSocket.CLOSING:
      return 'closing';
    case WsSocket.CLOSED:
      return 'closed';
    default:
      return 'open';
  }
};

export const createWsTransport = (socket: WsSocket): LiveTransport => {
  // Socket errors surface as the cause of the next failed send.
  let lastError: Error | undefined;

  socket.on('error', (error: Error) => {
    lastError = error;
  });

  return {
    send: (text: string) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WsSocket.OPEN) {
          reject(
            new LiveTransportError(`WebSocket is ${describeState(socket.readyState)}, cannot send.`, {
              cause: lastError
            })
          );
          return;
        }

        socket.send(text, (error?: Error) => {
          if (error) {
            reject(new LiveTransportError('WebSocket send failed.', { cause: error }));
            return;
          }

          resolve();
        });
      }),
    close: () =>
      new Promise<void>((resolve) => {
        if (socket.readyState === WsSocket.CLOSED) {
          resolve();
          return;
        }

        socket.once('close', () => resolve());

        if (socket.readyState !== WsSocket.CLOSING) {
          socket.close();
        }
      })
  };
};

export const openWsTransport = (url: string, options?: ClientOptions): Promise<LiveTransport> =>
  new Promise<LiveTransport>((resolve, reject) => {
    const socket = new WsSocket(url, options);

    const onError = (error: Error): void => {
      reject(new LiveTransportError(`Could not open WebSocket to ${url}.`, { cause: error }));
    };

    socket.once('error', onError);
    socket.once('open', () => {
      socket.off('error', onError);
      resolve(createWsTransport(socket));
    });
  });
