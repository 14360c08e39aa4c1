import net from 'node:net';
import type { Logger } from '../utils/logger';

export type ExchangeOptions = {
  host: string;
  port: number;
  request: Uint8Array;
  // Bounds connection setup and each idle wait for more data, not the whole transfer.
  timeoutMs: number;
  logger?: Logger;
};

export type ExchangeResult =
  | {
      type: 'closed';
      response: Buffer;
    }
  | {
      type: 'timeout';
      response: Buffer;
    }
  | {
      type: 'error';
      stage: 'connect' | 'io';
      code?: string;
      message: string;
      response: Buffer;
    };

export type Exchange = (options: ExchangeOptions) => Promise<ExchangeResult>;

const errorCode = (error: Error): string | undefined => {
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
};

/**
 * Sends one request over a fresh TCP connection and collects every byte the
 * peer returns until it closes or goes quiet for `timeoutMs`. A quiet peer is
 * a normal ending; only connection and socket errors are reported as errors.
 */
export const exchange: Exchange = ({ host, port, request, timeoutMs, logger }) => {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let connected = false;
    let settled = false;

    const socket = net.createConnection({ host, port });
    socket.setTimeout(timeoutMs);

    const received = (): Buffer => Buffer.concat(chunks);

    const finish = (result: ExchangeResult): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      logger?.debug('exchange %s:%d finished: %s (%d bytes)', host, port, result.type, result.response.length);
      resolve(result);
    };

    socket.on('connect', () => {
      connected = true;
      logger?.debug('connected to %s:%d, writing %d bytes', host, port, request.byteLength);
      socket.write(request, (error) => {
        if (error) {
          finish({
            type: 'error',
            stage: 'io',
            code: errorCode(error),
            message: error.message,
            response: received(),
          });
        }
      });
    });

    socket.on('data', (chunk: Buffer) => {
      logger?.debug('received %d bytes', chunk.length);
      chunks.push(chunk);
    });

    socket.on('end', () => {
      finish({ type: 'closed', response: received() });
    });

    socket.on('timeout', () => {
      if (!connected) {
        finish({
          type: 'error',
          stage: 'connect',
          code: 'ETIMEDOUT',
          message: `Connection to ${host}:${port} timed out after ${timeoutMs}ms`,
          response: received(),
        });
        return;
      }
      finish({ type: 'timeout', response: received() });
    });

    socket.on('error', (error: Error) => {
      finish({
        type: 'error',
        stage: connected ? 'io' : 'connect',
        code: errorCode(error),
        message: error.message,
        response: received(),
      });
    });

    socket.on('close', () => {
      finish({ type: 'closed', response: received() });
    });
  });
};
