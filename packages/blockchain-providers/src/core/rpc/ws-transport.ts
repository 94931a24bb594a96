import { ConnectionError } from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';
import { err, ok, type Result } from 'neverthrow';
import WebSocket from 'ws';

import type { RpcTransport } from './transport.js';

const logger = getLogger('WsTransport');

const CLOSE_GRACE_MS = 2_000;

function frameToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class WsTransport implements RpcTransport {
  private socket: WebSocket | undefined;
  private readonly messageListeners: ((frame: string) => void)[] = [];
  private readonly closeListeners: ((reason: string) => void)[] = [];

  constructor(
    readonly url: string,
    private readonly handshakeTimeoutMs = 30_000
  ) {}

  open(): Promise<Result<void, ConnectionError>> {
    return new Promise((resolve) => {
      const socket = new WebSocket(this.url, { handshakeTimeout: this.handshakeTimeoutMs });

      const onOpenError = (error: Error) => {
        resolve(
          err(new ConnectionError('CONNECTION_FAILED', `Could not connect to ${this.url}: ${error.message}`, { cause: error }))
        );
      };
      socket.once('error', onOpenError);

      socket.once('open', () => {
        socket.off('error', onOpenError);
        socket.on('error', (error) => logger.warn({ error: error.message, url: this.url }, 'WebSocket error'));
        socket.on('message', (data) => {
          const frame = frameToString(data);
          for (const listener of this.messageListeners) listener(frame);
        });
        socket.once('close', (code, reason) => {
          this.socket = undefined;
          const text = reason.length > 0 ? `code ${code}: ${reason.toString('utf8')}` : `code ${code}`;
          for (const listener of this.closeListeners) listener(text);
        });
        this.socket = socket;
        logger.debug({ url: this.url }, 'WebSocket connected');
        resolve(ok(undefined));
      });
    });
  }

  send(frame: string): Result<void, ConnectionError> {
    if (!this.socket || this.socket.readyState !== WebSocket.OPEN) {
      return err(new ConnectionError('CONNECTION_CLOSED', `Connection to ${this.url} is not open`));
    }
    this.socket.send(frame);
    return ok(undefined);
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) return Promise.resolve();

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, CLOSE_GRACE_MS);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.close(1000);
    });
  }

  onMessage(listener: (frame: string) => void): void {
    this.messageListeners.push(listener);
  }

  onClose(listener: (reason: string) => void): void {
    this.closeListeners.push(listener);
  }
}
