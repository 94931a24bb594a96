import type { ConnectionError } from '@xcm-indexer/core';
import type { Result } from 'neverthrow';

/**
 * Message-oriented duplex channel to a node. Frames are JSON-RPC text.
 */
export interface RpcTransport {
  readonly url: string;
  open(): Promise<Result<void, ConnectionError>>;
  send(frame: string): Result<void, ConnectionError>;
  close(): Promise<void>;
  onMessage(listener: (frame: string) => void): void;
  /** Called once when the channel closes, for whatever reason. */
  onClose(listener: (reason: string) => void): void;
}

export type TransportFactory = (url: string) => RpcTransport;
