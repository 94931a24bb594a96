import type { ChainContext } from '@xcm-indexer/core';
import type { Result } from 'neverthrow';

import { RpcClient } from '../../core/rpc/rpc-client.js';
import type { TransportFactory } from '../../core/rpc/transport.js';
import { WsTransport } from '../../core/rpc/ws-transport.js';

import { AssetHubBlockSource } from './asset-hub.block-source.js';

export interface AssetHubConnectionOptions {
  rpcUrl: string;
  rpcTimeoutMs: number;
  assetCacheTtlMs: number;
  context?: ChainContext | undefined;
  /** Defaults to a WebSocket transport. */
  createTransport?: TransportFactory | undefined;
}

/**
 * Opens a block source on `rpcUrl`. Every reconnect builds a new transport
 * from the same factory.
 */
export function connectAssetHub(options: AssetHubConnectionOptions): Promise<Result<AssetHubBlockSource, Error>> {
  const createTransport: TransportFactory =
    options.createTransport ?? ((url) => new WsTransport(url, options.rpcTimeoutMs));

  return AssetHubBlockSource.connect({
    assetCacheTtlMs: options.assetCacheTtlMs,
    connect: () => RpcClient.connect(createTransport(options.rpcUrl), { requestTimeoutMs: options.rpcTimeoutMs }),
    context: options.context,
  });
}
