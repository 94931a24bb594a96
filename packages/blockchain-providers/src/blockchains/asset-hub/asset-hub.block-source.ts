import { hexToU8a } from '@polkadot/util';
import {
  BlockNotFoundError,
  ConnectionError,
  POLKADOT_ASSET_HUB,
  type AssetInfo,
  type ChainContext,
} from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';
import { TtlCache } from '@xcm-indexer/resilience';
import {
  decodeEventRecords,
  decodeExtrinsic,
  decodeRuntimeMetadata,
  storageKey,
  type DecodedExtrinsic,
  type EventRecord,
  type RuntimeMetadata,
} from '@xcm-indexer/scale-codec';
import {
  assetMetadataStorageKey,
  assetRefKey,
  decodeAssetMetadata,
  type AssetMetadataLookup,
  type BlockContents,
  type RegistryAssetRef,
} from '@xcm-indexer/xcm';
import { err, ok, type Result } from 'neverthrow';

import type { RpcClient } from '../../core/rpc/rpc-client.js';

import {
  HeaderSchema,
  HexStringSchema,
  MaybeBlockHashSchema,
  MaybeSignedBlockSchema,
  RuntimeVersionSchema,
  StorageValueSchema,
  type RuntimeVersion,
} from './asset-hub.schemas.js';
import {
  FinalizedBlockStream,
  type FinalizedBlockStreamOptions,
  type FinalizedHeadSource,
  type StopSubscription,
} from './finalized-block-stream.js';

const FINALIZED_HEADS = {
  subscribe: 'chain_subscribeFinalizedHeads',
  unsubscribe: 'chain_unsubscribeFinalizedHeads',
} as const;

export type NodeConnector = () => Promise<Result<RpcClient, ConnectionError>>;

export interface AssetHubBlockSourceOptions {
  /** Opens a fresh connection; called at start and on every reconnect */
  connect: NodeConnector;
  assetCacheTtlMs: number;
  context?: ChainContext | undefined;
}

async function fetchRuntimeMetadata(client: RpcClient): Promise<Result<RuntimeMetadata, Error>> {
  const hex = await client.request('state_getMetadata', [], HexStringSchema);
  return hex.andThen((value) => decodeRuntimeMetadata(hexToU8a(value)));
}

/**
 * Reads blocks, events and asset metadata from an Asset Hub node and decodes
 * them against the runtime metadata fetched when the connection opened.
 */
export class AssetHubBlockSource implements FinalizedHeadSource {
  private readonly logger = getLogger('AssetHubBlockSource');
  private readonly assetCache: TtlCache<AssetInfo>;

  private constructor(
    private client: RpcClient,
    private metadata: RuntimeMetadata,
    private readonly options: AssetHubBlockSourceOptions
  ) {
    this.assetCache = new TtlCache<AssetInfo>(options.assetCacheTtlMs);
  }

  static async connect(options: AssetHubBlockSourceOptions): Promise<Result<AssetHubBlockSource, Error>> {
    const client = await options.connect();
    if (client.isErr()) return err(client.error);

    const metadata = await fetchRuntimeMetadata(client.value);
    if (metadata.isErr()) {
      await client.value.close();
      return err(metadata.error);
    }
    return ok(new AssetHubBlockSource(client.value, metadata.value, options));
  }

  get context(): ChainContext {
    return this.options.context ?? POLKADOT_ASSET_HUB;
  }

  /** Runtime metadata of the current connection. */
  getMetadata(): RuntimeMetadata {
    return this.metadata;
  }

  getRuntimeVersion(): Promise<Result<RuntimeVersion, Error>> {
    return this.client.request('state_getRuntimeVersion', [], RuntimeVersionSchema);
  }

  /**
   * Block body and events at `hash`. Extrinsics that do not decode are left
   * out; the block is still returned.
   */
  async getBlock(hash: string): Promise<Result<BlockContents, Error>> {
    const [block, events] = await Promise.all([
      this.client.request('chain_getBlock', [hash], MaybeSignedBlockSchema),
      this.fetchEvents(hash),
    ]);
    if (block.isErr()) return err(block.error);
    if (block.value === null) return err(new BlockNotFoundError(hash));
    if (events.isErr()) return err(events.error);

    const { extrinsics, header } = block.value.block;
    return ok({
      events: events.value,
      extrinsics: this.decodeExtrinsics(header.number, extrinsics),
      hash,
      number: header.number,
    });
  }

  /**
   * Calls `onBlock` with every finalized block from now on, in order, until
   * `signal` aborts or `onBlock` fails with a non-connection error.
   */
  subscribeFinalized(
    onBlock: (block: BlockContents) => Promise<Result<void, Error>>,
    options: FinalizedBlockStreamOptions,
    signal?: AbortSignal
  ): Promise<Result<void, Error>> {
    const stream = new FinalizedBlockStream(this, options);
    return stream.run(async (ref) => {
      const block = await this.getBlock(ref.hash);
      if (block.isErr()) return err(block.error);
      return onBlock(block.value);
    }, signal);
  }

  async getBlockHash(number: number): Promise<Result<string, Error>> {
    const hash = await this.client.request('chain_getBlockHash', [number], MaybeBlockHashSchema);
    return hash.andThen((value) => (value === null ? err(new BlockNotFoundError(`#${number}`)) : ok(value)));
  }

  /**
   * Display metadata of registry assets as of block `at`. Assets whose
   * metadata is missing, does not decode or cannot be queried are absent from
   * the lookup. Only a lost connection fails it.
   */
  async fetchAssetMetadata(refs: readonly RegistryAssetRef[], at: string): Promise<Result<AssetMetadataLookup, Error>> {
    const results = await Promise.all(refs.map((ref) => this.fetchOneAssetMetadata(ref, at)));

    const lookup = new Map<string, AssetInfo>();
    for (const [index, result] of results.entries()) {
      if (result.isErr()) return err(result.error);
      const ref = refs[index];
      if (result.value && ref) lookup.set(assetRefKey(ref), result.value);
    }
    return ok(lookup);
  }

  async subscribeFinalizedHeads(
    onHead: (number: number) => void,
    onDisconnect: (error: ConnectionError) => void
  ): Promise<Result<StopSubscription, Error>> {
    const removeListener = this.client.onDisconnect(onDisconnect);
    const subscription = await this.client.subscribe(FINALIZED_HEADS, [], HeaderSchema, (header) =>
      onHead(header.number)
    );
    if (subscription.isErr()) {
      removeListener();
      return err(subscription.error);
    }

    this.logger.info({ subscription: subscription.value.id }, 'Subscribed to finalized heads');
    return ok(async () => {
      removeListener();
      const stopped = await subscription.value.unsubscribe();
      if (stopped.isErr()) {
        this.logger.debug({ error: stopped.error.message }, 'Unsubscribe failed');
      }
    });
  }

  /**
   * Replaces the connection and refetches runtime metadata. Cached asset
   * metadata is dropped.
   */
  async reconnect(): Promise<Result<void, Error>> {
    await this.client.close();

    const client = await this.options.connect();
    if (client.isErr()) return err(client.error);

    const metadata = await fetchRuntimeMetadata(client.value);
    if (metadata.isErr()) {
      await client.value.close();
      return err(metadata.error);
    }

    this.client = client.value;
    this.metadata = metadata.value;
    this.assetCache.clear();
    this.logger.info({ url: client.value.url }, 'Reconnected to node');
    return ok(undefined);
  }

  async close(): Promise<void> {
    this.assetCache.clear();
    await this.client.close();
  }

  private async fetchEvents(hash: string): Promise<Result<EventRecord[], Error>> {
    const key = storageKey(this.metadata, 'System', 'Events');
    if (key.isErr()) return err(key.error);

    const value = await this.client.request('state_getStorage', [key.value, hash], StorageValueSchema);
    return value.map((hex) => {
      if (hex === null) return [];
      const records = decodeEventRecords(hexToU8a(hex), this.metadata);
      if (records.isErr()) {
        this.logger.warn({ blockHash: hash, error: records.error.message }, 'Block events did not decode; skipping them');
        return [];
      }
      return records.value;
    });
  }

  private decodeExtrinsics(blockNumber: number, extrinsics: string[]): DecodedExtrinsic[] {
    const decoded: DecodedExtrinsic[] = [];
    extrinsics.forEach((hex, index) => {
      const extrinsic = decodeExtrinsic(hexToU8a(hex), this.metadata);
      if (extrinsic.isErr()) {
        this.logger.debug({ blockNumber, error: extrinsic.error.message, index }, 'Skipping undecodable extrinsic');
        return;
      }
      decoded.push(extrinsic.value);
    });
    return decoded;
  }

  private async fetchOneAssetMetadata(
    ref: RegistryAssetRef,
    at: string
  ): Promise<Result<AssetInfo | undefined, ConnectionError>> {
    const cacheKey = assetRefKey(ref);
    const cached = this.assetCache.get(cacheKey);
    if (cached) return ok(cached);

    const key = assetMetadataStorageKey(this.metadata, ref);
    if (key.isErr()) {
      this.logger.debug({ asset: cacheKey, error: key.error.message }, 'Cannot build asset metadata key');
      return ok(undefined);
    }

    const value = await this.client.request('state_getStorage', [key.value, at], StorageValueSchema);
    if (value.isErr()) {
      if (value.error instanceof ConnectionError) return err(value.error);
      this.logger.warn(
        { asset: cacheKey, blockHash: at, error: value.error.message },
        'Asset metadata query failed; treating the asset as unknown'
      );
      return ok(undefined);
    }
    if (value.value === null) {
      this.logger.debug({ asset: cacheKey }, 'No metadata stored for asset');
      return ok(undefined);
    }

    const info = decodeAssetMetadata(this.metadata, ref, hexToU8a(value.value));
    if (info.isErr()) {
      this.logger.debug({ asset: cacheKey, error: info.error.message }, 'Asset metadata did not decode');
      return ok(undefined);
    }
    this.assetCache.set(cacheKey, info.value);
    return ok(info.value);
  }
}
