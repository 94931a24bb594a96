import {
  createReceivedTransfer,
  createSentTransfer,
  POLKADOT_ASSET_HUB,
  type ChainContext,
  type Transfer,
} from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';
import type { DecodedExtrinsic, EventRecord } from '@xcm-indexer/scale-codec';
import { ok, type Result } from 'neverthrow';

import { correlateIncoming } from '../incoming/correlator.js';
import type { TransferIntent } from '../model/intent.js';
import { interpretExtrinsics } from '../outgoing/interpreter.js';
import { assetRefKey, type RegistryAssetRef } from '../resolver/asset-ref.js';
import { resolveAsset, type AssetMetadataLookup } from '../resolver/asset-resolver.js';

const logger = getLogger('BlockPipeline');

/**
 * A block with its events and the extrinsics that decoded.
 */
export interface BlockContents {
  number: number;
  hash: string;
  events: EventRecord[];
  extrinsics: DecodedExtrinsic[];
}

/**
 * Fetches metadata for registry assets as of the block being processed.
 * Assets without metadata are simply absent from the result.
 */
export type AssetMetadataFetcher = (refs: RegistryAssetRef[]) => Promise<Result<AssetMetadataLookup, Error>>;

/**
 * Received intents (event order) followed by sent intents (extrinsic order).
 */
export function detectIntents(block: Pick<BlockContents, 'events' | 'extrinsics'>, context: ChainContext): TransferIntent[] {
  return [...correlateIncoming(block.events, context), ...interpretExtrinsics(block.extrinsics, context)];
}

/**
 * Distinct registry assets referenced by `intents`, in first-seen order.
 */
export function collectRegistryAssets(intents: readonly TransferIntent[]): RegistryAssetRef[] {
  const seen = new Map<string, RegistryAssetRef>();
  for (const { asset } of intents) {
    if (asset.kind !== 'native' && !seen.has(assetRefKey(asset))) {
      seen.set(assetRefKey(asset), asset);
    }
  }
  return [...seen.values()];
}

/**
 * Turns intents into transfers, dropping those whose asset is unresolvable.
 */
export function projectIntents(
  blockNumber: number,
  intents: readonly TransferIntent[],
  lookup: AssetMetadataLookup,
  context: ChainContext
): Transfer[] {
  const transfers: Transfer[] = [];
  for (const intent of intents) {
    const resolved = resolveAsset(intent.asset, intent.rawAmount, lookup, context);
    if (!resolved) {
      logger.debug({ asset: assetRefKey(intent.asset), blockNumber }, 'Dropping transfer of an unresolvable asset');
      continue;
    }

    const common = {
      amount: resolved.amount,
      asset: resolved.asset.name,
      beneficiary: intent.beneficiary,
      blockNumber,
      transferType: intent.transferType,
    };
    transfers.push(
      intent.kind === 'received'
        ? createReceivedTransfer({ ...common, originChain: intent.originChain })
        : createSentTransfer({ ...common, destinationChain: intent.destinationChain, sender: intent.sender })
    );
  }
  return transfers;
}

/**
 * Transfers of one block. Only the asset metadata fetch can fail; everything
 * that does not decode or resolve is dropped.
 */
export async function extractTransfers(
  block: BlockContents,
  fetchAssetMetadata: AssetMetadataFetcher,
  context: ChainContext = POLKADOT_ASSET_HUB
): Promise<Result<Transfer[], Error>> {
  const intents = detectIntents(block, context);
  const refs = collectRegistryAssets(intents);

  const lookup = refs.length > 0 ? await fetchAssetMetadata(refs) : ok<AssetMetadataLookup, Error>(new Map());

  return lookup.map((assets) => {
    const transfers = projectIntents(block.number, intents, assets, context);
    logger.debug(
      { blockNumber: block.number, intents: intents.length, transfers: transfers.length },
      'Processed block'
    );
    return transfers;
  });
}
