import { scaleAmount, type AssetInfo, type ChainContext } from '@xcm-indexer/core';
import type { Decimal } from 'decimal.js';

import { assetRefKey, type AssetRef } from './asset-ref.js';

/**
 * Asset metadata fetched for one block, keyed by `assetRefKey`.
 */
export type AssetMetadataLookup = ReadonlyMap<string, AssetInfo>;

export interface ResolvedAsset {
  asset: AssetInfo;
  amount: Decimal;
}

export function nativeAssetInfo(context: ChainContext): AssetInfo {
  return { decimals: context.nativeDecimals, name: context.nativeSymbol };
}

/**
 * Resolves an asset and scales its raw amount. Registry assets missing from
 * `lookup` are unresolvable.
 */
export function resolveAsset(
  ref: AssetRef,
  rawAmount: bigint,
  lookup: AssetMetadataLookup,
  context: ChainContext
): ResolvedAsset | undefined {
  const asset = ref.kind === 'native' ? nativeAssetInfo(context) : lookup.get(assetRefKey(ref));
  if (!asset) return undefined;
  return { amount: scaleAmount(rawAmount, asset.decimals), asset };
}
