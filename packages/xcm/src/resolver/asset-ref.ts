import { chainEquals, type Chain, type ChainContext } from '@xcm-indexer/core';

import { locationKey, type Location } from '../model/location.js';

import { resolveLocation } from './chain-resolver.js';

const U32_MAX = 0xffff_ffffn;

/**
 * On-chain identity of an asset, before its metadata is known.
 */
export type AssetRef =
  | { readonly kind: 'native' }
  | { readonly kind: 'pallet'; readonly id: number }
  | { readonly kind: 'foreign'; readonly location: Location };

export type RegistryAssetRef = Exclude<AssetRef, { kind: 'native' }>;

export const AssetRefs = {
  foreign: (location: Location): RegistryAssetRef => Object.freeze({ kind: 'foreign', location }),
  native: (): AssetRef => Object.freeze({ kind: 'native' }),
  pallet: (id: number): RegistryAssetRef => Object.freeze({ id, kind: 'pallet' }),
} as const;

export function assetRefKey(ref: AssetRef): string {
  switch (ref.kind) {
    case 'native':
      return 'native';
    case 'pallet':
      return `pallet:${ref.id}`;
    case 'foreign':
      return `foreign:${locationKey(ref.location)}`;
  }
}

export function assetRefEquals(a: AssetRef, b: AssetRef): boolean {
  return assetRefKey(a) === assetRefKey(b);
}

/**
 * Identifies an asset from its location relative to the indexed chain:
 * `(1, Here)` is the relay token, `(0, PalletInstance(assets), GeneralIndex(id))`
 * a local `pallet_assets` asset, and anything else above the local chain a
 * `ForeignAssets` entry.
 */
export function identifyAsset(location: Location, context: ChainContext): AssetRef | undefined {
  const { interior, parents } = location;

  if (parents === 1 && interior.length === 0) {
    return AssetRefs.native();
  }

  if (parents === 0) {
    const [pallet, index] = interior;
    if (
      interior.length === 2 &&
      pallet?.kind === 'PalletInstance' &&
      pallet.index === context.assetsPalletInstance &&
      index?.kind === 'GeneralIndex' &&
      index.index <= U32_MAX
    ) {
      return AssetRefs.pallet(Number(index.index));
    }
    return undefined;
  }

  return AssetRefs.foreign(location);
}

/**
 * The location truncated after its last `Parachain` or `GlobalConsensus`
 * junction, i.e. the chain that issues the asset.
 */
export function chainPrefix(location: Location): Location {
  let end = 0;
  location.interior.forEach((junction, i) => {
    if (junction.kind === 'Parachain' || junction.kind === 'GlobalConsensus') {
      end = i + 1;
    }
  });
  return { interior: location.interior.slice(0, end), parents: location.parents };
}

/**
 * Chain holding the reserve of an asset. The indexed chain is the reserve of
 * the relay token for its siblings and of its own `pallet_assets` assets.
 */
export function reserveChainOf(ref: AssetRef, context: ChainContext): Chain {
  switch (ref.kind) {
    case 'native':
    case 'pallet':
      return context.localChain;
    case 'foreign':
      return resolveLocation(chainPrefix(ref.location), context);
  }
}

/**
 * Whether `counterpart` and the indexed chain teleport `ref` between each
 * other: the relay token with the relay chain, and a sibling's own token
 * with that sibling.
 */
export function isTeleportTrusted(ref: AssetRef, counterpart: Chain, context: ChainContext): boolean {
  switch (ref.kind) {
    case 'native':
      return counterpart.kind === 'Polkadot';
    case 'pallet':
      return false;
    case 'foreign': {
      const reserve = reserveChainOf(ref, context);
      return (
        reserve.kind === 'PolkadotParachain' &&
        !chainEquals(reserve, context.localChain) &&
        chainEquals(reserve, counterpart)
      );
    }
  }
}
