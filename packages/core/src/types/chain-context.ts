import { Chains, type Chain } from './chain.js';

/**
 * Constants of the chain being indexed.
 */
export interface ChainContext {
  /** Parachain id of the indexed chain (Asset Hub: 1000) */
  paraId: number;

  /** The indexed chain as a transfer endpoint */
  localChain: Chain;

  /** Symbol of the relay chain's native token (DOT) */
  nativeSymbol: string;

  /** Decimals of the native token (DOT: 10) */
  nativeDecimals: number;

  /** SS58 prefix for addresses on the indexed chain (Polkadot: 0) */
  ss58Format: number;

  /** SS58 prefix for addresses on chains whose format is unknown (generic Substrate: 42) */
  genericSs58Format: number;

  /** Pallet index of `pallet_assets` inside the runtime */
  assetsPalletInstance: number;
}

export const POLKADOT_ASSET_HUB: ChainContext = Object.freeze({
  assetsPalletInstance: 50,
  genericSs58Format: 42,
  localChain: Chains.polkadotParachain(1000),
  nativeDecimals: 10,
  nativeSymbol: 'DOT',
  paraId: 1000,
  ss58Format: 0,
});
