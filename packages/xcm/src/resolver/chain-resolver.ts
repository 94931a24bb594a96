import { Chains, type Chain, type ChainContext } from '@xcm-indexer/core';

import type { Junction, Location, NetworkId } from '../model/location.js';
import type { AggregateOrigin } from '../model/origin.js';

function relayOf(network: NetworkId): Chain {
  switch (network.kind) {
    case 'Polkadot':
      return Chains.polkadot();
    case 'Kusama':
      return Chains.kusama();
    default:
      return Chains.unsupported();
  }
}

function parachainOf(network: NetworkId, id: number): Chain {
  switch (network.kind) {
    case 'Polkadot':
      return Chains.polkadotParachain(id);
    case 'Kusama':
      return Chains.kusamaParachain(id);
    default:
      return Chains.unsupported();
  }
}

function evmOf(chainId: bigint): Chain {
  return chainId <= BigInt(Number.MAX_SAFE_INTEGER) ? Chains.evm(Number(chainId)) : Chains.unsupported();
}

function resolveGlobal(interior: readonly Junction[]): Chain {
  const [first, second, ...rest] = interior;
  if (first?.kind !== 'GlobalConsensus' || rest.length > 0) return Chains.unsupported();
  const network = first.network;

  if (network.kind === 'Ethereum') {
    return !second || second.kind === 'AccountKey20' ? evmOf(network.chainId) : Chains.unsupported();
  }
  if (!second) return relayOf(network);
  return second.kind === 'Parachain' ? parachainOf(network, second.id) : Chains.unsupported();
}

/**
 * Maps a location, as seen from the indexed parachain, to a chain.
 *
 * | parents | interior                                  | chain                 |
 * |---------|-------------------------------------------|-----------------------|
 * | 0       | Here                                      | the local chain       |
 * | 1       | Here                                      | Polkadot              |
 * | 1       | Parachain(id)                             | PolkadotParachain(id) |
 * | 2       | GlobalConsensus(Polkadot/Kusama)          | relay                 |
 * | 2       | GlobalConsensus(Polkadot/Kusama), Parachain(id) | parachain       |
 * | 2       | GlobalConsensus(Ethereum), AccountKey20?  | Evm(chainId)          |
 *
 * Everything else is `Unsupported`.
 */
export function resolveLocation(location: Location, context: ChainContext): Chain {
  const { interior, parents } = location;
  const [first] = interior;

  switch (parents) {
    case 0:
      return interior.length === 0 ? context.localChain : Chains.unsupported();
    case 1:
      if (interior.length === 0) return Chains.polkadot();
      return interior.length === 1 && first?.kind === 'Parachain'
        ? Chains.polkadotParachain(first.id)
        : Chains.unsupported();
    case 2:
      return resolveGlobal(interior);
    default:
      return Chains.unsupported();
  }
}

export function resolveOrigin(origin: AggregateOrigin, context: ChainContext): Chain {
  switch (origin.kind) {
    case 'Here':
      return context.localChain;
    case 'Parent':
      return Chains.polkadot();
    case 'Sibling':
      return Chains.polkadotParachain(origin.paraId);
  }
}
