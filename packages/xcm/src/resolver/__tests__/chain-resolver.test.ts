import { Chains, POLKADOT_ASSET_HUB } from '@xcm-indexer/core';
import { describe, expect, it } from 'vitest';

import type { Junction, Location } from '../../model/location.js';
import { resolveLocation, resolveOrigin } from '../chain-resolver.js';

const ctx = POLKADOT_ASSET_HUB;
const key20 = new Uint8Array(20).fill(1);

const loc = (parents: number, ...interior: Junction[]): Location => ({ interior, parents });
const parachain = (id: number): Junction => ({ id, kind: 'Parachain' });
const polkadot: Junction = { kind: 'GlobalConsensus', network: { kind: 'Polkadot' } };
const kusama: Junction = { kind: 'GlobalConsensus', network: { kind: 'Kusama' } };
const ethereum = (chainId: bigint): Junction => ({ kind: 'GlobalConsensus', network: { chainId, kind: 'Ethereum' } });
const accountKey20: Junction = { key: key20, kind: 'AccountKey20', network: undefined };

describe('resolveLocation', () => {
  it.each([
    ['(0, Here)', loc(0), Chains.polkadotParachain(1000)],
    ['(1, Here)', loc(1), Chains.polkadot()],
    ['(1, Parachain)', loc(1, parachain(2034)), Chains.polkadotParachain(2034)],
    ['(2, Polkadot)', loc(2, polkadot), Chains.polkadot()],
    ['(2, Kusama)', loc(2, kusama), Chains.kusama()],
    ['(2, Polkadot, Parachain)', loc(2, polkadot, parachain(2004)), Chains.polkadotParachain(2004)],
    ['(2, Kusama, Parachain)', loc(2, kusama, parachain(1000)), Chains.kusamaParachain(1000)],
    ['(2, Ethereum)', loc(2, ethereum(1n)), Chains.evm(1)],
    ['(2, Ethereum, AccountKey20)', loc(2, ethereum(1n), accountKey20), Chains.evm(1)],
  ])('resolves %s', (_label, location, expected) => {
    expect(resolveLocation(location, ctx)).toEqual(expected);
  });

  it.each([
    ['(0, Parachain)', loc(0, parachain(5))],
    ['(1, Parachain, Parachain)', loc(1, parachain(5), parachain(6))],
    ['(1, AccountKey20)', loc(1, accountKey20)],
    ['(2, Here)', loc(2)],
    ['(2, Ethereum, Parachain)', loc(2, ethereum(1n), parachain(1))],
    ['(2, Polkadot, Parachain, Parachain)', loc(2, polkadot, parachain(1), parachain(2))],
    ['(2, Westend)', loc(2, { kind: 'GlobalConsensus', network: { kind: 'Other', name: 'Westend', raw: { kind: 'bool', value: true } } })],
    ['(2, Ethereum beyond safe integers)', loc(2, ethereum(2n ** 60n))],
    ['(3, Here)', loc(3)],
  ])('maps %s to Unsupported', (_label, location) => {
    expect(resolveLocation(location, ctx)).toEqual(Chains.unsupported());
  });
});

describe('resolveOrigin', () => {
  it('maps message queue origins to chains', () => {
    expect(resolveOrigin({ kind: 'Here' }, ctx)).toEqual(Chains.polkadotParachain(1000));
    expect(resolveOrigin({ kind: 'Parent' }, ctx)).toEqual(Chains.polkadot());
    expect(resolveOrigin({ kind: 'Sibling', paraId: 1002 }, ctx)).toEqual(Chains.polkadotParachain(1002));
  });
});
