import { connectAssetHub, type AssetHubBlockSource } from '@xcm-indexer/blockchain-providers';
import { FakeAssetHubNode, fakeBlockHash } from '@xcm-indexer/blockchain-providers/testing';
import { Chains } from '@xcm-indexer/core';
import { AssetRefs, assetMetadataStorageKey } from '@xcm-indexer/xcm';
import { buildAssetHubTestRuntime, encodeAssetMetadata, encodeEvents, events, origins } from '@xcm-indexer/xcm/testing';
import { beforeEach, describe, expect, it } from 'vitest';

import { GetTransfersAtHandler } from './get-transfers-at-handler.js';

const runtime = buildAssetHubTestRuntime();
const alice = new Uint8Array(32).fill(1);

describe('GetTransfersAtHandler', () => {
  let node: FakeAssetHubNode;
  let source: AssetHubBlockSource;

  beforeEach(async () => {
    node = FakeAssetHubNode.forMetadata(runtime.metadata);
    node.setStorage(
      assetMetadataStorageKey(runtime.metadata, AssetRefs.pallet(1984))._unsafeUnwrap(),
      encodeAssetMetadata(runtime, { decimals: 6, name: 'Tether USD', symbol: 'USDT' })
    );
    source = (
      await connectAssetHub({
        assetCacheTtlMs: 60_000,
        createTransport: node.createTransport,
        rpcTimeoutMs: 1_000,
        rpcUrl: 'ws://fake-node',
      })
    )._unsafeUnwrap();
  });

  it('returns the transfers of the block', async () => {
    const blockHash = node.addBlock({
      events: encodeEvents(runtime, [
        events.assetsIssued(1984, alice, 2_500_000n),
        events.messageProcessed(origins.sibling(2034), true),
      ]),
      number: 500,
    });

    const transfers = (await new GetTransfersAtHandler(source).execute({ blockHash }))._unsafeUnwrap();

    expect(transfers).toHaveLength(1);
    expect(transfers[0]).toMatchObject({
      asset: 'Tether USD',
      blockNumber: 500,
      kind: 'received',
      originChain: Chains.polkadotParachain(2034),
    });
    expect(transfers[0]?.amount.toString()).toBe('2.5');
  });

  it('returns an empty list for a block without transfers', async () => {
    const blockHash = node.addBlock({ number: 501 });

    expect((await new GetTransfersAtHandler(source).execute({ blockHash }))._unsafeUnwrap()).toEqual([]);
  });

  it('keeps native transfers when asset metadata queries fail', async () => {
    const blockHash = node.addBlock({
      events: encodeEvents(runtime, [
        events.balancesMinted(alice, 10_000_000_000n),
        events.messageProcessed(origins.parent(), true),
        events.assetsIssued(1984, alice, 2_500_000n),
        events.messageProcessed(origins.sibling(2034), true),
      ]),
      number: 502,
    });
    node.failStorageQueries();

    const transfers = (await new GetTransfersAtHandler(source).execute({ blockHash }))._unsafeUnwrap();

    expect(transfers).toHaveLength(1);
    expect(transfers[0]).toMatchObject({ asset: 'DOT', kind: 'received', originChain: Chains.polkadot() });
  });

  it('fails with BlockNotFoundError for an unknown hash', async () => {
    const error = (await new GetTransfersAtHandler(source).execute({ blockHash: fakeBlockHash(9) }))._unsafeUnwrapErr();

    expect(error).toMatchObject({ code: 'BLOCK_NOT_FOUND' });
  });
});
