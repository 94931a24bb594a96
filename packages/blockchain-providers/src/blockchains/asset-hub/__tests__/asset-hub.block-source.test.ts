import { u8aToHex } from '@polkadot/util';
import { eventKey } from '@xcm-indexer/scale-codec';
import { AssetRefs, assetMetadataStorageKey, extractTransfers } from '@xcm-indexer/xcm';
import {
  addresses,
  buildAssetHubTestRuntime,
  encodeAssetMetadata,
  encodeEvents,
  encodeSignedExtrinsic,
  events,
  origins,
  remarkCall,
} from '@xcm-indexer/xcm/testing';
import { ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { FakeAssetHubNode, fakeBlockHash } from '../../../testing/fake-asset-hub-node.js';
import type { AssetHubBlockSource } from '../asset-hub.block-source.js';
import { connectAssetHub } from '../connect.js';

const runtime = buildAssetHubTestRuntime();
const metadataHex = u8aToHex(runtime.metadataBytes);
const alice = new Uint8Array(32).fill(1);
const usdtKey = assetMetadataStorageKey(runtime.metadata, AssetRefs.pallet(1984))._unsafeUnwrap();

async function setup(node = new FakeAssetHubNode(metadataHex)): Promise<{ node: FakeAssetHubNode; source: AssetHubBlockSource }> {
  const source = await connectAssetHub({
    assetCacheTtlMs: 60_000,
    createTransport: node.createTransport,
    rpcTimeoutMs: 1_000,
    rpcUrl: 'ws://fake-node',
  });
  return { node, source: source._unsafeUnwrap() };
}

function withUsdtMetadata(node: FakeAssetHubNode): FakeAssetHubNode {
  node.setStorage(usdtKey, encodeAssetMetadata(runtime, { decimals: 6, name: 'Tether USD', symbol: 'USDT' }));
  return node;
}

describe('AssetHubBlockSource', () => {
  it('decodes the runtime metadata on connect', async () => {
    const { source } = await setup();
    expect(source.getMetadata().pallets.map((p) => p.name)).toEqual(runtime.metadata.pallets.map((p) => p.name));
  });

  it('fails to connect when the node refuses the connection', async () => {
    const node = new FakeAssetHubNode(metadataHex);
    node.refuseConnections = 1;

    const result = await connectAssetHub({
      assetCacheTtlMs: 60_000,
      createTransport: node.createTransport,
      rpcTimeoutMs: 1_000,
      rpcUrl: 'ws://fake-node',
    });

    expect(result._unsafeUnwrapErr()).toMatchObject({ code: 'CONNECTION_FAILED' });
  });

  describe('getBlock', () => {
    it('returns the decoded events and extrinsics of a block', async () => {
      const { node, source } = await setup();
      const hash = node.addBlock({
        events: encodeEvents(runtime, [events.balancesMinted(alice, 5n), events.messageProcessed(origins.parent(), true)]),
        extrinsics: [encodeSignedExtrinsic(runtime, remarkCall(Uint8Array.of(1)), addresses.id(alice))],
        number: 100,
      });

      const block = (await source.getBlock(hash))._unsafeUnwrap();

      expect(block.number).toBe(100);
      expect(block.hash).toBe(hash);
      expect(block.events.map(eventKey)).toEqual(['Balances.Minted', 'MessageQueue.Processed']);
      expect(block.extrinsics.map((e) => [e.call.pallet, e.call.name, e.signed])).toEqual([['System', 'remark', true]]);
    });

    it('leaves out extrinsics that do not decode', async () => {
      const { node, source } = await setup();
      const hash = node.addBlock({
        extrinsics: [
          Uint8Array.of(0x08, 0xff, 0x00),
          encodeSignedExtrinsic(runtime, remarkCall(Uint8Array.of(2)), addresses.id(alice)),
        ],
        number: 101,
      });

      const block = (await source.getBlock(hash))._unsafeUnwrap();

      expect(block.extrinsics).toHaveLength(1);
    });

    it('treats a block without stored events as having none', async () => {
      const { node, source } = await setup();
      const hash = node.addBlock({ number: 102 });

      expect((await source.getBlock(hash))._unsafeUnwrap().events).toEqual([]);
    });

    it('reports unknown hashes as not found', async () => {
      const { source } = await setup();

      const error = (await source.getBlock(fakeBlockHash(999)))._unsafeUnwrapErr();

      expect(error).toMatchObject({ blockRef: fakeBlockHash(999), code: 'BLOCK_NOT_FOUND' });
    });
  });

  describe('getBlockHash', () => {
    it('looks up canonical hashes by number', async () => {
      const { node, source } = await setup();
      node.addBlock({ number: 7 });

      expect((await source.getBlockHash(7))._unsafeUnwrap()).toBe(fakeBlockHash(7));
      expect((await source.getBlockHash(8))._unsafeUnwrapErr()).toMatchObject({ blockRef: '#8', code: 'BLOCK_NOT_FOUND' });
    });
  });

  describe('fetchAssetMetadata', () => {
    it('returns metadata of the assets the chain knows', async () => {
      const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
      const hash = node.addBlock({ number: 1 });

      const lookup = (await source.fetchAssetMetadata([AssetRefs.pallet(1984), AssetRefs.pallet(5)], hash))._unsafeUnwrap();

      expect([...lookup.entries()]).toEqual([['pallet:1984', { decimals: 6, name: 'Tether USD' }]]);
    });

    it('queries storage at the given block', async () => {
      const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
      const hash = node.addBlock({ number: 3 });

      await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash);

      expect(node.callsTo('state_getStorage')).toEqual([{ method: 'state_getStorage', params: [usdtKey, hash] }]);
    });

    it('caches metadata it has found', async () => {
      const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
      const hash = node.addBlock({ number: 1 });

      await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash);
      await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash);

      expect(node.callsTo('state_getStorage')).toHaveLength(1);
    });

    it('skips values that do not decode', async () => {
      const { node, source } = await setup();
      node.setStorage(usdtKey, Uint8Array.of(1, 2, 3));
      const hash = node.addBlock({ number: 1 });

      expect((await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash))._unsafeUnwrap().size).toBe(0);
    });

    it('treats assets whose query fails as unknown', async () => {
      const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
      const hash = node.addBlock({ number: 1 });
      node.failStorageQueries();

      const lookup = (await source.fetchAssetMetadata([AssetRefs.pallet(1984), AssetRefs.pallet(5)], hash))._unsafeUnwrap();

      expect(lookup.size).toBe(0);
      expect(node.callsTo('state_getStorage')).toHaveLength(2);
    });

    it('does not cache assets whose query failed', async () => {
      const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
      const hash = node.addBlock({ number: 1 });
      node.failMethod('state_getStorage');
      await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash);
      node.restoreMethod('state_getStorage');

      const lookup = (await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash))._unsafeUnwrap();

      expect([...lookup.keys()]).toEqual(['pallet:1984']);
    });

    it('fails when the connection is lost', async () => {
      const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
      const hash = node.addBlock({ number: 1 });
      node.dropConnections();

      const error = (await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash))._unsafeUnwrapErr();

      expect(error).toMatchObject({ code: 'CONNECTION_CLOSED' });
    });
  });

  it('keeps the transfers it can resolve when asset metadata queries fail', async () => {
    const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
    const hash = node.addBlock({
      events: encodeEvents(runtime, [
        events.balancesMinted(alice, 10_000_000_000n),
        events.messageProcessed(origins.parent(), true),
        events.assetsIssued(1984, alice, 2_500_000n),
        events.messageProcessed(origins.sibling(2034), true),
      ]),
      number: 201,
    });
    node.failStorageQueries();

    const block = (await source.getBlock(hash))._unsafeUnwrap();
    const transfers = (await extractTransfers(block, (refs) => source.fetchAssetMetadata(refs, hash)))._unsafeUnwrap();

    expect(transfers.map((t) => [t.asset, t.amount.toString(), t.blockNumber])).toEqual([['DOT', '1', 201]]);
  });

  it('feeds blocks and asset metadata to the transfer pipeline', async () => {
    const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
    const hash = node.addBlock({
      events: encodeEvents(runtime, [
        events.assetsIssued(1984, alice, 2_500_000n),
        events.balancesMinted(alice, 10_000_000_000n),
        events.messageProcessed(origins.sibling(2034), true),
      ]),
      number: 200,
    });

    const block = (await source.getBlock(hash))._unsafeUnwrap();
    const transfers = (await extractTransfers(block, (refs) => source.fetchAssetMetadata(refs, hash)))._unsafeUnwrap();

    expect(transfers.map((t) => [t.asset, t.amount.toString(), t.blockNumber])).toEqual([
      ['Tether USD', '2.5', 200],
      ['DOT', '1', 200],
    ]);
  });

  describe('reconnect', () => {
    it('replaces a dropped connection and forgets cached metadata', async () => {
      const { node, source } = await setup(withUsdtMetadata(new FakeAssetHubNode(metadataHex)));
      const hash = node.addBlock({ number: 1 });
      await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash);

      node.dropConnections();
      expect((await source.getBlock(hash))._unsafeUnwrapErr()).toMatchObject({ code: 'CONNECTION_CLOSED' });

      expect((await source.reconnect()).isOk()).toBe(true);
      expect((await source.getBlock(hash)).isOk()).toBe(true);
      await source.fetchAssetMetadata([AssetRefs.pallet(1984)], hash);

      expect(node.transports).toHaveLength(2);
      expect(node.callsTo('state_getMetadata')).toHaveLength(2);
      expect(node.callsTo('state_getStorage').filter((r) => r.params[0] === usdtKey)).toHaveLength(2);
    });
  });

  describe('subscribeFinalizedHeads', () => {
    it('reports finalized head numbers and connection loss', async () => {
      const { node, source } = await setup();
      const onHead = vi.fn();
      const onDisconnect = vi.fn();

      const stop = (await source.subscribeFinalizedHeads(onHead, onDisconnect))._unsafeUnwrap();
      node.finalize(12);
      node.dropConnections();

      expect(onHead).toHaveBeenCalledWith(12);
      expect(onDisconnect).toHaveBeenCalledTimes(1);
      await stop();
    });
  });

  describe('subscribeFinalized', () => {
    it('hands every finalized block to the callback in order', async () => {
      const { node, source } = await setup();
      node.addBlock({ events: encodeEvents(runtime, [events.balancesMinted(alice, 1n)]), number: 20 });
      node.addBlock({ number: 21 });
      node.addBlock({ number: 22 });
      const seen: [number, number][] = [];
      const controller = new AbortController();

      const running = source.subscribeFinalized(
        (block) => {
          seen.push([block.number, block.events.length]);
          return Promise.resolve(ok(undefined));
        },
        { reconnectBaseDelayMs: 1, reconnectMaxDelayMs: 4 },
        controller.signal
      );
      await vi.waitFor(() => expect(node.callsTo('chain_subscribeFinalizedHeads')).toHaveLength(1));
      node.finalize(20);
      node.finalize(22);

      await vi.waitFor(() =>
        expect(seen).toEqual([
          [20, 1],
          [21, 0],
          [22, 0],
        ])
      );
      controller.abort();
      expect((await running).isOk()).toBe(true);
    });
  });
});
