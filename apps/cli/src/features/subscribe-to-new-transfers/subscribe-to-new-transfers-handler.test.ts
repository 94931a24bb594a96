import { connectAssetHub, type AssetHubBlockSource } from '@xcm-indexer/blockchain-providers';
import { FakeAssetHubNode } from '@xcm-indexer/blockchain-providers/testing';
import type { Transfer } from '@xcm-indexer/core';
import { buildAssetHubTestRuntime, encodeEvents, events, origins } from '@xcm-indexer/xcm/testing';
import { err, ok, type Result } from 'neverthrow';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { TransferSink } from '../shared/transfer-sink.js';

import { SubscribeToNewTransfersHandler } from './subscribe-to-new-transfers-handler.js';

const runtime = buildAssetHubTestRuntime();
const alice = new Uint8Array(32).fill(1);
const streamOptions = { reconnectBaseDelayMs: 1, reconnectMaxDelayMs: 4 };

class MemorySink implements TransferSink {
  readonly batches: Transfer[][] = [];
  failure: Error | undefined;

  write(transfers: readonly Transfer[]): Promise<Result<void, Error>> {
    if (this.failure) return Promise.resolve(err(this.failure));
    this.batches.push([...transfers]);
    return Promise.resolve(ok(undefined));
  }
}

describe('SubscribeToNewTransfersHandler', () => {
  let node: FakeAssetHubNode;
  let source: AssetHubBlockSource;
  let sink: MemorySink;

  beforeEach(async () => {
    node = FakeAssetHubNode.forMetadata(runtime.metadata);
    sink = new MemorySink();
    source = (
      await connectAssetHub({
        assetCacheTtlMs: 60_000,
        createTransport: node.createTransport,
        rpcTimeoutMs: 1_000,
        rpcUrl: 'ws://fake-node',
      })
    )._unsafeUnwrap();
  });

  it('writes one batch per finalized block, including empty ones', async () => {
    node.addBlock({
      events: encodeEvents(runtime, [
        events.balancesMinted(alice, 20_000_000_000n),
        events.messageProcessed(origins.parent(), true),
      ]),
      number: 30,
    });
    node.addBlock({ number: 31 });
    const controller = new AbortController();
    const handler = new SubscribeToNewTransfersHandler(source, sink, streamOptions);

    const running = handler.execute(controller.signal);
    await vi.waitFor(() => expect(node.callsTo('chain_subscribeFinalizedHeads')).toHaveLength(1));
    node.finalize(30);
    node.finalize(31);

    await vi.waitFor(() => expect(sink.batches).toHaveLength(2));
    expect(sink.batches[0]?.map((t) => [t.kind, t.asset, t.amount.toString(), t.blockNumber])).toEqual([
      ['received', 'DOT', '2', 30],
    ]);
    expect(sink.batches[1]).toEqual([]);
    expect(handler.written).toEqual({ blocks: 2, transfers: 1 });

    controller.abort();
    expect((await running).isOk()).toBe(true);
  });

  it('keeps streaming when asset metadata queries fail', async () => {
    node.addBlock({
      events: encodeEvents(runtime, [
        events.balancesMinted(alice, 10_000_000_000n),
        events.messageProcessed(origins.parent(), true),
        events.assetsIssued(1984, alice, 2_500_000n),
        events.messageProcessed(origins.sibling(2034), true),
      ]),
      number: 35,
    });
    node.failStorageQueries();
    const controller = new AbortController();
    const handler = new SubscribeToNewTransfersHandler(source, sink, streamOptions);

    const running = handler.execute(controller.signal);
    await vi.waitFor(() => expect(node.callsTo('chain_subscribeFinalizedHeads')).toHaveLength(1));
    node.finalize(35);

    await vi.waitFor(() => expect(sink.batches).toHaveLength(1));
    expect(sink.batches[0]?.map((t) => [t.kind, t.asset, t.amount.toString(), t.blockNumber])).toEqual([
      ['received', 'DOT', '1', 35],
    ]);

    controller.abort();
    expect((await running).isOk()).toBe(true);
  });

  it('stops with the error when the sink fails', async () => {
    node.addBlock({ number: 40 });
    sink.failure = new Error('disk full');
    const handler = new SubscribeToNewTransfersHandler(source, sink, streamOptions);

    const running = handler.execute();
    await vi.waitFor(() => expect(node.callsTo('chain_subscribeFinalizedHeads')).toHaveLength(1));
    node.finalize(40);

    expect((await running)._unsafeUnwrapErr().message).toBe('disk full');
    expect(handler.written).toEqual({ blocks: 0, transfers: 0 });
  });
});
