import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import {
  buildSchemaArtifact,
  connectAssetHub,
  readSchemaArtifact,
  writeSchemaArtifact,
  type AssetHubBlockSource,
} from '@xcm-indexer/blockchain-providers';
import { FakeAssetHubNode } from '@xcm-indexer/blockchain-providers/testing';
import { buildAssetHubTestRuntime } from '@xcm-indexer/xcm/testing';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { UpdateSchemaHandler } from './update-schema-handler.js';

const runtime = buildAssetHubTestRuntime();

describe('UpdateSchemaHandler', () => {
  let dir: string;
  let schemaPath: string;
  let node: FakeAssetHubNode;
  let source: AssetHubBlockSource;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'xcm-indexer-update-'));
    schemaPath = path.join(dir, 'artifacts', 'asset-hub-schema.json');
    node = FakeAssetHubNode.forMetadata(runtime.metadata);
    node.runtimeVersion = { specName: 'statemint', specVersion: 1_004_000 };
    source = (
      await connectAssetHub({
        assetCacheTtlMs: 60_000,
        createTransport: node.createTransport,
        rpcTimeoutMs: 1_000,
        rpcUrl: 'ws://fake-node',
      })
    )._unsafeUnwrap();
  });

  afterEach(async () => {
    await source.close();
    await rm(dir, { force: true, recursive: true });
  });

  it('writes the fingerprints of the live runtime', async () => {
    const result = (await new UpdateSchemaHandler(source).execute({ schemaPath }))._unsafeUnwrap();

    expect(result).toEqual({ changedItems: undefined, schemaPath, specName: 'statemint', specVersion: 1_004_000 });
    expect((await readSchemaArtifact(schemaPath))._unsafeUnwrap()).toEqual(
      buildSchemaArtifact(runtime.metadata, { specName: 'statemint', specVersion: 1_004_000 })
    );
  });

  it('lists the items that changed since the replaced artifact', async () => {
    const previous = buildAssetHubTestRuntime({ foreignAssetKey: 'v3' });
    await writeSchemaArtifact(schemaPath, buildSchemaArtifact(previous.metadata, { specName: 'statemint', specVersion: 1_003_000 }));

    const result = (await new UpdateSchemaHandler(source).execute({ schemaPath }))._unsafeUnwrap();

    expect(result.changedItems).toContain('storage:ForeignAssets.Metadata');
    expect(result.changedItems).not.toContain('call:PolkadotXcm.transfer_assets');
  });

  it('reports an unchanged runtime with an empty list', async () => {
    await new UpdateSchemaHandler(source).execute({ schemaPath });

    const result = (await new UpdateSchemaHandler(source).execute({ schemaPath }))._unsafeUnwrap();

    expect(result.changedItems).toEqual([]);
  });

  it('fails without writing when the runtime version is unavailable', async () => {
    node.failMethod('state_getRuntimeVersion', { code: -32000, message: 'busy' });

    const error = (await new UpdateSchemaHandler(source).execute({ schemaPath }))._unsafeUnwrapErr();

    expect(error.message).toBe('state_getRuntimeVersion failed: busy');
    expect((await readSchemaArtifact(schemaPath)).isErr()).toBe(true);
  });
});
