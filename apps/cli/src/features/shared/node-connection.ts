import {
  type AssetHubBlockSource,
  connectAssetHub,
  readSchemaArtifact,
  verifySchema,
  type TransportFactory,
} from '@xcm-indexer/blockchain-providers';
import { ConfigurationError, getErrorMessage } from '@xcm-indexer/core';
import { getIndexerConfig, type IndexerConfig } from '@xcm-indexer/env';
import { getLogger } from '@xcm-indexer/logger';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('NodeConnection');

export interface OpenAssetHubOptions {
  /** Compare the node's runtime with the stored schema artifact before returning. */
  verifySchema: boolean;
  createTransport?: TransportFactory | undefined;
}

/**
 * Indexer settings from the environment, as a Result.
 */
export function loadIndexerConfig(): Result<IndexerConfig, ConfigurationError> {
  try {
    return ok(getIndexerConfig());
  } catch (error) {
    return err(new ConfigurationError(getErrorMessage(error), { cause: error }));
  }
}

/**
 * Connects to the configured node. With `verifySchema`, a missing or stale
 * schema artifact closes the connection and fails with a SchemaMismatchError.
 */
export async function openAssetHub(
  config: IndexerConfig,
  options: OpenAssetHubOptions
): Promise<Result<AssetHubBlockSource, Error>> {
  logger.debug({ rpcUrl: config.rpcUrl }, 'Connecting to node');
  const connected = await connectAssetHub({
    assetCacheTtlMs: config.assetCacheTtlMs,
    createTransport: options.createTransport,
    rpcTimeoutMs: config.rpcTimeoutMs,
    rpcUrl: config.rpcUrl,
  });
  if (connected.isErr()) return err(connected.error);
  const source = connected.value;

  if (!options.verifySchema) return ok(source);

  const verified = (await readSchemaArtifact(config.schemaPath)).andThen((artifact) =>
    verifySchema(artifact, source.getMetadata())
  );
  if (verified.isErr()) {
    await source.close();
    return err(verified.error);
  }

  logger.debug({ schemaPath: config.schemaPath }, 'Node runtime matches the schema artifact');
  return ok(source);
}
