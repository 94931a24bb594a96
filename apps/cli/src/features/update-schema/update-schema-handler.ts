import {
  buildSchemaArtifact,
  diffSchema,
  readSchemaArtifact,
  writeSchemaArtifact,
  type AssetHubBlockSource,
} from '@xcm-indexer/blockchain-providers';
import { getLogger } from '@xcm-indexer/logger';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('UpdateSchemaHandler');

export interface UpdateSchemaParams {
  schemaPath: string;
}

export interface UpdateSchemaResult {
  schemaPath: string;
  specName: string;
  specVersion: number;
  /** Items whose fingerprint differs from the replaced artifact; undefined when there was none. */
  changedItems: string[] | undefined;
}

/**
 * Fingerprints the node's live runtime and stores it as the schema artifact
 * the other commands verify against.
 */
export class UpdateSchemaHandler {
  constructor(private readonly source: AssetHubBlockSource) {}

  async execute(params: UpdateSchemaParams): Promise<Result<UpdateSchemaResult, Error>> {
    const version = await this.source.getRuntimeVersion();
    if (version.isErr()) return err(version.error);

    const metadata = this.source.getMetadata();
    const previous = await readSchemaArtifact(params.schemaPath);
    if (previous.isErr()) {
      logger.debug({ error: previous.error.message }, 'No usable schema artifact to compare with');
    }
    const changedItems = previous.isOk() ? diffSchema(previous.value, metadata) : undefined;

    const artifact = buildSchemaArtifact(metadata, version.value);
    const written = await writeSchemaArtifact(params.schemaPath, artifact);
    if (written.isErr()) return err(written.error);

    logger.info({ schemaPath: params.schemaPath, specVersion: artifact.specVersion }, 'Schema artifact written');
    return ok({
      changedItems,
      schemaPath: params.schemaPath,
      specName: artifact.specName,
      specVersion: artifact.specVersion,
    });
  }
}
