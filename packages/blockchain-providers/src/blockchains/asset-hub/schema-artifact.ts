import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { getErrorMessage, SchemaMismatchError, wrapError } from '@xcm-indexer/core';
import { computeSchemaFingerprints, type RuntimeMetadata, type SchemaItem } from '@xcm-indexer/scale-codec';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { RuntimeVersion } from './asset-hub.schemas.js';

/**
 * Runtime metadata the indexer decodes. A change to any of these means the
 * decoding logic has to be revisited.
 */
export const ASSET_HUB_SCHEMA_ITEMS: readonly SchemaItem[] = [
  { kind: 'call', name: 'limited_reserve_transfer_assets', pallet: 'PolkadotXcm' },
  { kind: 'call', name: 'limited_teleport_assets', pallet: 'PolkadotXcm' },
  { kind: 'call', name: 'transfer_assets', pallet: 'PolkadotXcm' },
  { kind: 'event', name: 'Processed', pallet: 'MessageQueue' },
  { kind: 'event', name: 'Minted', pallet: 'Balances' },
  { kind: 'event', name: 'Issued', pallet: 'Assets' },
  { kind: 'event', name: 'Issued', pallet: 'ForeignAssets' },
  { kind: 'storage', name: 'Events', pallet: 'System' },
  { kind: 'storage', name: 'Metadata', pallet: 'Assets' },
  { kind: 'storage', name: 'Metadata', pallet: 'ForeignAssets' },
  { kind: 'type', path: ['frame_system', 'Phase'] },
  { kind: 'extrinsic' },
];

const SchemaArtifactSchema = z.object({
  fingerprints: z.record(z.string(), z.string().nullable()),
  specName: z.string(),
  specVersion: z.number().int().nonnegative(),
});

export type SchemaArtifact = z.infer<typeof SchemaArtifactSchema>;

export function buildSchemaArtifact(
  metadata: RuntimeMetadata,
  version: RuntimeVersion,
  items: readonly SchemaItem[] = ASSET_HUB_SCHEMA_ITEMS
): SchemaArtifact {
  return {
    fingerprints: computeSchemaFingerprints(metadata, items),
    specName: version.specName,
    specVersion: version.specVersion,
  };
}

/**
 * Keys whose fingerprint differs between the artifact and `metadata`,
 * including keys present on one side only. Sorted.
 */
export function diffSchema(
  artifact: SchemaArtifact,
  metadata: RuntimeMetadata,
  items: readonly SchemaItem[] = ASSET_HUB_SCHEMA_ITEMS
): string[] {
  const live = computeSchemaFingerprints(metadata, items);
  const keys = new Set([...Object.keys(artifact.fingerprints), ...Object.keys(live)]);
  return [...keys].filter((key) => artifact.fingerprints[key] !== live[key]).sort();
}

export function verifySchema(
  artifact: SchemaArtifact,
  metadata: RuntimeMetadata,
  items: readonly SchemaItem[] = ASSET_HUB_SCHEMA_ITEMS
): Result<void, SchemaMismatchError> {
  const mismatched = diffSchema(artifact, metadata, items);
  if (mismatched.length === 0) return ok(undefined);
  return err(
    new SchemaMismatchError(
      `Node runtime differs from the stored schema (spec ${artifact.specName} v${artifact.specVersion}) in: ${mismatched.join(', ')}`,
      mismatched
    )
  );
}

/**
 * A missing or unreadable artifact is reported as a SchemaMismatchError so
 * callers treat it like a stale one.
 */
export async function readSchemaArtifact(filePath: string): Promise<Result<SchemaArtifact, Error>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    return err(
      new SchemaMismatchError(`No schema artifact at ${filePath}: ${getErrorMessage(error)}`, [], { cause: error })
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(new SchemaMismatchError(`Schema artifact ${filePath} is not valid JSON`, [], { cause: error }));
  }

  const parsed = SchemaArtifactSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err(new SchemaMismatchError(`Schema artifact ${filePath} is malformed: ${issues}`, []));
  }
  return ok(parsed.data);
}

export async function writeSchemaArtifact(filePath: string, artifact: SchemaArtifact): Promise<Result<void, Error>> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(artifact, undefined, 2)}\n`, 'utf8');
    return ok(undefined);
  } catch (error) {
    return wrapError(error, `Failed to write schema artifact ${filePath}`);
  }
}
