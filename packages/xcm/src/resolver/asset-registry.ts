import type { AssetInfo } from '@xcm-indexer/core';
import {
  asBytes,
  asNumber,
  decodeExact,
  DecodeError,
  findStorageEntry,
  getField,
  intValue,
  storageKey,
  type EncodeError,
  type RuntimeMetadata,
} from '@xcm-indexer/scale-codec';
import { err, ok, type Result } from 'neverthrow';

import type { RegistryAssetRef } from './asset-ref.js';
import { toStorageLocationValue } from './normalize.js';

/** Storage entries holding asset display metadata. */
export const ASSET_METADATA_STORAGE = {
  foreign: { entry: 'Metadata', pallet: 'ForeignAssets' },
  pallet: { entry: 'Metadata', pallet: 'Assets' },
} as const;

const textDecoder = new TextDecoder('utf-8');

export function assetMetadataStorageKey(
  metadata: RuntimeMetadata,
  ref: RegistryAssetRef
): Result<`0x${string}`, EncodeError> {
  const { entry, pallet } = ASSET_METADATA_STORAGE[ref.kind];
  const key = ref.kind === 'pallet' ? intValue(ref.id) : toStorageLocationValue(ref.location);
  return storageKey(metadata, pallet, entry, [key]);
}

/**
 * Decodes an `AssetMetadata { name, decimals, .. }` storage value.
 */
export function decodeAssetMetadata(
  metadata: RuntimeMetadata,
  ref: RegistryAssetRef,
  bytes: Uint8Array
): Result<AssetInfo, DecodeError> {
  const { entry, pallet } = ASSET_METADATA_STORAGE[ref.kind];
  const valueType = findStorageEntry(metadata, pallet, entry)?.type.value;
  if (valueType === undefined) {
    return err(new DecodeError('UNKNOWN_TYPE', `Storage entry ${pallet}.${entry} is not in the runtime metadata`));
  }

  return decodeExact(bytes, valueType, metadata.registry).andThen((value) => {
    const name = asBytes(getField(value, 'name'));
    const decimals = asNumber(getField(value, 'decimals'));
    if (!name || decimals === undefined) {
      return err(new DecodeError('INVALID_VALUE', `${pallet}.${entry} value has no name or decimals`));
    }
    return ok({ decimals, name: textDecoder.decode(name) });
  });
}
