import { u8aConcat, u8aToHex } from '@polkadot/util';
import { blake2AsU8a, xxhashAsU8a } from '@polkadot/util-crypto';
import { err, ok, type Result } from 'neverthrow';

import { encode } from '../codec/scale.js';
import { EncodeError } from '../codec/errors.js';
import type { DecodedValue, TypeId } from '../codec/types.js';

import { findStorageEntry, type RuntimeMetadata, type StorageHasher } from './runtime-metadata.js';

export function hashStorageKey(hasher: StorageHasher, data: Uint8Array): Uint8Array {
  switch (hasher) {
    case 'Blake2_128':
      return blake2AsU8a(data, 128);
    case 'Blake2_256':
      return blake2AsU8a(data, 256);
    case 'Blake2_128Concat':
      return u8aConcat(blake2AsU8a(data, 128), data);
    case 'Twox128':
      return xxhashAsU8a(data, 128);
    case 'Twox256':
      return xxhashAsU8a(data, 256);
    case 'Twox64Concat':
      return u8aConcat(xxhashAsU8a(data, 64), data);
    case 'Identity':
      return data;
  }
}

/** twox128(pallet prefix) ++ twox128(entry name) */
export function storagePrefix(palletPrefix: string, entryName: string): Uint8Array {
  return u8aConcat(xxhashAsU8a(palletPrefix, 128), xxhashAsU8a(entryName, 128));
}

/**
 * Full storage key for `pallet.entry`, encoding each key value against the
 * type the entry declares for it.
 */
export function storageKey(
  metadata: RuntimeMetadata,
  pallet: string,
  entryName: string,
  keys: DecodedValue[] = []
): Result<`0x${string}`, EncodeError> {
  const palletStorage = metadata.pallets.find((p) => p.name === pallet)?.storage;
  const entry = findStorageEntry(metadata, pallet, entryName);
  if (!palletStorage || !entry) {
    return err(new EncodeError('UNKNOWN_TYPE', `Storage entry ${pallet}.${entryName} is not in the metadata`));
  }

  const prefix = storagePrefix(palletStorage.prefix, entry.name);
  if (entry.type.kind === 'plain') {
    return keys.length === 0
      ? ok(u8aToHex(prefix))
      : err(new EncodeError('SHAPE_MISMATCH', `${pallet}.${entryName} takes no keys, got ${keys.length}`));
  }

  const { hashers } = entry.type;
  let keyTypes: TypeId[] = [entry.type.key];
  if (hashers.length > 1) {
    const keyDef = metadata.types.get(entry.type.key)?.def;
    if (!keyDef?.isTuple || keyDef.asTuple.length !== hashers.length) {
      return err(new EncodeError('SHAPE_MISMATCH', `${pallet}.${entryName} key type does not match its hashers`));
    }
    keyTypes = keyDef.asTuple.map((t) => t.toNumber());
  }
  if (keys.length !== keyTypes.length) {
    return err(
      new EncodeError('SHAPE_MISMATCH', `${pallet}.${entryName} takes ${keyTypes.length} keys, got ${keys.length}`)
    );
  }

  const parts: Uint8Array[] = [prefix];
  for (const [i, key] of keys.entries()) {
    const keyType = keyTypes[i];
    const hasher = hashers[i];
    if (keyType === undefined || hasher === undefined) break;
    const encoded = encode(key, keyType, metadata.registry);
    if (encoded.isErr()) return err(encoded.error);
    parts.push(hashStorageKey(hasher, encoded.value));
  }
  return ok(u8aToHex(u8aConcat(...parts)));
}
