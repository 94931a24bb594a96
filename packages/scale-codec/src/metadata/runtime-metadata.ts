import { Metadata, TypeRegistry } from '@polkadot/types';
import type { MetadataLatest, PalletMetadataLatest, Si1Type, StorageEntryMetadataLatest } from '@polkadot/types/interfaces';
import { err, type Result } from 'neverthrow';

import { DecodeError } from '../codec/errors.js';
import { tryDecode } from '../codec/scale.js';
import type { TypeId } from '../codec/types.js';

/** Little-endian "meta". */
export const METADATA_MAGIC = 0x6174656d;

export type StorageHasher =
  | 'Blake2_128'
  | 'Blake2_256'
  | 'Blake2_128Concat'
  | 'Twox128'
  | 'Twox256'
  | 'Twox64Concat'
  | 'Identity';

export type StorageEntryType =
  | { kind: 'plain'; value: TypeId }
  | { hashers: StorageHasher[]; key: TypeId; kind: 'map'; value: TypeId };

export interface StorageEntryMetadata {
  name: string;
  modifier: 'Optional' | 'Default';
  type: StorageEntryType;
  default: Uint8Array;
}

export interface ConstantMetadata {
  name: string;
  type: TypeId;
  value: Uint8Array;
}

export interface PalletMetadata {
  name: string;
  index: number;
  storage?: { prefix: string; entries: StorageEntryMetadata[] } | undefined;
  callType?: TypeId | undefined;
  eventType?: TypeId | undefined;
  errorType?: TypeId | undefined;
  constants: ConstantMetadata[];
}

export interface SignedExtensionMetadata {
  identifier: string;
  type: TypeId;
  additionalSigned: TypeId;
}

export interface ExtrinsicMetadata {
  version: number;
  addressType: TypeId;
  callType: TypeId;
  signatureType: TypeId;
  extraType: TypeId;
  signedExtensions: SignedExtensionMetadata[];
}

/**
 * Runtime metadata as the indexer uses it. `registry` has the metadata
 * applied, so lookup types (`Lookup<id>`), calls and events decode through it.
 */
export interface RuntimeMetadata {
  version: 14 | 15;
  registry: TypeRegistry;
  /** The decoded metadata; `source.toU8a()` re-encodes it. */
  source: Metadata;
  types: ReadonlyMap<TypeId, Si1Type>;
  pallets: PalletMetadata[];
  extrinsic: ExtrinsicMetadata;
}

const HASHERS: readonly StorageHasher[] = [
  'Blake2_128',
  'Blake2_256',
  'Blake2_128Concat',
  'Twox128',
  'Twox256',
  'Twox64Concat',
  'Identity',
];

function toHasher(name: string): StorageHasher {
  const hasher = HASHERS.find((h) => h === name);
  if (!hasher) {
    throw new DecodeError('INVALID_VALUE', `Malformed runtime metadata: unknown storage hasher ${name}`);
  }
  return hasher;
}

function toStorageEntry(item: StorageEntryMetadataLatest): StorageEntryMetadata {
  const type: StorageEntryType = item.type.isPlain
    ? { kind: 'plain', value: item.type.asPlain.toNumber() }
    : {
        hashers: item.type.asMap.hashers.map((h) => toHasher(h.type)),
        key: item.type.asMap.key.toNumber(),
        kind: 'map',
        value: item.type.asMap.value.toNumber(),
      };
  return {
    default: item.fallback.toU8a(true),
    modifier: item.modifier.isOptional ? 'Optional' : 'Default',
    name: item.name.toString(),
    type,
  };
}

function toPallet(pallet: PalletMetadataLatest): PalletMetadata {
  const storage = pallet.storage.unwrapOr(undefined);
  return {
    callType: pallet.calls.unwrapOr(undefined)?.type.toNumber(),
    constants: pallet.constants.map((c) => ({
      name: c.name.toString(),
      type: c.type.toNumber(),
      value: c.value.toU8a(true),
    })),
    errorType: pallet.errors.unwrapOr(undefined)?.type.toNumber(),
    eventType: pallet.events.unwrapOr(undefined)?.type.toNumber(),
    index: pallet.index.toNumber(),
    name: pallet.name.toString(),
    storage: storage
      ? { entries: storage.items.map(toStorageEntry), prefix: storage.prefix.toString() }
      : undefined,
  };
}

function toExtrinsic(latest: MetadataLatest): ExtrinsicMetadata {
  const { extrinsic } = latest;
  return {
    addressType: extrinsic.addressType.toNumber(),
    callType: extrinsic.callType.toNumber(),
    extraType: extrinsic.extraType.toNumber(),
    signatureType: extrinsic.signatureType.toNumber(),
    signedExtensions: extrinsic.signedExtensions.map((ext) => ({
      additionalSigned: ext.additionalSigned.toNumber(),
      identifier: ext.identifier.toString(),
      type: ext.type.toNumber(),
    })),
    version: extrinsic.version.toNumber(),
  };
}

/**
 * Decode `RuntimeMetadataPrefixed` as returned by `state_getMetadata`.
 * V14 metadata is upgraded by the library, so extrinsic types come from the
 * `UncheckedExtrinsic` type parameters there.
 */
export function decodeRuntimeMetadata(bytes: Uint8Array): Result<RuntimeMetadata, DecodeError> {
  if (bytes.length < 5) {
    return err(new DecodeError('INSUFFICIENT_BYTES', 'Runtime metadata is shorter than its prefix'));
  }
  const magic = new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0, true);
  if (magic !== METADATA_MAGIC) {
    return err(new DecodeError('INVALID_VALUE', `Runtime metadata magic 0x${magic.toString(16)} is not "meta"`, 0));
  }
  const version = bytes[4];
  if (version !== 14 && version !== 15) {
    return err(new DecodeError('UNSUPPORTED_FORMAT', `Runtime metadata version ${version} is not supported`, 4));
  }

  return tryDecode((): RuntimeMetadata => {
    const registry = new TypeRegistry();
    const source = new Metadata(registry, bytes);
    registry.setMetadata(source);

    const latest = source.asLatest;
    const types = new Map<TypeId, Si1Type>();
    for (const { id, type } of latest.lookup.types) {
      types.set(id.toNumber(), type);
    }
    return {
      extrinsic: toExtrinsic(latest),
      pallets: latest.pallets.map(toPallet),
      registry,
      source,
      types,
      version,
    };
  }).mapErr((error) =>
    error.message.startsWith('Malformed')
      ? error
      : new DecodeError(error.code, `Malformed runtime metadata: ${error.message}`)
  );
}

export function findPallet(metadata: RuntimeMetadata, name: string): PalletMetadata | undefined {
  return metadata.pallets.find((p) => p.name === name);
}

export function findStorageEntry(
  metadata: RuntimeMetadata,
  pallet: string,
  entry: string
): StorageEntryMetadata | undefined {
  return findPallet(metadata, pallet)?.storage?.entries.find((e) => e.name === entry);
}

/** The type registered under `path`, e.g. `['staging_xcm', 'v4', 'location', 'Location']`. */
export function findTypeByPath(metadata: RuntimeMetadata, path: readonly string[]): TypeId | undefined {
  const wanted = path.join('::');
  for (const [id, type] of metadata.types) {
    if (type.path.map((s) => s.toString()).join('::') === wanted) return id;
  }
  return undefined;
}
