import type { Si1Field, Si1Type, Si1Variant } from '@polkadot/types/interfaces';
import { blake2AsHex } from '@polkadot/util-crypto';

import type { TypeId } from '../codec/types.js';

import { findPallet, findStorageEntry, findTypeByPath, type RuntimeMetadata } from './runtime-metadata.js';

/**
 * A piece of runtime metadata whose layout the indexer depends on.
 */
export type SchemaItem =
  | { kind: 'call'; pallet: string; name: string }
  | { kind: 'event'; pallet: string; name: string }
  | { kind: 'storage'; pallet: string; name: string }
  | { kind: 'type'; path: string[] }
  | { kind: 'extrinsic' };

export function schemaItemKey(item: SchemaItem): string {
  switch (item.kind) {
    case 'call':
    case 'event':
    case 'storage':
      return `${item.kind}:${item.pallet}.${item.name}`;
    case 'type':
      return `type:${item.path.join('::')}`;
    case 'extrinsic':
      return 'extrinsic';
  }
}

/**
 * Canonical structural description of a lookup type. Names and layout are
 * included, ids are not, so the same shape under a renumbered registry yields
 * the same string. Revisited types become `#n`, the order of first visit.
 */
class ShapeWriter {
  private readonly visited = new Map<TypeId, number>();

  constructor(private readonly types: ReadonlyMap<TypeId, Si1Type>) {}

  shape(id: TypeId): string {
    const seen = this.visited.get(id);
    if (seen !== undefined) return `#${seen}`;
    this.visited.set(id, this.visited.size);

    const def = this.types.get(id)?.def;
    if (!def) return '?';
    if (def.isPrimitive) return def.asPrimitive.type.toLowerCase();
    if (def.isComposite) return `{${this.fields(def.asComposite.fields)}}`;
    if (def.isVariant) return `<${def.asVariant.variants.map((v) => this.variant(v)).join('|')}>`;
    if (def.isSequence) return `[${this.shape(def.asSequence.type.toNumber())}]`;
    if (def.isArray) return `[${this.shape(def.asArray.type.toNumber())};${def.asArray.len.toNumber()}]`;
    if (def.isTuple) return `(${def.asTuple.map((t) => this.shape(t.toNumber())).join(',')})`;
    if (def.isCompact) return `Compact<${this.shape(def.asCompact.type.toNumber())}>`;
    if (def.isBitSequence) {
      const bits = def.asBitSequence;
      return `Bits<${this.shape(bits.bitStoreType.toNumber())},${this.shape(bits.bitOrderType.toNumber())}>`;
    }
    return '?';
  }

  variant(variant: Si1Variant): string {
    return `${variant.name.toString()}@${variant.index.toNumber()}{${this.fields(variant.fields)}}`;
  }

  fields(fields: readonly Si1Field[]): string {
    return fields
      .map((f) => `${f.name.isSome ? f.name.unwrap().toString() : ''}:${this.shape(f.type.toNumber())}`)
      .join(',');
  }
}

function variantShape(metadata: RuntimeMetadata, enumType: TypeId | undefined, name: string): string | undefined {
  if (enumType === undefined) return undefined;
  const def = metadata.types.get(enumType)?.def;
  const variant = def?.isVariant ? def.asVariant.variants.find((v) => v.name.toString() === name) : undefined;
  return variant ? new ShapeWriter(metadata.types).variant(variant) : undefined;
}

function itemShape(metadata: RuntimeMetadata, item: SchemaItem): string | undefined {
  switch (item.kind) {
    case 'call':
      return variantShape(metadata, findPallet(metadata, item.pallet)?.callType, item.name);
    case 'event':
      return variantShape(metadata, findPallet(metadata, item.pallet)?.eventType, item.name);
    case 'storage': {
      const entry = findStorageEntry(metadata, item.pallet, item.name);
      if (!entry) return undefined;
      const writer = new ShapeWriter(metadata.types);
      return entry.type.kind === 'plain'
        ? `plain:${writer.shape(entry.type.value)}`
        : `map:${entry.type.hashers.join(',')}:${writer.shape(entry.type.key)}=>${writer.shape(entry.type.value)}`;
    }
    case 'type': {
      const id = findTypeByPath(metadata, item.path);
      return id === undefined ? undefined : new ShapeWriter(metadata.types).shape(id);
    }
    case 'extrinsic': {
      const { addressType, extraType, signatureType, version } = metadata.extrinsic;
      const writer = new ShapeWriter(metadata.types);
      return `v${version}:${writer.shape(addressType)}:${writer.shape(signatureType)}:${writer.shape(extraType)}`;
    }
  }
}

/**
 * blake2-256 of each item's shape, keyed by `schemaItemKey`. Items absent from
 * the metadata map to null.
 */
export function computeSchemaFingerprints(
  metadata: RuntimeMetadata,
  items: readonly SchemaItem[]
): Record<string, string | null> {
  const fingerprints: Record<string, string | null> = {};
  for (const item of items) {
    const shape = itemShape(metadata, item);
    fingerprints[schemaItemKey(item)] = shape === undefined ? null : blake2AsHex(shape, 256);
  }
  return fingerprints;
}
