import { GenericCall, GenericEvent, type TypeRegistry } from '@polkadot/types';
import type { Si1Field, Si1Type, Si1Variant } from '@polkadot/types/interfaces';
import { AbstractArray, AbstractInt, BitVec, Bool, Compact, Enum, Option, Struct, Text } from '@polkadot/types-codec';
import type { Codec } from '@polkadot/types-codec/types';
import { compactFromU8a, stringCamelCase } from '@polkadot/util';

import { DecodeError, EncodeError, errorMessage } from './errors.js';
import type { DecodedField, DecodedValue, TypeId } from './types.js';

type PrimitiveName = 'Bool' | 'Char' | 'Str' | 'U8' | 'U16' | 'U32' | 'U64' | 'U128' | 'U256' | 'I8' | 'I16' | 'I32' | 'I64' | 'I128' | 'I256';

const INT_BITS: Partial<Record<PrimitiveName, { bits: bigint; signed: boolean }>> = {
  I128: { bits: 128n, signed: true },
  I16: { bits: 16n, signed: true },
  I256: { bits: 256n, signed: true },
  I32: { bits: 32n, signed: true },
  I64: { bits: 64n, signed: true },
  I8: { bits: 8n, signed: true },
  U128: { bits: 128n, signed: false },
  U16: { bits: 16n, signed: false },
  U256: { bits: 256n, signed: false },
  U32: { bits: 32n, signed: false },
  U64: { bits: 64n, signed: false },
  U8: { bits: 8n, signed: false },
};

export function lookupType(registry: TypeRegistry, typeId: TypeId): Si1Type {
  try {
    return registry.lookup.getSiType(typeId);
  } catch (error) {
    throw new DecodeError('UNKNOWN_TYPE', `Type ${typeId} is not in the registry: ${errorMessage(error)}`);
  }
}

function typeLabel(type: Si1Type, typeId: TypeId): string {
  return type.path.length > 0 ? type.path.map((s) => s.toString()).join('::') : `type ${typeId}`;
}

function fieldName(field: Si1Field): string | undefined {
  return field.name.isSome ? field.name.unwrap().toString() : undefined;
}

function isNewtype(fields: readonly Si1Field[]): fields is [Si1Field] {
  return fields.length === 1 && fields[0]?.name.isNone === true;
}

function isU8(registry: TypeRegistry, typeId: TypeId): boolean {
  const def = lookupType(registry, typeId).def;
  return def.isPrimitive && def.asPrimitive.type === 'U8';
}

/**
 * Turns codecs created from lookup types into `DecodedValue`s, walking the
 * lookup definition alongside the codec. Variant names and field names come
 * from the definition, so the output does not depend on how the library
 * aliased a type.
 */
export class CodecValueReader {
  constructor(private readonly registry: TypeRegistry) {}

  read(codec: Codec, typeId: TypeId): DecodedValue {
    const type = lookupType(this.registry, typeId);
    const def = type.def;

    if (def.isComposite) {
      const fields = [...def.asComposite.fields];
      if (fields.length === 0) return { fields: [], kind: 'composite' };
      if (isNewtype(fields)) {
        return { fields: [{ name: undefined, value: this.read(codec, fields[0].type.toNumber()) }], kind: 'composite' };
      }
      return { fields: this.fields(codec, fields, type, typeId), kind: 'composite' };
    }
    if (def.isVariant) return this.variant(codec, [...def.asVariant.variants], type, typeId);
    if (def.isSequence) return this.items(codec, def.asSequence.type.toNumber(), type, typeId);
    if (def.isArray) return this.items(codec, def.asArray.type.toNumber(), type, typeId);
    if (def.isTuple) {
      const ids = def.asTuple.map((id) => id.toNumber());
      if (ids.length === 0) return { items: [], kind: 'tuple' };
      const members = this.members(codec, ids.length, type, typeId);
      return { items: ids.map((id, i) => this.read(this.at(members, i, type, typeId), id)), kind: 'tuple' };
    }
    if (def.isPrimitive) return this.primitive(codec, def.asPrimitive.type, type, typeId);
    if (def.isCompact) return this.integer(codec, type, typeId);
    if (def.isBitSequence && codec instanceof BitVec) {
      const [, length] = compactFromU8a(codec.toU8a());
      return { kind: 'bits', length: length.toNumber(), value: codec.toU8a(true) };
    }
    throw this.mismatch(codec, type, typeId);
  }

  private fields(codec: Codec, fields: Si1Field[], type: Si1Type, typeId: TypeId): DecodedField[] {
    const members = this.members(codec, fields.length, type, typeId);
    return fields.map((field, i) => ({
      name: fieldName(field),
      value: this.read(this.at(members, i, type, typeId), field.type.toNumber()),
    }));
  }

  private members(codec: Codec, count: number, type: Si1Type, typeId: TypeId): Codec[] {
    let members: Codec[] | undefined;
    if (codec instanceof Struct) {
      members = [...codec.values()];
    } else if (codec instanceof AbstractArray) {
      members = Array.from<Codec>(codec);
    } else if (count === 1) {
      members = [codec];
    }
    if (members?.length !== count) throw this.mismatch(codec, type, typeId);
    return members;
  }

  private at(members: Codec[], index: number, type: Si1Type, typeId: TypeId): Codec {
    const member = members[index];
    if (!member) {
      throw new DecodeError('INVALID_VALUE', `${typeLabel(type, typeId)} has no member ${index}`);
    }
    return member;
  }

  private variant(codec: Codec, variants: Si1Variant[], type: Si1Type, typeId: TypeId): DecodedValue {
    if (codec instanceof Option) {
      const none = variants.find((v) => v.name.toString() === 'None');
      const some = variants.find((v) => v.name.toString() === 'Some');
      const someField = some?.fields[0];
      if (codec.isNone) return { fields: [], index: none?.index.toNumber() ?? 0, kind: 'variant', name: 'None' };
      if (!some || !someField) throw this.mismatch(codec, type, typeId);
      return {
        fields: [{ name: undefined, value: this.read(codec.unwrap(), someField.type.toNumber()) }],
        index: some.index.toNumber(),
        kind: 'variant',
        name: 'Some',
      };
    }
    if (codec instanceof GenericEvent) return this.outer(variants, codec.index, [...codec.data], type, typeId);
    if (codec instanceof GenericCall) return this.outer(variants, codec.callIndex, codec.args, type, typeId);
    if (!(codec instanceof Enum)) throw this.mismatch(codec, type, typeId);

    const index = codec.index;
    const variant = variants.find((v) => v.index.toNumber() === index);
    if (!variant) {
      throw new DecodeError('UNKNOWN_VARIANT', `Variant index ${index} is not defined for ${typeLabel(type, typeId)}`);
    }
    const fields = [...variant.fields];
    return {
      fields: this.variantFields(codec.inner, fields, type, typeId),
      index: variant.index.toNumber(),
      kind: 'variant',
      name: variant.name.toString(),
    };
  }

  private variantFields(inner: Codec, fields: Si1Field[], type: Si1Type, typeId: TypeId): DecodedField[] {
    if (fields.length === 0) return [];
    if (isNewtype(fields)) return [{ name: undefined, value: this.read(inner, fields[0].type.toNumber()) }];
    return this.fields(inner, fields, type, typeId);
  }

  /** `RuntimeEvent` / `RuntimeCall`: a pallet variant wrapping that pallet's event or call enum. */
  private outer(variants: Si1Variant[], index: Uint8Array, args: Codec[], type: Si1Type, typeId: TypeId): DecodedValue {
    const [palletIndex, itemIndex] = index;
    const pallet = variants.find((v) => v.index.toNumber() === palletIndex);
    const palletField = pallet?.fields[0];
    if (!pallet || !palletField || palletIndex === undefined || itemIndex === undefined) {
      throw new DecodeError('UNKNOWN_VARIANT', `Pallet index ${palletIndex} is not defined for ${typeLabel(type, typeId)}`);
    }
    const palletType = lookupType(this.registry, palletField.type.toNumber());
    const item = palletType.def.isVariant
      ? palletType.def.asVariant.variants.find((v) => v.index.toNumber() === itemIndex)
      : undefined;
    if (!item) {
      throw new DecodeError('UNKNOWN_VARIANT', `${pallet.name.toString()} has no variant ${itemIndex}`);
    }

    const fields = item.fields.map((field, i) => ({
      name: fieldName(field),
      value: this.read(this.at(args, i, type, typeId), field.type.toNumber()),
    }));
    return {
      fields: [{ name: undefined, value: { fields, index: itemIndex, kind: 'variant', name: item.name.toString() } }],
      index: palletIndex,
      kind: 'variant',
      name: pallet.name.toString(),
    };
  }

  private items(codec: Codec, elementType: TypeId, type: Si1Type, typeId: TypeId): DecodedValue {
    if (isU8(this.registry, elementType)) return { kind: 'bytes', value: codec.toU8a(true) };
    if (codec instanceof AbstractArray) {
      return { items: Array.from<Codec>(codec).map((item) => this.read(item, elementType)), kind: 'sequence' };
    }
    if (codec instanceof Map) {
      return { items: this.mapEntries(codec, elementType, type, typeId), kind: 'sequence' };
    }
    if (codec instanceof Set) {
      return { items: Array.from<Codec>(codec).map((item) => this.read(item, elementType)), kind: 'sequence' };
    }
    throw this.mismatch(codec, type, typeId);
  }

  // BTreeMap is a sequence of (key, value) tuples on the wire.
  private mapEntries(codec: Codec & Map<Codec, Codec>, elementType: TypeId, type: Si1Type, typeId: TypeId): DecodedValue[] {
    const pair = lookupType(this.registry, elementType).def;
    const [keyType, valueType] = pair.isTuple ? pair.asTuple.map((id) => id.toNumber()) : [];
    if (keyType === undefined || valueType === undefined) throw this.mismatch(codec, type, typeId);
    return [...codec.entries()].map(([key, value]) => ({
      items: [this.read(key, keyType), this.read(value, valueType)],
      kind: 'tuple',
    }));
  }

  private primitive(codec: Codec, name: string, type: Si1Type, typeId: TypeId): DecodedValue {
    if (name === 'Bool' && codec instanceof Bool) return { kind: 'bool', value: codec.isTrue };
    if ((name === 'Str' || name === 'Char') && codec instanceof Text) return { kind: 'str', value: codec.toString() };
    return this.integer(codec, type, typeId);
  }

  private integer(codec: Codec, type: Si1Type, typeId: TypeId): DecodedValue {
    if (codec instanceof AbstractInt || codec instanceof Compact) return { kind: 'int', value: codec.toBigInt() };
    throw this.mismatch(codec, type, typeId);
  }

  private mismatch(codec: Codec, type: Si1Type, typeId: TypeId): DecodeError {
    return new DecodeError('INVALID_VALUE', `Decoded ${codec.toRawType()} does not match ${typeLabel(type, typeId)}`);
  }
}

/**
 * The inverse of `CodecValueReader`: turns a `DecodedValue` into the plain
 * input `registry.createType` accepts for a lookup type. Variants are matched
 * by name, fields by name and then by position. Newtype wrappers accept their
 * inner value directly.
 */
export class CodecInputWriter {
  constructor(private readonly registry: TypeRegistry) {}

  write(value: DecodedValue, typeId: TypeId): unknown {
    const type = this.type(typeId);
    const def = type.def;

    if (def.isComposite) {
      const fields = [...def.asComposite.fields];
      if (fields.length === 0) return null;
      if (isNewtype(fields)) return this.write(unwrapNewtype(value), fields[0].type.toNumber());
      if (value.kind !== 'composite') throw this.mismatch(value, type, typeId, 'composite');
      return this.fields(value.fields, fields, type, typeId);
    }
    if (def.isVariant) return this.variant(value, [...def.asVariant.variants], type, typeId);
    if (def.isSequence) return this.items(value, def.asSequence.type.toNumber(), undefined, type, typeId);
    if (def.isArray) return this.items(value, def.asArray.type.toNumber(), def.asArray.len.toNumber(), type, typeId);
    if (def.isTuple) {
      const ids = def.asTuple.map((id) => id.toNumber());
      if (ids.length === 0) return null;
      if (value.kind !== 'tuple' || value.items.length !== ids.length) {
        throw this.mismatch(value, type, typeId, `tuple of ${ids.length}`);
      }
      const items = value.items;
      return ids.map((id, i) => this.write(this.required(items[i], type, typeId), id));
    }
    if (def.isPrimitive) return this.primitive(value, def.asPrimitive.type, type, typeId);
    if (def.isCompact) {
      const inner = unwrapNewtype(value);
      if (inner.kind !== 'int') throw this.mismatch(value, type, typeId, 'compact integer');
      const innerDef = this.type(def.asCompact.type.toNumber()).def;
      if (innerDef.isPrimitive) this.checkRange(inner.value, innerDef.asPrimitive.type, 'compact ');
      return inner.value;
    }
    throw this.mismatch(value, type, typeId, 'a supported type');
  }

  private fields(values: DecodedField[], fields: Si1Field[], type: Si1Type, typeId: TypeId): Record<string, unknown> {
    if (fields.length !== values.length) {
      throw new EncodeError(
        'SHAPE_MISMATCH',
        `${typeLabel(type, typeId)} has ${fields.length} fields, value has ${values.length}`
      );
    }
    const input: Record<string, unknown> = {};
    fields.forEach((field, i) => {
      const name = fieldName(field) ?? String(i);
      const match = values.find((v) => v.name !== undefined && v.name === fieldName(field)) ?? values[i];
      const encoded = this.write(this.required(match?.value, type, typeId), field.type.toNumber());
      input[name] = encoded;
      input[stringCamelCase(name)] = encoded;
    });
    return input;
  }

  private variant(value: DecodedValue, variants: Si1Variant[], type: Si1Type, typeId: TypeId): unknown {
    if (value.kind !== 'variant') throw this.mismatch(value, type, typeId, 'variant');
    const variant = variants.find((v) => v.name.toString() === value.name);
    if (!variant) {
      throw new EncodeError('UNKNOWN_VARIANT', `Variant ${value.name} is not defined for ${typeLabel(type, typeId)}`);
    }

    const fields = [...variant.fields];
    let input: unknown = null;
    if (isNewtype(fields)) {
      input = this.write(this.required(value.fields[0]?.value, type, typeId), fields[0].type.toNumber());
    } else if (fields.length > 0 && fields.every((f) => f.name.isSome)) {
      input = this.fields(value.fields, fields, type, typeId);
    } else if (fields.length > 0) {
      if (fields.length !== value.fields.length) {
        throw this.mismatch(value, type, typeId, `${fields.length} fields for ${value.name}`);
      }
      input = fields.map((field, i) => this.write(this.required(value.fields[i]?.value, type, typeId), field.type.toNumber()));
    }

    if (type.path.length > 0 && type.path[type.path.length - 1]?.toString() === 'Option') {
      return value.name === 'None' ? null : input;
    }
    return { [value.name]: input };
  }

  private items(
    value: DecodedValue,
    elementType: TypeId,
    length: number | undefined,
    type: Si1Type,
    typeId: TypeId
  ): unknown {
    const count = value.kind === 'bytes' ? value.value.length : value.kind === 'sequence' ? value.items.length : -1;
    if (count < 0 || (length !== undefined && count !== length)) {
      throw this.mismatch(value, type, typeId, length === undefined ? 'sequence' : `array of ${length}`);
    }
    if (value.kind === 'bytes') {
      if (!isU8(this.registry, elementType)) throw this.mismatch(value, type, typeId, 'sequence');
      return Array.from(value.value);
    }
    return value.kind === 'sequence' ? value.items.map((item) => this.write(item, elementType)) : [];
  }

  private primitive(value: DecodedValue, name: string, type: Si1Type, typeId: TypeId): unknown {
    const inner = unwrapNewtype(value);
    if (name === 'Bool') {
      if (inner.kind !== 'bool') throw this.mismatch(value, type, typeId, 'bool');
      return inner.value;
    }
    if (name === 'Str' || name === 'Char') {
      if (inner.kind !== 'str') throw this.mismatch(value, type, typeId, 'str');
      return inner.value;
    }
    if (inner.kind !== 'int') throw this.mismatch(value, type, typeId, name.toLowerCase());
    this.checkRange(inner.value, name, '');
    return inner.value;
  }

  private checkRange(value: bigint, name: string, label: string): void {
    const width = isPrimitiveName(name) ? INT_BITS[name] : undefined;
    if (!width) return;
    const min = width.signed ? -(1n << (width.bits - 1n)) : 0n;
    const max = width.signed ? (1n << (width.bits - 1n)) - 1n : (1n << width.bits) - 1n;
    if (value < min || value > max) {
      throw new EncodeError('OUT_OF_RANGE', `${value} does not fit ${label}${name.toLowerCase()}`);
    }
  }

  private type(typeId: TypeId): Si1Type {
    try {
      return lookupType(this.registry, typeId);
    } catch (error) {
      throw new EncodeError('UNKNOWN_TYPE', errorMessage(error));
    }
  }

  private required(value: DecodedValue | undefined, type: Si1Type, typeId: TypeId): DecodedValue {
    if (!value) throw new EncodeError('SHAPE_MISMATCH', `Missing a field of ${typeLabel(type, typeId)}`);
    return value;
  }

  private mismatch(value: DecodedValue, type: Si1Type, typeId: TypeId, expected: string): EncodeError {
    return new EncodeError(
      'SHAPE_MISMATCH',
      `Cannot encode ${value.kind} value as ${typeLabel(type, typeId)}; expected ${expected}`
    );
  }
}

function isPrimitiveName(name: string): name is PrimitiveName {
  return Object.hasOwn(INT_BITS, name) || name === 'Bool' || name === 'Char' || name === 'Str';
}

function unwrapNewtype(value: DecodedValue): DecodedValue {
  if (value.kind !== 'composite' || value.fields.length !== 1) return value;
  const [only] = value.fields;
  return only && only.name === undefined ? only.value : value;
}
