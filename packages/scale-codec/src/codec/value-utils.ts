import type { DecodedField, DecodedValue } from './types.js';

type VariantValue = Extract<DecodedValue, { kind: 'variant' }>;

function fieldsOf(value: DecodedValue): DecodedField[] | undefined {
  return value.kind === 'composite' || value.kind === 'variant' ? value.fields : undefined;
}

export function getField(value: DecodedValue, name: string): DecodedValue | undefined {
  return fieldsOf(value)?.find((f) => f.name === name)?.value;
}

export function getFieldAt(value: DecodedValue, index: number): DecodedValue | undefined {
  return fieldsOf(value)?.[index]?.value;
}

export function fieldValues(value: DecodedValue): DecodedValue[] {
  return fieldsOf(value)?.map((f) => f.value) ?? [];
}

/**
 * Strip single-field composite wrappers, e.g. `AccountId32([u8; 32])` or a
 * newtype asset id.
 */
export function unwrapSingle(value: DecodedValue): DecodedValue {
  let current = value;
  while (current.kind === 'composite' && current.fields.length === 1 && current.fields[0]) {
    current = current.fields[0].value;
  }
  return current;
}

export function asBigInt(value: DecodedValue | undefined): bigint | undefined {
  if (!value) return undefined;
  const inner = unwrapSingle(value);
  return inner.kind === 'int' ? inner.value : undefined;
}

export function asNumber(value: DecodedValue | undefined): number | undefined {
  const big = asBigInt(value);
  return big !== undefined && big <= BigInt(Number.MAX_SAFE_INTEGER) && big >= 0n ? Number(big) : undefined;
}

export function asBool(value: DecodedValue | undefined): boolean | undefined {
  if (!value) return undefined;
  const inner = unwrapSingle(value);
  return inner.kind === 'bool' ? inner.value : undefined;
}

export function asBytes(value: DecodedValue | undefined): Uint8Array | undefined {
  if (!value) return undefined;
  const inner = unwrapSingle(value);
  return inner.kind === 'bytes' ? inner.value : undefined;
}

export function asString(value: DecodedValue | undefined): string | undefined {
  if (!value) return undefined;
  const inner = unwrapSingle(value);
  return inner.kind === 'str' ? inner.value : undefined;
}

export function asVariant(value: DecodedValue | undefined): VariantValue | undefined {
  if (!value) return undefined;
  const inner = unwrapSingle(value);
  return inner.kind === 'variant' ? inner : undefined;
}

export function asItems(value: DecodedValue | undefined): DecodedValue[] | undefined {
  if (!value) return undefined;
  const inner = unwrapSingle(value);
  return inner.kind === 'sequence' || inner.kind === 'tuple' ? inner.items : undefined;
}

/** `Option<T>` payload, or undefined for `None`. */
export function unwrapOption(value: DecodedValue | undefined): DecodedValue | undefined {
  const variant = asVariant(value);
  return variant?.name === 'Some' ? variant.fields[0]?.value : undefined;
}

// Constructors, mainly for encoding and tests.

export const boolValue = (value: boolean): DecodedValue => ({ kind: 'bool', value });

export const intValue = (value: bigint | number): DecodedValue => ({ kind: 'int', value: BigInt(value) });

export const strValue = (value: string): DecodedValue => ({ kind: 'str', value });

export const bytesValue = (value: Uint8Array): DecodedValue => ({ kind: 'bytes', value });

export const sequenceValue = (items: DecodedValue[]): DecodedValue => ({ items, kind: 'sequence' });

export const tupleValue = (items: DecodedValue[]): DecodedValue => ({ items, kind: 'tuple' });

export function compositeValue(fields: Record<string, DecodedValue> | DecodedValue[]): DecodedValue {
  return { fields: toFields(fields), kind: 'composite' };
}

export function variantValue(
  name: string,
  fields: Record<string, DecodedValue> | DecodedValue[] = [],
  index = 0
): DecodedValue {
  return { fields: toFields(fields), index, kind: 'variant', name };
}

function toFields(fields: Record<string, DecodedValue> | DecodedValue[]): DecodedField[] {
  if (Array.isArray(fields)) {
    return fields.map((value) => ({ value }));
  }
  return Object.entries(fields).map(([name, value]) => ({ name, value }));
}
