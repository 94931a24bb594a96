import { describe, expect, it } from 'vitest';

import { buildMiniRuntime } from '../../__tests__/mini-runtime.js';
import { decode, decodeExact, encode } from '../scale.js';
import { bytesValue, compositeValue, intValue, tupleValue, variantValue } from '../value-utils.js';

const { metadata, types } = buildMiniRuntime();
const { registry } = metadata;

describe('decode', () => {
  it('returns the value and the bytes after it', () => {
    const { remaining, value } = decode(Uint8Array.of(1, 0, 0, 0, 2, 9), types.pairKey, registry)._unsafeUnwrap();

    expect(value).toEqual({
      items: [
        { kind: 'int', value: 1n },
        { kind: 'int', value: 2n },
      ],
      kind: 'tuple',
    });
    expect(Array.from(remaining)).toEqual([9]);
  });

  it('reads newtype wrappers as single-field composites and u8 arrays as bytes', () => {
    const account = new Uint8Array(32).fill(0x11);

    expect(decodeExact(account, types.accountId, registry)._unsafeUnwrap()).toEqual({
      fields: [{ name: undefined, value: { kind: 'bytes', value: account } }],
      kind: 'composite',
    });
  });

  it('names variants by their index in the lookup', () => {
    const key = new Uint8Array(20).fill(0x22);
    const value = decodeExact(Uint8Array.of(4, ...key), types.address, registry)._unsafeUnwrap();

    expect(value).toEqual({
      fields: [{ name: undefined, value: { kind: 'bytes', value: key } }],
      index: 4,
      kind: 'variant',
      name: 'Address20',
    });
  });

  it('rejects trailing bytes in decodeExact', () => {
    const result = decodeExact(Uint8Array.of(1, 0, 0, 0, 2, 9), types.pairKey, registry);
    expect(result._unsafeUnwrapErr().code).toBe('TRAILING_BYTES');
  });

  it('reports truncated input', () => {
    expect(decode(Uint8Array.of(1, 0), types.pairKey, registry)._unsafeUnwrapErr().code).toBe('INSUFFICIENT_BYTES');
  });

  it('reports type ids missing from the registry', () => {
    expect(decode(Uint8Array.of(0), 9_999, registry)._unsafeUnwrapErr().code).toBe('UNKNOWN_TYPE');
  });

  it('rejects a sequence length beyond the decoder limit instead of reading it', () => {
    // Compact 2^30 followed by nothing: a Vec<()> that would need no further bytes.
    const hugeLength = Uint8Array.of(0x03, 0x00, 0x00, 0x00, 0x40);

    const result = decode(hugeLength, types.units, registry);

    expect(result._unsafeUnwrapErr().code).toBe('INVALID_VALUE');
  });
});

describe('encode', () => {
  it('writes values decode reads back', () => {
    const account = new Uint8Array(32).fill(0x33);
    const encoded = encode(variantValue('Id', [bytesValue(account)]), types.address, registry)._unsafeUnwrap();

    expect(Array.from(encoded)).toEqual([0, ...account]);
    expect(decodeExact(encoded, types.address, registry)._unsafeUnwrap()).toEqual({
      fields: [
        {
          name: undefined,
          value: { fields: [{ name: undefined, value: { kind: 'bytes', value: account } }], kind: 'composite' },
        },
      ],
      index: 0,
      kind: 'variant',
      name: 'Id',
    });
  });

  it('encodes tuples item by item', () => {
    const encoded = encode(tupleValue([intValue(258), intValue(7)]), types.pairKey, registry)._unsafeUnwrap();
    expect(Array.from(encoded)).toEqual([2, 1, 0, 0, 7]);
  });

  it('rejects integers that do not fit the primitive', () => {
    const result = encode(tupleValue([intValue(1n << 32n), intValue(0)]), types.pairKey, registry);
    expect(result._unsafeUnwrapErr().code).toBe('OUT_OF_RANGE');
  });

  it('rejects unknown variant names', () => {
    const result = encode(variantValue('Index', [intValue(1)]), types.address, registry);
    expect(result._unsafeUnwrapErr().code).toBe('UNKNOWN_VARIANT');
  });

  it('rejects values of the wrong shape', () => {
    expect(encode(intValue(1), types.accountId, registry)._unsafeUnwrapErr().code).toBe('SHAPE_MISMATCH');
    expect(encode(compositeValue([]), types.pairKey, registry)._unsafeUnwrapErr().code).toBe('SHAPE_MISMATCH');
  });
});
