import type { TypeRegistry } from '@polkadot/types';
import type { Codec } from '@polkadot/types-codec/types';
import { err, ok, type Result } from 'neverthrow';

import { CodecInputWriter, CodecValueReader, lookupType } from './codec-value.js';
import { DecodeError, EncodeError, errorMessage } from './errors.js';
import type { DecodedValue, DecodeOutput, TypeId } from './types.js';

/**
 * Run `fn`, turning anything the codec library throws into a `DecodeError`.
 */
export function tryDecode<T>(fn: () => T): Result<T, DecodeError> {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof DecodeError) return err(error);
    return err(new DecodeError('INVALID_VALUE', errorMessage(error)));
  }
}

/** Codec for `typeId`, read from the front of `bytes`. */
export function createCodec(bytes: Uint8Array, typeId: TypeId, registry: TypeRegistry): Codec {
  lookupType(registry, typeId);
  const codec = registry.createType(registry.createLookupType(typeId), bytes);
  if (codec.encodedLength > bytes.length) {
    throw new DecodeError(
      'INSUFFICIENT_BYTES',
      `Type ${typeId} needs ${codec.encodedLength} bytes, only ${bytes.length} available`
    );
  }
  return codec;
}

/**
 * Decode one value of `typeId` from the front of `bytes`; the rest is returned
 * as `remaining`.
 */
export function decode(bytes: Uint8Array, typeId: TypeId, registry: TypeRegistry): Result<DecodeOutput, DecodeError> {
  return tryDecode(() => {
    const codec = createCodec(bytes, typeId, registry);
    return {
      remaining: bytes.subarray(codec.encodedLength),
      value: new CodecValueReader(registry).read(codec, typeId),
    };
  });
}

/** Like `decode`, but leftover bytes are an error. */
export function decodeExact(bytes: Uint8Array, typeId: TypeId, registry: TypeRegistry): Result<DecodedValue, DecodeError> {
  return decode(bytes, typeId, registry).andThen(({ remaining, value }) =>
    remaining.length > 0
      ? err(
          new DecodeError(
            'TRAILING_BYTES',
            `${remaining.length} bytes left after decoding type ${typeId}`,
            bytes.length - remaining.length
          )
        )
      : ok(value)
  );
}

/**
 * Encode a structural value against `typeId`. Variants are matched by name.
 */
export function encode(value: DecodedValue, typeId: TypeId, registry: TypeRegistry): Result<Uint8Array, EncodeError> {
  let input: unknown;
  try {
    input = new CodecInputWriter(registry).write(value, typeId);
  } catch (error) {
    if (error instanceof EncodeError) return err(error);
    if (error instanceof DecodeError) return err(new EncodeError('UNKNOWN_TYPE', error.message));
    throw error;
  }
  try {
    return ok(registry.createType(registry.createLookupType(typeId), input).toU8a());
  } catch (error) {
    return err(new EncodeError('SHAPE_MISMATCH', `Type ${typeId} rejected the value: ${errorMessage(error)}`));
  }
}
