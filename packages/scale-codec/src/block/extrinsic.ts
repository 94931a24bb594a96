import { GenericExtrinsic } from '@polkadot/types';
import { compactFromU8a } from '@polkadot/util';
import { err, type Result } from 'neverthrow';

import { CodecValueReader } from '../codec/codec-value.js';
import { DecodeError } from '../codec/errors.js';
import { tryDecode } from '../codec/scale.js';
import type { DecodedField, DecodedValue } from '../codec/types.js';
import type { RuntimeMetadata } from '../metadata/runtime-metadata.js';

const SIGNED_BIT = 0b1000_0000;
const SUPPORTED_VERSION = 4;

export interface DecodedCall {
  pallet: string;
  name: string;
  args: DecodedField[];
}

export interface DecodedExtrinsic {
  signed: boolean;
  /** Address value of the signer, e.g. `MultiAddress::Id(..)`. */
  signer?: DecodedValue | undefined;
  call: DecodedCall;
}

/**
 * A `RuntimeCall` value: the outer variant selects the pallet, its single
 * field is the pallet's call enum.
 */
export function toDecodedCall(value: DecodedValue): DecodedCall {
  const inner = value.kind === 'variant' ? value.fields[0]?.value : undefined;
  if (value.kind !== 'variant' || inner?.kind !== 'variant') {
    throw new DecodeError('INVALID_VALUE', 'Call is not a pallet variant wrapping a call variant');
  }
  return { args: inner.fields, name: inner.name, pallet: value.name };
}

/**
 * Decode one opaque extrinsic (length-prefixed, as found in a block body).
 */
export function decodeExtrinsic(bytes: Uint8Array, metadata: RuntimeMetadata): Result<DecodedExtrinsic, DecodeError> {
  const [offset, length] = compactFromU8a(bytes);
  if (offset + length.toNumber() !== bytes.length) {
    return err(
      new DecodeError('INVALID_VALUE', `Extrinsic length prefix ${length.toString()} does not match its ${bytes.length - offset} byte body`)
    );
  }
  const versionByte = bytes[offset];
  if (versionByte === undefined) {
    return err(new DecodeError('INSUFFICIENT_BYTES', 'Extrinsic has no version byte', offset));
  }
  const version = versionByte & ~SIGNED_BIT;
  if (version !== SUPPORTED_VERSION) {
    return err(new DecodeError('UNSUPPORTED_FORMAT', `Extrinsic version ${version} is not supported`, offset));
  }

  return tryDecode(() => {
    const extrinsic = new GenericExtrinsic(metadata.registry, bytes);
    if (extrinsic.encodedLength !== bytes.length) {
      throw new DecodeError(
        'TRAILING_BYTES',
        `${bytes.length - extrinsic.encodedLength} bytes left after the call`,
        extrinsic.encodedLength
      );
    }

    const reader = new CodecValueReader(metadata.registry);
    const signed = (versionByte & SIGNED_BIT) !== 0;
    return {
      call: toDecodedCall(reader.read(extrinsic.method, metadata.extrinsic.callType)),
      signed,
      signer: signed ? reader.read(extrinsic.signer, metadata.extrinsic.addressType) : undefined,
    };
  });
}
