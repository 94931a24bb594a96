import { u8aToHex } from '@polkadot/util';
import { encodeAddress } from '@polkadot/util-crypto';
import { asBytes, asVariant, type DecodedValue } from '@xcm-indexer/scale-codec';

import type { Location } from '../model/location.js';

export function encodeSS58Address(publicKey: Uint8Array, ss58Format: number): string {
  return encodeAddress(publicKey, ss58Format);
}

/** Lowercase `0x`-prefixed hex of a 20-byte Ethereum-style key. */
export function encodeAccountKey20(key: Uint8Array): string {
  return u8aToHex(key);
}

/**
 * Renders a location pointing at a single account. Only `AccountId32` and
 * `AccountKey20` interiors are addresses; anything else yields `undefined`.
 */
export function resolveBeneficiary(location: Location, ss58Format: number): string | undefined {
  const [junction] = location.interior;
  if (location.interior.length !== 1 || !junction) return undefined;
  switch (junction.kind) {
    case 'AccountId32':
      return encodeSS58Address(junction.id, ss58Format);
    case 'AccountKey20':
      return encodeAccountKey20(junction.key);
    default:
      return undefined;
  }
}

/**
 * Renders an extrinsic signer (`MultiAddress`).
 */
export function resolveSigner(address: DecodedValue | undefined, ss58Format: number): string | undefined {
  const variant = asVariant(address);
  const bytes = asBytes(variant?.fields[0]?.value);
  if (!variant || !bytes) return undefined;

  if (variant.name === 'Id' && bytes.length === 32) {
    return encodeSS58Address(bytes, ss58Format);
  }
  if (variant.name === 'Address20' && bytes.length === 20) {
    return encodeAccountKey20(bytes);
  }
  return undefined;
}
