import { asBigInt, asBytes, asNumber, getField, type DecodedValue } from '@xcm-indexer/scale-codec';

import { readV4Location } from '../model/location.js';
import { AssetRefs, type AssetRef } from '../resolver/asset-ref.js';

/**
 * An asset minted into an account.
 */
export interface Issuance {
  asset: AssetRef;
  /** 32-byte account id of the recipient */
  who: Uint8Array;
  amount: bigint;
}

/**
 * Reads an issuance from an event's fields (as a composite). Returns
 * `undefined` when the fields do not have the expected shape.
 */
export type IssuanceExtractor = (fields: DecodedValue) => Issuance | undefined;

function account(value: DecodedValue | undefined): Uint8Array | undefined {
  const bytes = asBytes(value);
  return bytes?.length === 32 ? bytes : undefined;
}

function issuance(asset: AssetRef | undefined, who: Uint8Array | undefined, amount: bigint | undefined): Issuance | undefined {
  return asset && who && amount !== undefined ? { amount, asset, who } : undefined;
}

const balancesMinted: IssuanceExtractor = (fields) =>
  issuance(AssetRefs.native(), account(getField(fields, 'who')), asBigInt(getField(fields, 'amount')));

const assetsIssued: IssuanceExtractor = (fields) => {
  const id = asNumber(getField(fields, 'asset_id'));
  return issuance(
    id === undefined ? undefined : AssetRefs.pallet(id),
    account(getField(fields, 'owner')),
    asBigInt(getField(fields, 'amount'))
  );
};

const foreignAssetsIssued: IssuanceExtractor = (fields) => {
  const id = getField(fields, 'asset_id');
  const location = id ? readV4Location(id) : undefined;
  return issuance(
    location ? AssetRefs.foreign(location) : undefined,
    account(getField(fields, 'owner')),
    asBigInt(getField(fields, 'amount'))
  );
};

/**
 * Events that mint assets while an inbound message executes, keyed by
 * `Pallet.Event`.
 */
export const ISSUANCE_EXTRACTORS: ReadonlyMap<string, IssuanceExtractor> = new Map<string, IssuanceExtractor>([
  ['Assets.Issued', assetsIssued],
  ['Balances.Minted', balancesMinted],
  ['ForeignAssets.Issued', foreignAssetsIssued],
]);
