import { asBigInt, asItems, asVariant, getField, type DecodedValue } from '@xcm-indexer/scale-codec';

import { isXcmVersion, readV3Location, type Location, type XcmVersion } from './location.js';

/**
 * Payload of a `VersionedLocation` / `VersionedAssets` style enum.
 */
export interface Versioned {
  /** Variant name, e.g. `V3`, including versions the indexer does not read */
  tag: string;
  version: XcmVersion | undefined;
  value: DecodedValue;
}

export function readVersioned(value: DecodedValue | undefined): Versioned | undefined {
  const variant = asVariant(value);
  const inner = variant?.fields[0]?.value;
  if (!variant || !inner) return undefined;
  return { tag: variant.name, value: inner, version: isXcmVersion(variant.name) ? variant.name : undefined };
}

export type AssetId =
  | { readonly kind: 'Concrete'; readonly location: Location }
  | { readonly kind: 'Abstract' };

export type Fungibility = { readonly kind: 'Fungible'; readonly amount: bigint } | { readonly kind: 'NonFungible' };

export interface MultiAsset {
  readonly id: AssetId;
  readonly fun: Fungibility;
}

function readAssetId(value: DecodedValue | undefined): AssetId | undefined {
  const variant = asVariant(value);
  const payload = variant?.fields[0]?.value;
  if (variant?.name === 'Abstract') return { kind: 'Abstract' };
  if (variant?.name !== 'Concrete' || !payload) return undefined;
  const location = readV3Location(payload);
  return location ? { kind: 'Concrete', location } : undefined;
}

function readFungibility(value: DecodedValue | undefined): Fungibility | undefined {
  const variant = asVariant(value);
  if (variant?.name === 'NonFungible') return { kind: 'NonFungible' };
  const amount = variant?.name === 'Fungible' ? asBigInt(variant.fields[0]?.value) : undefined;
  return amount === undefined ? undefined : { amount, kind: 'Fungible' };
}

/**
 * Reads a v3 `MultiAssets` list. Entries that do not parse come back as
 * `undefined` so callers can drop them one by one.
 */
export function readV3Assets(value: DecodedValue): (MultiAsset | undefined)[] | undefined {
  const items = asItems(value);
  if (!items) return undefined;
  return items.map((item) => {
    const id = readAssetId(getField(item, 'id'));
    const fun = readFungibility(getField(item, 'fun'));
    return id && fun ? { fun, id } : undefined;
  });
}
