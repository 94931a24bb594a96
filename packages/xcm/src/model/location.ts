import { u8aToHex } from '@polkadot/util';
import {
  asBigInt,
  asBytes,
  asItems,
  asNumber,
  asVariant,
  fieldValues,
  getField,
  unwrapOption,
  type DecodedValue,
} from '@xcm-indexer/scale-codec';

/**
 * Consensus system named by a `GlobalConsensus` junction. Networks the
 * indexer never resolves keep their decoded value so they survive a
 * version conversion unchanged.
 */
export type NetworkId =
  | { readonly kind: 'Polkadot' }
  | { readonly kind: 'Kusama' }
  | { readonly kind: 'Ethereum'; readonly chainId: bigint }
  | { readonly kind: 'Other'; readonly name: string; readonly raw: DecodedValue };

export type Junction =
  | { readonly kind: 'Parachain'; readonly id: number }
  | { readonly kind: 'AccountId32'; readonly network: NetworkId | undefined; readonly id: Uint8Array }
  | { readonly kind: 'AccountKey20'; readonly network: NetworkId | undefined; readonly key: Uint8Array }
  | { readonly kind: 'PalletInstance'; readonly index: number }
  | { readonly kind: 'GeneralIndex'; readonly index: bigint }
  | { readonly kind: 'GlobalConsensus'; readonly network: NetworkId }
  | { readonly kind: 'Other'; readonly name: string; readonly raw: DecodedValue };

/**
 * Version-free location: the number of parent hops and the interior path,
 * outermost junction first.
 */
export interface Location {
  readonly parents: number;
  readonly interior: readonly Junction[];
}

export type XcmVersion = 'V3' | 'V4';

export const XCM_VERSIONS: readonly XcmVersion[] = ['V3', 'V4'];

export function isXcmVersion(name: string): name is XcmVersion {
  return XCM_VERSIONS.some((version) => version === name);
}

export function readNetworkId(value: DecodedValue | undefined): NetworkId | undefined {
  const variant = asVariant(value);
  if (!variant) return undefined;
  switch (variant.name) {
    case 'Polkadot':
      return { kind: 'Polkadot' };
    case 'Kusama':
      return { kind: 'Kusama' };
    case 'Ethereum': {
      const chainId = asBigInt(getField(variant, 'chain_id') ?? variant.fields[0]?.value);
      return chainId === undefined ? undefined : { chainId, kind: 'Ethereum' };
    }
    default:
      return { kind: 'Other', name: variant.name, raw: variant };
  }
}

function readOptionalNetwork(value: DecodedValue | undefined): NetworkId | undefined {
  const inner = unwrapOption(value);
  return inner ? readNetworkId(inner) : undefined;
}

/**
 * Junction variants share names and field layouts across XCM v3 and v4.
 */
export function readJunction(value: DecodedValue): Junction | undefined {
  const variant = asVariant(value);
  if (!variant) return undefined;
  const first = variant.fields[0]?.value;

  switch (variant.name) {
    case 'Parachain': {
      const id = asNumber(first);
      return id === undefined ? undefined : { id, kind: 'Parachain' };
    }
    case 'AccountId32': {
      const id = asBytes(getField(variant, 'id'));
      return id?.length === 32 ? { id, kind: 'AccountId32', network: readOptionalNetwork(getField(variant, 'network')) } : undefined;
    }
    case 'AccountKey20': {
      const key = asBytes(getField(variant, 'key'));
      return key?.length === 20
        ? { key, kind: 'AccountKey20', network: readOptionalNetwork(getField(variant, 'network')) }
        : undefined;
    }
    case 'PalletInstance': {
      const index = asNumber(first);
      return index === undefined ? undefined : { index, kind: 'PalletInstance' };
    }
    case 'GeneralIndex': {
      const index = asBigInt(first);
      return index === undefined ? undefined : { index, kind: 'GeneralIndex' };
    }
    case 'GlobalConsensus': {
      const network = readNetworkId(first);
      return network ? { kind: 'GlobalConsensus', network } : undefined;
    }
    default:
      return { kind: 'Other', name: variant.name, raw: variant };
  }
}

function readJunctions(values: DecodedValue[]): Junction[] | undefined {
  const junctions: Junction[] = [];
  for (const value of values) {
    const junction = readJunction(value);
    if (!junction) return undefined;
    junctions.push(junction);
  }
  return junctions;
}

function readParents(value: DecodedValue): number | undefined {
  return asNumber(getField(value, 'parents'));
}

/**
 * v3 `MultiLocation`: `Junctions::X2(a, b)` carries one field per junction.
 */
export function readV3Location(value: DecodedValue): Location | undefined {
  const parents = readParents(value);
  const interior = asVariant(getField(value, 'interior'));
  if (parents === undefined || !interior) return undefined;
  if (interior.name === 'Here') return { interior: [], parents };

  const junctions = readJunctions(fieldValues(interior));
  return junctions && interior.name === `X${junctions.length}` ? { interior: junctions, parents } : undefined;
}

/**
 * v4 `Location`: `Junctions::X2([a, b])` carries a single array field.
 */
export function readV4Location(value: DecodedValue): Location | undefined {
  const parents = readParents(value);
  const interior = asVariant(getField(value, 'interior'));
  if (parents === undefined || !interior) return undefined;
  if (interior.name === 'Here') return { interior: [], parents };

  const items = asItems(interior.fields[0]?.value);
  const junctions = items ? readJunctions(items) : undefined;
  return junctions && interior.name === `X${junctions.length}` ? { interior: junctions, parents } : undefined;
}

function describeValue(value: DecodedValue): string {
  switch (value.kind) {
    case 'bool':
    case 'str':
      return String(value.value);
    case 'int':
      return value.value.toString();
    case 'bytes':
    case 'bits':
      return u8aToHex(value.value);
    case 'composite':
      return `{${value.fields.map((f) => `${f.name ?? ''}:${describeValue(f.value)}`).join(',')}}`;
    case 'variant':
      return `${value.name}(${value.fields.map((f) => describeValue(f.value)).join(',')})`;
    case 'sequence':
    case 'tuple':
      return `[${value.items.map(describeValue).join(',')}]`;
  }
}

function networkKey(network: NetworkId | undefined): string {
  if (!network) return '';
  switch (network.kind) {
    case 'Ethereum':
      return `Ethereum(${network.chainId})`;
    case 'Other':
      return describeValue(network.raw);
    default:
      return network.kind;
  }
}

function junctionKey(junction: Junction): string {
  switch (junction.kind) {
    case 'Parachain':
      return `Parachain(${junction.id})`;
    case 'AccountId32':
      return `AccountId32(${networkKey(junction.network)},${u8aToHex(junction.id)})`;
    case 'AccountKey20':
      return `AccountKey20(${networkKey(junction.network)},${u8aToHex(junction.key)})`;
    case 'PalletInstance':
      return `PalletInstance(${junction.index})`;
    case 'GeneralIndex':
      return `GeneralIndex(${junction.index})`;
    case 'GlobalConsensus':
      return `GlobalConsensus(${networkKey(junction.network)})`;
    case 'Other':
      return describeValue(junction.raw);
  }
}

/**
 * Canonical string identity, equal for equal locations regardless of the
 * XCM version they were decoded from.
 */
export function locationKey(location: Location): string {
  return [String(location.parents), ...location.interior.map(junctionKey)].join('/');
}

export function locationEquals(a: Location, b: Location): boolean {
  return locationKey(a) === locationKey(b);
}
