import {
  bytesValue,
  compositeValue,
  intValue,
  sequenceValue,
  variantValue,
  type DecodedValue,
} from '@xcm-indexer/scale-codec';

import type { Junction, Location, NetworkId } from '../model/location.js';

const option = (value: DecodedValue | undefined): DecodedValue =>
  value ? variantValue('Some', [value]) : variantValue('None');

function networkValue(network: NetworkId): DecodedValue {
  switch (network.kind) {
    case 'Ethereum':
      return variantValue('Ethereum', { chain_id: intValue(network.chainId) });
    case 'Other':
      return network.raw;
    default:
      return variantValue(network.kind);
  }
}

function junctionValue(junction: Junction): DecodedValue {
  switch (junction.kind) {
    case 'Parachain':
      return variantValue('Parachain', [intValue(junction.id)]);
    case 'AccountId32':
      return variantValue('AccountId32', {
        id: bytesValue(junction.id),
        network: option(junction.network && networkValue(junction.network)),
      });
    case 'AccountKey20':
      return variantValue('AccountKey20', {
        key: bytesValue(junction.key),
        network: option(junction.network && networkValue(junction.network)),
      });
    case 'PalletInstance':
      return variantValue('PalletInstance', [intValue(junction.index)]);
    case 'GeneralIndex':
      return variantValue('GeneralIndex', [intValue(junction.index)]);
    case 'GlobalConsensus':
      return variantValue('GlobalConsensus', [networkValue(junction.network)]);
    case 'Other':
      return junction.raw;
  }
}

/**
 * v4 value of a location, ready to encode against the runtime's v4
 * `Location` type that keys `ForeignAssets` storage. Locations read from v3
 * values convert unchanged.
 */
export function toStorageLocationValue(location: Location): DecodedValue {
  const { interior, parents } = location;
  const junctions =
    interior.length === 0 ? variantValue('Here') : variantValue(`X${interior.length}`, [sequenceValue(interior.map(junctionValue))]);
  return compositeValue({ interior: junctions, parents: intValue(parents) });
}
