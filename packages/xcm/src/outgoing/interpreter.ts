import { chainEquals, describeChain, isSupportedChain, type Chain, type ChainContext, type TransferType } from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';
import type { DecodedExtrinsic, DecodedValue } from '@xcm-indexer/scale-codec';

import type { SentIntent } from '../model/intent.js';
import { readV3Location } from '../model/location.js';
import { readV3Assets, readVersioned } from '../model/versioned.js';
import { resolveBeneficiary, resolveSigner } from '../resolver/address-utils.js';
import { identifyAsset, isTeleportTrusted, reserveChainOf, type AssetRef } from '../resolver/asset-ref.js';
import { resolveLocation } from '../resolver/chain-resolver.js';

const logger = getLogger('OutgoingInterpreter');

export const XCM_PALLETS: readonly string[] = ['PolkadotXcm', 'XcmPallet'];

/**
 * Transfer calls and the kind they impose; `derived` calls leave it to the
 * reserve of each asset.
 */
export const TRANSFER_CALLS: ReadonlyMap<string, TransferType | 'derived'> = new Map<string, TransferType | 'derived'>([
  ['limited_reserve_transfer_assets', 'Reserve'],
  ['limited_teleport_assets', 'Teleport'],
  ['transfer_assets', 'derived'],
]);

interface TransferCall {
  destination: Chain;
  beneficiary: string;
  assets: DecodedValue;
}

function arg(extrinsic: DecodedExtrinsic, name: string): DecodedValue | undefined {
  return extrinsic.call.args.find((a) => a.name === name)?.value;
}

/**
 * Transfer type of one asset sent by `transfer_assets`: a teleport where the
 * destination trusts us for it, a reserve transfer where either side holds
 * the reserve. Assets routed through a third reserve have no type here.
 */
export function deriveTransferType(asset: AssetRef, destination: Chain, context: ChainContext): TransferType | undefined {
  if (isTeleportTrusted(asset, destination, context)) return 'Teleport';
  const reserve = reserveChainOf(asset, context);
  if (chainEquals(reserve, context.localChain) || chainEquals(reserve, destination)) return 'Reserve';
  return undefined;
}

function readTransferCall(extrinsic: DecodedExtrinsic, context: ChainContext): TransferCall | undefined {
  const dest = readVersioned(arg(extrinsic, 'dest'));
  const beneficiary = readVersioned(arg(extrinsic, 'beneficiary'));
  const assets = readVersioned(arg(extrinsic, 'assets'));
  if (!dest || !beneficiary || !assets) {
    logger.debug({ call: extrinsic.call.name }, 'Transfer call is missing dest, beneficiary or assets');
    return undefined;
  }
  if (dest.version !== 'V3' || beneficiary.version !== 'V3' || assets.version !== 'V3') {
    logger.debug(
      { assets: assets.tag, beneficiary: beneficiary.tag, call: extrinsic.call.name, dest: dest.tag },
      'Skipping transfer call in an unsupported XCM version'
    );
    return undefined;
  }

  const destLocation = readV3Location(dest.value);
  const destination = destLocation ? resolveLocation(destLocation, context) : undefined;
  if (!destination || !isSupportedChain(destination)) {
    logger.debug({ call: extrinsic.call.name }, 'Skipping transfer to an unsupported destination');
    return undefined;
  }

  const beneficiaryLocation = readV3Location(beneficiary.value);
  const address = beneficiaryLocation ? resolveBeneficiary(beneficiaryLocation, context.genericSs58Format) : undefined;
  if (!address) {
    logger.debug({ call: extrinsic.call.name }, 'Skipping transfer to an unsupported beneficiary');
    return undefined;
  }

  return { assets: assets.value, beneficiary: address, destination };
}

function interpretExtrinsic(extrinsic: DecodedExtrinsic, index: number, context: ChainContext): SentIntent[] {
  const { name, pallet } = extrinsic.call;
  const imposed = XCM_PALLETS.includes(pallet) ? TRANSFER_CALLS.get(name) : undefined;
  if (!imposed) return [];

  const sender = extrinsic.signed ? resolveSigner(extrinsic.signer, context.ss58Format) : undefined;
  if (!sender) {
    logger.debug({ call: `${pallet}.${name}`, index }, 'Skipping unsigned or unreadable sender');
    return [];
  }

  const call = readTransferCall(extrinsic, context);
  const assets = call ? readV3Assets(call.assets) : undefined;
  if (!call || !assets) return [];

  const intents: SentIntent[] = [];
  assets.forEach((asset, position) => {
    const ref =
      asset?.id.kind === 'Concrete' && asset.fun.kind === 'Fungible' ? identifyAsset(asset.id.location, context) : undefined;
    if (!asset || asset.fun.kind !== 'Fungible' || !ref) {
      logger.debug({ index, position }, 'Dropping unsupported asset');
      return;
    }

    const transferType = imposed === 'derived' ? deriveTransferType(ref, call.destination, context) : imposed;
    if (!transferType) {
      logger.debug(
        { destination: describeChain(call.destination), index, position },
        'Dropping asset whose reserve is neither side of the transfer'
      );
      return;
    }

    intents.push({
      asset: ref,
      beneficiary: call.beneficiary,
      destinationChain: call.destination,
      kind: 'sent',
      rawAmount: asset.fun.amount,
      sender,
      transferType,
    });
  });
  return intents;
}

/**
 * Sent transfers of one block, in extrinsic order, then asset order.
 */
export function interpretExtrinsics(extrinsics: readonly DecodedExtrinsic[], context: ChainContext): SentIntent[] {
  return extrinsics.flatMap((extrinsic, index) => interpretExtrinsic(extrinsic, index, context));
}
