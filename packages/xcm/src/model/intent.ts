import type { Chain, TransferType } from '@xcm-indexer/core';

import type { AssetRef } from '../resolver/asset-ref.js';

/**
 * A detected transfer whose asset has not been resolved yet.
 */
export interface ReceivedIntent {
  readonly kind: 'received';
  readonly originChain: Chain;
  readonly beneficiary: string;
  readonly asset: AssetRef;
  readonly rawAmount: bigint;
  readonly transferType: TransferType;
}

export interface SentIntent {
  readonly kind: 'sent';
  readonly destinationChain: Chain;
  readonly sender: string;
  readonly beneficiary: string;
  readonly asset: AssetRef;
  readonly rawAmount: bigint;
  readonly transferType: TransferType;
}

export type TransferIntent = ReceivedIntent | SentIntent;
