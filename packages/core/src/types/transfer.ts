import type { Decimal } from 'decimal.js';

import type { Chain } from './chain.js';

export type TransferType = 'Teleport' | 'Reserve';

/**
 * Display name and precision of an asset, as read from the chain.
 */
export interface AssetInfo {
  name: string;
  decimals: number;
}

export interface ReceivedTransfer {
  readonly kind: 'received';
  readonly blockNumber: number;
  readonly originChain: Chain;
  readonly beneficiary: string;
  readonly asset: string;
  readonly amount: Decimal;
  readonly transferType: TransferType;
}

export interface SentTransfer {
  readonly kind: 'sent';
  readonly blockNumber: number;
  readonly destinationChain: Chain;
  readonly sender: string;
  readonly beneficiary: string;
  readonly asset: string;
  readonly amount: Decimal;
  readonly transferType: TransferType;
}

export type Transfer = ReceivedTransfer | SentTransfer;

export function createReceivedTransfer(fields: Omit<ReceivedTransfer, 'kind'>): ReceivedTransfer {
  return Object.freeze({ ...fields, kind: 'received' });
}

export function createSentTransfer(fields: Omit<SentTransfer, 'kind'>): SentTransfer {
  return Object.freeze({ ...fields, kind: 'sent' });
}
