import { safeDecimalToNumber, type Chain, type Transfer, type TransferType } from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';

const logger = getLogger('OutputFormatter');

export type ChainTag =
  | { PolkadotParachain: number }
  | { KusamaParachain: number }
  | { Evm: number }
  | 'Polkadot'
  | 'Kusama'
  | 'Unsupported';

export interface ReceivedTransferJson {
  block_number: number;
  origin_chain: ChainTag;
  beneficiary: string;
  asset: string;
  amount: number;
  transfer_type: TransferType;
}

export interface SentTransferJson {
  block_number: number;
  destination_chain: ChainTag;
  sender: string;
  beneficiary: string;
  asset: string;
  amount: number;
  transfer_type: TransferType;
}

export type TransferJson = { ReceivedTransfer: ReceivedTransferJson } | { SentTransfer: SentTransferJson };

export function formatChain(chain: Chain): ChainTag {
  switch (chain.kind) {
    case 'PolkadotParachain':
      return { PolkadotParachain: chain.id };
    case 'KusamaParachain':
      return { KusamaParachain: chain.id };
    case 'Evm':
      return { Evm: chain.chainId };
    default:
      return chain.kind;
  }
}

export function formatTransfer(transfer: Transfer): TransferJson {
  // JSON numbers are doubles; long fractions get rounded
  const amount = safeDecimalToNumber(transfer.amount, {
    allowPrecisionLoss: true,
    warningCallback: (message) => logger.debug(message),
  });

  if (transfer.kind === 'received') {
    return {
      ReceivedTransfer: {
        block_number: transfer.blockNumber,
        origin_chain: formatChain(transfer.originChain),
        beneficiary: transfer.beneficiary,
        asset: transfer.asset,
        amount,
        transfer_type: transfer.transferType,
      },
    };
  }

  return {
    SentTransfer: {
      block_number: transfer.blockNumber,
      destination_chain: formatChain(transfer.destinationChain),
      sender: transfer.sender,
      beneficiary: transfer.beneficiary,
      asset: transfer.asset,
      amount,
      transfer_type: transfer.transferType,
    },
  };
}

/**
 * Pretty-printed JSON array of a block's transfers.
 */
export function serializeTransfers(transfers: readonly Transfer[]): string {
  return JSON.stringify(transfers.map(formatTransfer), undefined, 2);
}
