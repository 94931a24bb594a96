import type { AssetHubBlockSource } from '@xcm-indexer/blockchain-providers';
import type { Transfer } from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';
import { err, type Result } from 'neverthrow';

import { extractBlockTransfers } from '../shared/block-transfers.js';

const logger = getLogger('GetTransfersAtHandler');

export interface GetTransfersAtParams {
  blockHash: string;
}

/**
 * Decodes one block and returns the transfers it contains.
 * An unknown hash fails with BlockNotFoundError.
 */
export class GetTransfersAtHandler {
  constructor(private readonly source: AssetHubBlockSource) {}

  async execute(params: GetTransfersAtParams): Promise<Result<Transfer[], Error>> {
    const block = await this.source.getBlock(params.blockHash);
    if (block.isErr()) return err(block.error);

    logger.debug(
      { blockNumber: block.value.number, events: block.value.events.length, extrinsics: block.value.extrinsics.length },
      'Fetched block'
    );
    return extractBlockTransfers(this.source, block.value);
  }
}
