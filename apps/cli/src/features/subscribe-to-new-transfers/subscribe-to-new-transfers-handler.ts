import type { AssetHubBlockSource, FinalizedBlockStreamOptions } from '@xcm-indexer/blockchain-providers';
import { getLogger } from '@xcm-indexer/logger';
import { err, type Result } from 'neverthrow';

import { extractBlockTransfers } from '../shared/block-transfers.js';
import type { TransferSink } from '../shared/transfer-sink.js';

const logger = getLogger('SubscribeToNewTransfersHandler');

export interface SubscriptionProgress {
  blocks: number;
  transfers: number;
}

/**
 * Writes the transfers of every newly finalized block to a sink, one JSON
 * array per block, in finalization order.
 */
export class SubscribeToNewTransfersHandler {
  private readonly progress: SubscriptionProgress = { blocks: 0, transfers: 0 };

  constructor(
    private readonly source: AssetHubBlockSource,
    private readonly sink: TransferSink,
    private readonly options: FinalizedBlockStreamOptions
  ) {}

  /** Blocks and transfers written so far. */
  get written(): Readonly<SubscriptionProgress> {
    return this.progress;
  }

  /**
   * Runs until `signal` aborts (ok) or a block fails for a reason other than
   * a lost connection (err).
   */
  execute(signal?: AbortSignal): Promise<Result<void, Error>> {
    return this.source.subscribeFinalized(
      async (block) => {
        const transfers = await extractBlockTransfers(this.source, block);
        if (transfers.isErr()) return err(transfers.error);

        const written = await this.sink.write(transfers.value);
        if (written.isErr()) return err(written.error);

        this.progress.blocks++;
        this.progress.transfers += transfers.value.length;
        logger.debug({ blockNumber: block.number, transfers: transfers.value.length }, 'Block processed');
        return written;
      },
      this.options,
      signal
    );
  }
}
