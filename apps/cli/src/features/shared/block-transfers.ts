import type { AssetHubBlockSource } from '@xcm-indexer/blockchain-providers';
import type { Transfer } from '@xcm-indexer/core';
import { extractTransfers, type BlockContents } from '@xcm-indexer/xcm';
import type { Result } from 'neverthrow';

/**
 * Transfers of `block`, with registry assets resolved at that block.
 */
export function extractBlockTransfers(
  source: AssetHubBlockSource,
  block: BlockContents
): Promise<Result<Transfer[], Error>> {
  return extractTransfers(block, (refs) => source.fetchAssetMetadata(refs, block.hash), source.context);
}
