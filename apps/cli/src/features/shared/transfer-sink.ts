import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { wrapError, type Transfer } from '@xcm-indexer/core';
import { serializeTransfers } from '@xcm-indexer/xcm';
import { ok, type Result } from 'neverthrow';

/**
 * Where a command puts the JSON array of each block's transfers.
 */
export interface TransferSink {
  write(transfers: readonly Transfer[]): Promise<Result<void, Error>>;
}

export class StreamSink implements TransferSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(transfers: readonly Transfer[]): Promise<Result<void, Error>> {
    const text = `${serializeTransfers(transfers)}\n`;
    return new Promise((resolve) => {
      this.stream.write(text, (error) => {
        resolve(error ? wrapError<void>(error, 'Failed to write transfers') : ok(undefined));
      });
    });
  }
}

/**
 * `write` replaces the file on every call, `append` adds to it.
 * Missing parent directories are created.
 */
export class FileSink implements TransferSink {
  constructor(
    readonly filePath: string,
    private readonly mode: 'append' | 'write'
  ) {}

  async write(transfers: readonly Transfer[]): Promise<Result<void, Error>> {
    const text = `${serializeTransfers(transfers)}\n`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      if (this.mode === 'append') {
        await appendFile(this.filePath, text, 'utf8');
      } else {
        await writeFile(this.filePath, text, 'utf8');
      }
      return ok(undefined);
    } catch (error) {
      return wrapError(error, `Failed to write transfers to ${this.filePath}`);
    }
  }
}

export function createTransferSink(outputFile: string | undefined, mode: 'append' | 'write'): TransferSink {
  return outputFile ? new FileSink(outputFile, mode) : new StreamSink();
}
