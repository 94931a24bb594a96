import { ConnectionError } from '@xcm-indexer/core';
import { getLogger } from '@xcm-indexer/logger';
import { calculateExponentialBackoff, delay } from '@xcm-indexer/resilience';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('FinalizedBlockStream');

export type StopSubscription = () => Promise<void>;

/**
 * What the stream needs from a node connection.
 */
export interface FinalizedHeadSource {
  subscribeFinalizedHeads(
    onHead: (number: number) => void,
    onDisconnect: (error: ConnectionError) => void
  ): Promise<Result<StopSubscription, Error>>;
  getBlockHash(number: number): Promise<Result<string, Error>>;
  /** Drops the current connection and opens a new one. */
  reconnect(): Promise<Result<void, Error>>;
}

export interface FinalizedBlockRef {
  number: number;
  hash: string;
}

/**
 * Processes one finalized block. A ConnectionError makes the stream reconnect
 * and retry the block; any other error stops the stream.
 */
export type FinalizedBlockHandler = (block: FinalizedBlockRef) => Promise<Result<void, Error>>;

export interface FinalizedBlockStreamOptions {
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
}

type StreamEvent = { kind: 'head'; number: number } | { kind: 'disconnected' } | { kind: 'stopped' };

type SessionEnd = 'disconnected' | 'stopped';

class EventQueue<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T) => void) | undefined;

  push(item: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  next(): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}

function isTransient(error: Error): boolean {
  return error instanceof ConnectionError;
}

/**
 * Feeds every finalized block, in order and without gaps, to a handler.
 *
 * The first head received sets the starting point. Heads at or below the last
 * processed block are ignored; a head further ahead replays the blocks in
 * between by number. When the connection drops the stream reconnects with
 * exponential backoff and resumes after the last processed block.
 */
export class FinalizedBlockStream {
  private cursor: number | undefined;
  private attempt = 0;

  constructor(
    private readonly source: FinalizedHeadSource,
    private readonly options: FinalizedBlockStreamOptions
  ) {}

  /** Number of the last block the handler completed. */
  get lastProcessed(): number | undefined {
    return this.cursor;
  }

  /**
   * Runs until `signal` aborts (ok) or the handler fails with a non-transient
   * error (err).
   */
  async run(handler: FinalizedBlockHandler, signal?: AbortSignal): Promise<Result<void, Error>> {
    let connected = true;

    while (!signal?.aborted) {
      if (!connected) {
        this.attempt++;
        const waitMs = calculateExponentialBackoff(
          this.attempt,
          this.options.reconnectBaseDelayMs,
          this.options.reconnectMaxDelayMs
        );
        logger.warn({ attempt: this.attempt, delayMs: waitMs, lastProcessed: this.cursor }, 'Reconnecting to node');
        await delay(waitMs, signal);
        if (signal?.aborted) break;

        const reconnected = await this.source.reconnect();
        if (reconnected.isErr()) {
          logger.warn({ attempt: this.attempt, error: reconnected.error.message }, 'Reconnect failed');
          continue;
        }
        connected = true;
      }

      const session = await this.follow(handler, signal);
      if (session.isErr()) return err(session.error);
      if (session.value === 'stopped') break;
      connected = false;
    }

    logger.info({ lastProcessed: this.cursor }, 'Finalized block stream stopped');
    return ok(undefined);
  }

  private async follow(handler: FinalizedBlockHandler, signal?: AbortSignal): Promise<Result<SessionEnd, Error>> {
    const queue = new EventQueue<StreamEvent>();
    const onAbort = () => queue.push({ kind: 'stopped' });
    signal?.addEventListener('abort', onAbort, { once: true });

    const stop = await this.source.subscribeFinalizedHeads(
      (number) => queue.push({ kind: 'head', number }),
      () => queue.push({ kind: 'disconnected' })
    );
    if (stop.isErr()) {
      signal?.removeEventListener('abort', onAbort);
      if (!isTransient(stop.error)) return err(stop.error);
      logger.warn({ error: stop.error.message }, 'Subscription failed');
      return ok('disconnected');
    }
    this.attempt = 0;

    try {
      for (;;) {
        const event = await queue.next();
        if (event.kind !== 'head') return ok(event.kind);
        if (signal?.aborted) return ok('stopped');

        const caughtUp = await this.catchUp(event.number, handler, signal);
        if (caughtUp.isErr()) {
          if (!isTransient(caughtUp.error)) return err(caughtUp.error);
          logger.warn({ error: caughtUp.error.message }, 'Lost the node while processing blocks');
          return ok('disconnected');
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await stop.value();
    }
  }

  private async catchUp(head: number, handler: FinalizedBlockHandler, signal?: AbortSignal): Promise<Result<void, Error>> {
    if (this.cursor !== undefined && head <= this.cursor) {
      logger.debug({ head, lastProcessed: this.cursor }, 'Ignoring a head that was already processed');
      return ok(undefined);
    }

    const from = this.cursor === undefined ? head : this.cursor + 1;
    if (head > from) {
      logger.info({ from, to: head - 1 }, 'Replaying missed finalized blocks');
    }

    for (let number = from; number <= head; number++) {
      if (signal?.aborted) return ok(undefined);

      const hash = await this.source.getBlockHash(number);
      if (hash.isErr()) return err(hash.error);

      const handled = await handler({ hash: hash.value, number });
      if (handled.isErr()) return err(handled.error);
      this.cursor = number;
    }
    return ok(undefined);
  }
}
