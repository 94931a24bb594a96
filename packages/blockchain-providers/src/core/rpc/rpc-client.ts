import { ConnectionError, getErrorMessage, RpcError } from '@xcm-indexer/core';
import { getLogger, type Logger } from '@xcm-indexer/logger';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import {
  JsonRpcMessageSchema,
  SubscriptionIdSchema,
  type JsonRpcNotification,
  type JsonRpcResponse,
} from './rpc.schemas.js';
import type { RpcTransport } from './transport.js';

/** Output type `T`, any input. Lets schemas with transforms through. */
export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface RpcClientOptions {
  requestTimeoutMs: number;
}

export interface SubscriptionMethods {
  subscribe: string;
  unsubscribe: string;
}

export interface Subscription {
  readonly id: string;
  unsubscribe(): Promise<Result<void, Error>>;
}

interface PendingRequest {
  method: string;
  /** Runs synchronously with the response, before any later frame is handled. */
  onResult?: ((result: unknown) => void) | undefined;
  settle: (result: Result<unknown, Error>) => void;
}

/**
 * JSON-RPC 2.0 client over a single transport. Requests resolve to Results;
 * nothing here throws. Once the transport closes every pending request fails
 * with CONNECTION_CLOSED and the client stays closed.
 */
export class RpcClient {
  private readonly logger: Logger;
  private nextId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly subscriptions = new Map<string, (result: unknown) => void>();
  private readonly disconnectListeners = new Set<(error: ConnectionError) => void>();
  private closedError: ConnectionError | undefined;
  private closing = false;

  private constructor(
    private readonly transport: RpcTransport,
    private readonly options: RpcClientOptions
  ) {
    this.logger = getLogger('RpcClient');
  }

  static async connect(transport: RpcTransport, options: RpcClientOptions): Promise<Result<RpcClient, ConnectionError>> {
    const client = new RpcClient(transport, options);
    transport.onMessage((frame) => client.handleFrame(frame));
    transport.onClose((reason) => client.handleClose(reason));

    const opened = await transport.open();
    return opened.map(() => client);
  }

  get isConnected(): boolean {
    return this.closedError === undefined;
  }

  get url(): string {
    return this.transport.url;
  }

  async request<T>(method: string, params: unknown[], schema: ResponseSchema<T>): Promise<Result<T, Error>> {
    const response = await this.call(method, params);
    return response.andThen((raw) => this.parse(method, raw, schema));
  }

  /**
   * Opens a subscription. The handler is registered as soon as the node
   * answers, so no notification that follows the answer is missed.
   */
  async subscribe<T>(
    methods: SubscriptionMethods,
    params: unknown[],
    schema: ResponseSchema<T>,
    onItem: (item: T) => void
  ): Promise<Result<Subscription, Error>> {
    const register = (raw: unknown) => {
      const id = SubscriptionIdSchema.safeParse(raw);
      if (!id.success) return;
      this.subscriptions.set(id.data, (result) => {
        const item = this.parse(methods.subscribe, result, schema);
        if (item.isErr()) {
          this.logger.warn({ error: item.error.message, subscription: id.data }, 'Dropping malformed notification');
          return;
        }
        onItem(item.value);
      });
    };

    const response = await this.call(methods.subscribe, params, register);
    return response
      .andThen((raw) => this.parse(methods.subscribe, raw, SubscriptionIdSchema))
      .map((id) => ({
        id,
        unsubscribe: () => this.unsubscribe(methods.unsubscribe, id),
      }));
  }

  /**
   * Registers a listener for an unexpected loss of the connection. Not called
   * after close().
   */
  onDisconnect(listener: (error: ConnectionError) => void): () => void {
    this.disconnectListeners.add(listener);
    return () => this.disconnectListeners.delete(listener);
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    await this.transport.close();
    if (!this.closedError) {
      this.handleClose('closed by client');
    }
  }

  private async unsubscribe(method: string, id: string): Promise<Result<void, Error>> {
    this.subscriptions.delete(id);
    if (this.closedError) return ok(undefined);
    const response = await this.call(method, [id]);
    return response.map(() => undefined);
  }

  private call(method: string, params: unknown[], onResult?: (result: unknown) => void): Promise<Result<unknown, Error>> {
    if (this.closedError) {
      return Promise.resolve(err(this.closedError));
    }

    const id = this.nextId++;
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        this.logger.warn({ method, timeoutMs: this.options.requestTimeoutMs }, 'Request timed out');
        resolve(
          err(new ConnectionError('REQUEST_TIMEOUT', `${method} timed out after ${this.options.requestTimeoutMs}ms`))
        );
      }, this.options.requestTimeoutMs);

      this.pending.set(id, {
        method,
        onResult,
        settle: (result) => {
          clearTimeout(timer);
          resolve(result);
        },
      });

      this.logger.trace({ id, method }, 'Sending request');
      const sent = this.transport.send(JSON.stringify({ id, jsonrpc: '2.0', method, params }));
      if (sent.isErr()) {
        this.pending.delete(id);
        clearTimeout(timer);
        resolve(err(sent.error));
      }
    });
  }

  private parse<T>(method: string, raw: unknown, schema: ResponseSchema<T>): Result<T, Error> {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      return ok(parsed.data);
    }

    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    this.logger.error({ method, truncatedPayload: JSON.stringify(raw)?.slice(0, 500) }, 'Response validation failed');
    return err(new RpcError(`Unexpected ${method} response: ${issues}`));
  }

  private handleFrame(frame: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(frame);
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error) }, 'Ignoring a frame that is not JSON');
      return;
    }

    const message = JsonRpcMessageSchema.safeParse(payload);
    if (!message.success) {
      this.logger.warn({ frame: frame.slice(0, 200) }, 'Ignoring a message that is not JSON-RPC');
      return;
    }

    if ('id' in message.data) {
      this.handleResponse(message.data);
    } else {
      this.handleNotification(message.data);
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    const request = this.pending.get(response.id);
    if (!request) {
      this.logger.debug({ id: response.id }, 'Response for a request that is no longer pending');
      return;
    }
    this.pending.delete(response.id);

    if (response.error) {
      request.settle(
        err(new RpcError(`${request.method} failed: ${response.error.message}`, response.error.code))
      );
      return;
    }
    request.onResult?.(response.result);
    request.settle(ok(response.result));
  }

  private handleNotification(notification: JsonRpcNotification): void {
    const handler = this.subscriptions.get(notification.params.subscription);
    if (!handler) {
      this.logger.debug(
        { method: notification.method, subscription: notification.params.subscription },
        'Notification for an unknown subscription'
      );
      return;
    }
    handler(notification.params.result);
  }

  private handleClose(reason: string): void {
    if (this.closedError) return;

    const error = new ConnectionError('CONNECTION_CLOSED', `Connection to ${this.transport.url} closed (${reason})`);
    this.closedError = error;
    for (const request of this.pending.values()) {
      request.settle(err(error));
    }
    this.pending.clear();
    this.subscriptions.clear();

    if (this.closing) return;
    this.logger.warn({ reason, url: this.transport.url }, 'Node connection lost');
    for (const listener of this.disconnectListeners) {
      listener(error);
    }
  }
}
