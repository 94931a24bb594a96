/**
 * Error hierarchy for the indexer.
 *
 * Domain errors carry a stable code and severity so the CLI can map them to
 * exit codes, and a free-form context for structured logging.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message, context?.cause === undefined ? undefined : { cause: context.cause });
    this.timestamp = new Date().toISOString();
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;
}

/**
 * The node does not know the requested block.
 */
export class BlockNotFoundError extends DomainError {
  readonly code = 'BLOCK_NOT_FOUND';
  readonly severity = 'error' as const;

  constructor(
    public readonly blockRef: string,
    context?: DomainErrorContext
  ) {
    super(`Block ${blockRef} was not found on the node`, context);
  }
}

/**
 * The node's runtime no longer matches the schema the indexer was built against.
 */
export class SchemaMismatchError extends DomainError {
  readonly code = 'SCHEMA_MISMATCH';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly mismatchedItems: string[],
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * JSON-RPC level failure reported by the node.
 */
export class RpcError extends DomainError {
  readonly code = 'RPC_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly rpcCode?: number | undefined,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Transport failure: the connection could not be opened, dropped, or timed out.
 */
export class ConnectionError extends DomainError {
  readonly severity = 'error' as const;

  constructor(
    public readonly code: 'CONNECTION_FAILED' | 'CONNECTION_CLOSED' | 'REQUEST_TIMEOUT',
    message: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Settings are missing or invalid.
 */
export class ConfigurationError extends DomainError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly severity = 'error' as const;
}
