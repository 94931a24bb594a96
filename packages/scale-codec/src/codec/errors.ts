export type DecodeErrorCode =
  | 'INSUFFICIENT_BYTES'
  | 'UNKNOWN_VARIANT'
  | 'UNKNOWN_TYPE'
  | 'INVALID_VALUE'
  | 'TRAILING_BYTES'
  | 'UNSUPPORTED_FORMAT';

export type EncodeErrorCode = 'UNKNOWN_TYPE' | 'SHAPE_MISMATCH' | 'UNKNOWN_VARIANT' | 'OUT_OF_RANGE';

export class DecodeError extends Error {
  constructor(
    public readonly code: DecodeErrorCode,
    message: string,
    public readonly offset?: number | undefined
  ) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
    this.name = 'DecodeError';
  }
}

export class EncodeError extends Error {
  constructor(
    public readonly code: EncodeErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'EncodeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
