import { err, type Result } from 'neverthrow';

export function isErrorWithMessage(error: unknown): error is Error & { message: string } {
  return error instanceof Error && typeof error.message === 'string';
}

/**
 * Message of an unknown thrown value.
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return defaultMessage || String(error);
}

/**
 * Err wrapping a thrown value, prefixed with `context` and keeping it as the cause.
 */
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  return err(new Error(`${context}: ${getErrorMessage(error)}`, { cause: error }));
}
