/**
 * Helpers for turning unknown thrown values into printable messages.
 */

/**
 * Extracts a string message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wraps an error with context, keeping the original as `cause`.
 */
export function wrapError(error: unknown, context: string): Error {
  return new Error(`${context}: ${getErrorMessage(error)}`, { cause: error });
}

/**
 * Normalizes a thrown value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
