/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

/**
 * Normalise an unknown catch value into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(getErrorMessage(err));
}

/**
 * Compile-time exhaustiveness guard for switches over closed unions.
 */
export function assertNever(value: never, context = 'value'): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
