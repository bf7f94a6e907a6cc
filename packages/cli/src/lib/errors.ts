/**
 * Operator-facing error text.
 */
import { ClusterOpsError, RetryExhaustedError, TransactionFailedError } from '@clusterops/sdk';

/**
 * One or two lines for the operator. Never includes credentials: SDK error
 * messages are built without them.
 */
export function describeError(err: unknown): string[] {
  if (err instanceof TransactionFailedError) {
    return [`Error: Transaction ${err.transactionId} failed.`, `  ${err.message}`];
  }
  if (err instanceof RetryExhaustedError) {
    return [
      `Error: ${err.method} ${err.endpoint} kept failing after ${err.attempts} attempt(s).`,
      `  ${err.lastError.message}`,
    ];
  }
  if (err instanceof ClusterOpsError) {
    switch (err.name) {
      case 'ConnectionError':
      case 'TlsError':
      case 'TimeoutError':
        return [
          'Error: Cannot reach the management API.',
          `  ${err.message}`,
          '  Check the url with: clusterops config get',
        ];
      case 'AuthenticationError':
      case 'TokenRefreshError':
        return [
          'Error: Authentication failed.',
          '  Set credentials with: clusterops config set api-token <token> (or username and password)',
        ];
      default:
        return [`Error: ${err.message}`];
    }
  }
  if (err instanceof Error) return [`Error: ${err.message}`];
  return [`Error: ${String(err)}`];
}
