/**
 * @clusterops/sdk — Typed Errors
 *
 * Messages never carry credentials: tokens and passwords stay out of every
 * error constructed here.
 */
import type { ErrorCategory, TransactionOperation } from '@clusterops/core';
import { describeOperation, getErrorMessage } from '@clusterops/core';

/**
 * Base error class for all clusterops SDK errors.
 */
export class ClusterOpsError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly category?: ErrorCategory;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: number,
    code: string,
    options: { category?: ErrorCategory; details?: unknown; cause?: unknown } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ClusterOpsError';
    this.status = status;
    this.code = code;
    this.category = options.category;
    this.details = options.details;
  }
}

// ─── Transport ──────────────────────────────────────────────────────

/**
 * Thrown when the server is unreachable (refused, reset, DNS).
 */
export class ConnectionError extends ClusterOpsError {
  constructor(message: string, cause?: unknown) {
    super(message, 0, 'CONNECTION_ERROR', { category: 'transport', cause });
    this.name = 'ConnectionError';
  }
}

/**
 * Thrown when a single attempt exceeds the client-level timeout.
 */
export class TimeoutError extends ClusterOpsError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, 0, 'TIMEOUT', { category: 'timeout' });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown on TLS handshake or certificate validation failure.
 */
export class TlsError extends ClusterOpsError {
  constructor(message: string, cause?: unknown) {
    super(message, 0, 'TLS_ERROR', { category: 'tls', cause });
    this.name = 'TlsError';
  }
}

/**
 * Thrown for transport failures that could not be recognised.
 */
export class UnknownTransportError extends ClusterOpsError {
  constructor(message: string, cause?: unknown) {
    super(message, 0, 'UNKNOWN_ERROR', { category: 'unknown', cause });
    this.name = 'UnknownTransportError';
  }
}

// ─── HTTP ───────────────────────────────────────────────────────────

/**
 * Generic non-2xx response.
 */
export class ApiError extends ClusterOpsError {
  public readonly url: string;

  constructor(message: string, status: number, url: string, category: ErrorCategory, code = 'API_ERROR') {
    super(message, status, code, { category });
    this.name = 'ApiError';
    this.url = url;
  }
}

/**
 * Thrown when the server returns 401 Unauthorized.
 */
export class AuthenticationError extends ClusterOpsError {
  constructor(message = 'Authentication failed', options: { cause?: unknown } = {}) {
    super(message, 401, 'AUTHENTICATION_ERROR', { category: 'http_4xx', cause: options.cause });
    this.name = 'AuthenticationError';
  }
}

/**
 * Thrown when the session could not be established or refreshed.
 * Every caller waiting on the same refresh receives this error.
 */
export class TokenRefreshError extends AuthenticationError {
  public readonly username: string;

  constructor(username: string, cause: unknown) {
    super(`Token refresh failed for user '${username}': ${getErrorMessage(cause)}`, { cause });
    this.name = 'TokenRefreshError';
    this.username = username;
  }
}

/**
 * Thrown when the server returns 403 Forbidden.
 */
export class ForbiddenError extends ApiError {
  constructor(message: string, url: string) {
    super(message, 403, url, 'http_4xx', 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

/**
 * Thrown when the server returns 404 Not Found.
 */
export class NotFoundError extends ApiError {
  constructor(message: string, url: string) {
    super(message, 404, url, 'http_4xx', 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when the server returns 400 Bad Request.
 */
export class InvalidRequestError extends ApiError {
  constructor(message: string, url: string) {
    super(message, 400, url, 'http_4xx', 'INVALID_REQUEST');
    this.name = 'InvalidRequestError';
  }
}

/**
 * Thrown when the server returns 429 Too Many Requests.
 */
export class RateLimitError extends ApiError {
  /** Wait the server asked for, when its Retry-After header was usable */
  public readonly retryAfterMs: number | null;

  constructor(message: string, url: string, retryAfterMs: number | null = null) {
    super(message, 429, url, 'http_4xx', 'RATE_LIMIT');
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Thrown when the server signals backpressure (503 Service Unavailable).
 */
export class BackpressureError extends ApiError {
  constructor(message: string, url: string) {
    super(message, 503, url, 'http_5xx', 'BACKPRESSURE');
    this.name = 'BackpressureError';
  }
}

/**
 * Thrown when a successful response body does not parse as the expected shape.
 * Never retried: it signals a version mismatch, not a transient fault.
 */
export class ResponseParseError extends ClusterOpsError {
  constructor(message: string, status: number, details?: unknown) {
    super(message, status, 'RESPONSE_PARSE_ERROR', { category: 'unknown', details });
    this.name = 'ResponseParseError';
  }
}

// ─── Engine Boundary ────────────────────────────────────────────────

/**
 * Thrown when every allowed attempt failed with a retryable error.
 */
export class RetryExhaustedError extends ClusterOpsError {
  public readonly attempts: number;
  public readonly lastError: ClusterOpsError;
  public readonly endpoint: string;
  public readonly method: string;

  constructor(attempts: number, lastError: ClusterOpsError, endpoint: string, method: string) {
    super(
      `${method} ${endpoint} failed after ${attempts} attempt(s): ${lastError.message}`,
      lastError.status,
      'RETRY_EXHAUSTED',
      { category: lastError.category, cause: lastError },
    );
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
    this.endpoint = endpoint;
    this.method = method;
  }
}

/**
 * Thrown without contacting the server while an endpoint's circuit is open.
 */
export class CircuitOpenError extends ClusterOpsError {
  public readonly endpoint: string;

  constructor(endpoint: string) {
    super(`Circuit breaker open for ${endpoint}`, 0, 'CIRCUIT_OPEN');
    this.name = 'CircuitOpenError';
    this.endpoint = endpoint;
  }
}

/**
 * Thrown when the caller's AbortSignal fired.
 */
export class CancelledError extends ClusterOpsError {
  constructor(message = 'Operation cancelled') {
    super(message, 0, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

// ─── Transactions ───────────────────────────────────────────────────

/**
 * Thrown when a transaction is rejected before any network call.
 */
export class ValidationError extends ClusterOpsError {
  /** Zero-based position of the offending operation, when there is one */
  public readonly operationIndex?: number;

  constructor(message: string, operationIndex?: number) {
    super(message, 0, 'VALIDATION_ERROR', { details: { operationIndex } });
    this.name = 'ValidationError';
    this.operationIndex = operationIndex;
  }
}

/**
 * Thrown when the transaction log directory cannot be read or written, or
 * holds a record that does not parse.
 */
export class TransactionLogError extends ClusterOpsError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, 0, 'TRANSACTION_LOG_ERROR', { cause });
    this.name = 'TransactionLogError';
    this.path = path;
  }
}

export interface RollbackFailure {
  /** Compensating action that was attempted, or `missing_rollback_path` */
  operation: string;
  resourceName: string;
  error: string;
}

export interface RollbackOutcome {
  /** Operations that had completed before the failure */
  completed: number;
  /** Completed operations whose effect was undone */
  rolledBack: number;
  failures: RollbackFailure[];
}

export function summarizeRollback(outcome: RollbackOutcome): string {
  if (outcome.failures.length === 0) {
    return `rolled back ${outcome.rolledBack} of ${outcome.completed} completed operations`;
  }
  const list = outcome.failures
    .map((f) => `${f.operation} '${f.resourceName}' (${f.error})`)
    .join('; ');
  return `rolled back ${outcome.rolledBack} of ${outcome.completed} completed operations; ` +
    `rollback also failed for these operations, manual cleanup required: ${list}`;
}

/**
 * Thrown when an operation fails during commit. `cause` is the operation's
 * own error; the rollback result rides alongside and never replaces it.
 */
export class TransactionFailedError extends ClusterOpsError {
  public readonly transactionId: string;
  public readonly failedOperation: TransactionOperation;
  public readonly operationIndex: number;
  public readonly rollback: RollbackOutcome;

  constructor(
    transactionId: string,
    failedOperation: TransactionOperation,
    operationIndex: number,
    cause: unknown,
    rollback: RollbackOutcome,
  ) {
    super(
      `Operation ${operationIndex + 1} (${describeOperation(failedOperation)}) failed: ` +
        `${getErrorMessage(cause)}; ${summarizeRollback(rollback)}`,
      cause instanceof ClusterOpsError ? cause.status : 0,
      'TRANSACTION_FAILED',
      { category: cause instanceof ClusterOpsError ? cause.category : undefined, cause },
    );
    this.name = 'TransactionFailedError';
    this.transactionId = transactionId;
    this.failedOperation = failedOperation;
    this.operationIndex = operationIndex;
    this.rollback = rollback;
  }
}

/**
 * Thrown when the caller cancels a commit between operations. Nothing is
 * rolled back; the pending record stays on disk for the operator.
 */
export class TransactionCancelledError extends CancelledError {
  public readonly transactionId: string;
  public readonly completed: TransactionOperation[];

  constructor(transactionId: string, completed: TransactionOperation[]) {
    super(
      `Transaction ${transactionId} cancelled after ${completed.length} completed operation(s); ` +
        'completed operations were not rolled back',
    );
    this.name = 'TransactionCancelledError';
    this.transactionId = transactionId;
    this.completed = completed;
  }
}
