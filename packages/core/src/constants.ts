/**
 * @clusterops/core — Shared Constants
 */

// ─── Request Resilience ─────────────────────────────────────────────

/** Default number of retries after the initial attempt */
export const DEFAULT_MAX_RETRIES = 3;

/** Base delay for exponential backoff (first retry waits this long) */
export const DEFAULT_BASE_DELAY_MS = 1_000;

/** Per-attempt connect/response timeout */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** HTTP statuses that are worth another attempt */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 502, 503, 504]);

// ─── Session ────────────────────────────────────────────────────────

/** Lifetime assumed for a session token issued by the login endpoint */
export const DEFAULT_SESSION_TTL_SECS = 3_600;

/** Refresh this long before the token would actually expire */
export const DEFAULT_EXPIRY_BUFFER_SECS = 60;

// ─── Circuit Breaker ────────────────────────────────────────────────

export const DEFAULT_CIRCUIT_FAILURE_THRESHOLD = 5;
export const DEFAULT_CIRCUIT_FAILURE_WINDOW_MS = 60_000;
export const DEFAULT_CIRCUIT_RESET_TIMEOUT_MS = 30_000;
export const DEFAULT_CIRCUIT_HALF_OPEN_REQUESTS = 1;

// ─── Transactions ───────────────────────────────────────────────────

/** Upper bound for each compensating call made during rollback */
export const ROLLBACK_OPERATION_TIMEOUT_MS = 30_000;

/** File (inside the transaction log directory) holding the in-flight transaction */
export const PENDING_TRANSACTION_FILE = 'pending_transaction.json';

/** Directory (inside the transaction log directory) holding archived transactions */
export const TRANSACTION_HISTORY_DIR = 'history';

// ─── Metric Names ───────────────────────────────────────────────────

export const METRIC_REQUESTS_TOTAL = 'clusterops_api_requests_total';
export const METRIC_RETRIES_TOTAL = 'clusterops_api_retries_total';
export const METRIC_ERRORS_TOTAL = 'clusterops_api_errors_total';
export const METRIC_ATTEMPT_FAILURES_TOTAL = 'clusterops_api_attempt_failures_total';
export const METRIC_REQUEST_DURATION = 'clusterops_api_request_duration_seconds';
export const METRIC_DESERIALIZATION_FAILURES = 'clusterops_api_deserialization_failures_total';
export const METRIC_SESSION_REFRESHES = 'clusterops_session_refreshes_total';
export const METRIC_SESSION_REFRESH_FAILURES = 'clusterops_session_refresh_failures_total';
export const METRIC_CIRCUIT_STATE_TRANSITIONS = 'clusterops_circuit_breaker_state_transitions_total';
export const METRIC_CIRCUIT_BLOCKED = 'clusterops_circuit_breaker_blocked_requests_total';
export const METRIC_TRANSACTION_COMMIT_ATTEMPTS = 'clusterops_transaction_commit_attempts_total';
export const METRIC_TRANSACTION_COMMIT_SUCCESSES = 'clusterops_transaction_commit_successes_total';
export const METRIC_TRANSACTION_COMMIT_FAILURES = 'clusterops_transaction_commit_failures_total';
export const METRIC_TRANSACTION_ROLLBACK_ATTEMPTS = 'clusterops_transaction_rollback_attempts_total';
export const METRIC_TRANSACTION_ROLLBACK_FAILURES = 'clusterops_transaction_rollback_failures_total';
