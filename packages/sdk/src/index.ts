/**
 * @clusterops/sdk — Resilient client for the cluster management API
 */

// Client
export { ManagementClient, authFromEnv } from './client.js';
export type { RetryConfig, ManagementClientOptions, CallOptions, ResourceEntry } from './client.js';

// Resilience
export { ResilienceEngine, summarizeErrorBody } from './resilience.js';
export type { RequestFactory, ExecuteOptions, ResilienceEngineOptions } from './resilience.js';
export {
  ErrorClassifier,
  classifyFailure,
  categorizeStatus,
  categorizeTransportError,
  isRetryableStatus,
} from './error-classifier.js';
export type { RawFailure, Classification } from './error-classifier.js';
export { exponentialBackoffMs, parseRetryAfter, computeRetryDelay, decideRetry, sleep } from './retry.js';
export type { RetryDecision, SleepFn } from './retry.js';
export { CircuitBreaker, countsAgainstCircuit } from './circuit-breaker.js';
export type { CircuitState, CircuitBreakerConfig } from './circuit-breaker.js';

// Metrics
export { MetricsCollector, InMemoryMetricsRecorder } from './metrics.js';
export type { MetricsRecorder, MetricLabels, MetricsSnapshot, HistogramSummary } from './metrics.js';

// Session
export { SessionManager } from './session.js';
export type { AuthStrategy, SessionCredentials, LoginFn, SessionManagerOptions } from './session.js';

// Transactions
export { TransactionManager, archiveTimestamp } from './transaction-manager.js';
export type {
  TransactionExecutor,
  TransactionManagerOptions,
  CommitOptions,
  CommitResult,
  HistoryEntry,
} from './transaction-manager.js';

// Errors
export {
  ClusterOpsError,
  ConnectionError,
  TimeoutError,
  TlsError,
  UnknownTransportError,
  ApiError,
  AuthenticationError,
  TokenRefreshError,
  ForbiddenError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  BackpressureError,
  ResponseParseError,
  RetryExhaustedError,
  CircuitOpenError,
  CancelledError,
  ValidationError,
  TransactionLogError,
  TransactionFailedError,
  TransactionCancelledError,
  summarizeRollback,
} from './errors.js';
export type { RollbackFailure, RollbackOutcome } from './errors.js';

// Re-export core types consumers will need
export type {
  Transaction,
  TransactionOperation,
  TransactionOperationKind,
  TransactionStatus,
  ErrorCategory,
  CreateIndexParams,
  ModifyIndexParams,
  CreateUserParams,
  ModifyUserParams,
  CreateRoleParams,
  ModifyRoleParams,
  CreateMacroParams,
  UpdateMacroParams,
  CreateSavedSearchParams,
  UpdateSavedSearchParams,
} from '@clusterops/core';
