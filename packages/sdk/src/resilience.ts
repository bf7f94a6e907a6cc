/**
 * @clusterops/sdk — Request Resilience Engine
 *
 * Runs one logical API call as a series of attempts: attempt 1 always, then
 * up to `maxRetries` retries for failures the classifier marks retryable.
 * Success hands the unread Response back to the caller.
 */
import type { Logger } from '@clusterops/core';
import { createLogger, DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_RETRIES, DEFAULT_TIMEOUT_MS } from '@clusterops/core';
import { CircuitBreaker, countsAgainstCircuit } from './circuit-breaker.js';
import type { Classification } from './error-classifier.js';
import { ErrorClassifier } from './error-classifier.js';
import {
  ApiError,
  AuthenticationError,
  BackpressureError,
  CancelledError,
  ClusterOpsError,
  ConnectionError,
  ForbiddenError,
  InvalidRequestError,
  NotFoundError,
  RateLimitError,
  RetryExhaustedError,
  TimeoutError,
  TlsError,
  UnknownTransportError,
} from './errors.js';
import { MetricsCollector } from './metrics.js';
import type { SleepFn } from './retry.js';
import { decideRetry, parseRetryAfter, sleep as timerSleep } from './retry.js';

/** Builds and sends one attempt. Called again for every retry. */
export type RequestFactory = (signal: AbortSignal) => Promise<Response>;

export interface ExecuteOptions {
  /** Endpoint label for metrics and errors, e.g. `/services/data/indexes` */
  endpoint: string;
  method: string;
  /** Overrides the engine default for this call */
  maxRetries?: number;
  signal?: AbortSignal;
  /** Full URL, used in error messages (defaults to the endpoint label) */
  url?: string;
}

export interface ResilienceEngineOptions {
  /** Per-attempt timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Default retry budget (default: 3) */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  metrics?: MetricsCollector;
  circuitBreaker?: CircuitBreaker | null;
  logger?: Logger;
  sleep?: SleepFn;
  now?: () => number;
}

type AttemptOutcome =
  | { ok: true; response: Response }
  | { ok: false; error: ClusterOpsError; classification: Classification; retryAfterMs: number | null };

interface ErrorBody {
  messages?: Array<{ type?: string; text?: string }>;
  error?: string;
}

function isErrorBody(value: unknown): value is ErrorBody {
  return typeof value === 'object' && value !== null;
}

/**
 * Turn an error response body into one line of text.
 * Understands `{ messages: [{ type, text }] }` and `{ error }`.
 */
export function summarizeErrorBody(text: string, status: number): string {
  let parsed: unknown = null;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = null;
  }
  if (isErrorBody(parsed)) {
    const texts = (parsed.messages ?? [])
      .map((m) => m.text)
      .filter((t): t is string => typeof t === 'string' && t.length > 0);
    if (texts.length > 0) return texts.join('; ');
    if (typeof parsed.error === 'string' && parsed.error.length > 0) return parsed.error;
  }
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : `HTTP ${status}`;
}

export class ResilienceEngine {
  readonly metrics: MetricsCollector;
  private readonly classifier: ErrorClassifier;
  private readonly breaker: CircuitBreaker | null;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly log: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(options: ResilienceEngineOptions = {}) {
    this.metrics = options.metrics ?? MetricsCollector.disabled();
    this.classifier = new ErrorClassifier(this.metrics);
    this.breaker = options.circuitBreaker ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.log = options.logger ?? createLogger('clusterops:resilience');
    this.sleep = options.sleep ?? timerSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Execute `request` until success, a non-retryable failure, or exhaustion.
   *
   * @throws RetryExhaustedError when every allowed attempt failed retryably
   * @throws CancelledError when `signal` aborts before or between attempts
   * @throws the mapped typed error for any non-retryable failure
   */
  async execute(request: RequestFactory, options: ExecuteOptions): Promise<Response> {
    const { endpoint, method, signal } = options;
    const maxRetries = options.maxRetries ?? this.maxRetries;
    const url = options.url ?? endpoint;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError(`${method} ${endpoint} cancelled before attempt ${attempt}`);
      }
      this.breaker?.check(endpoint);

      this.metrics.recordRequest(endpoint, method);
      if (attempt > 1) this.metrics.recordRetry(endpoint, method, attempt);

      let outcome: AttemptOutcome;
      try {
        outcome = await this.attempt(request, { endpoint, method, url, signal });
      } catch (err) {
        this.breaker?.release(endpoint);
        throw err;
      }
      if (outcome.ok) {
        this.breaker?.recordSuccess(endpoint);
        return outcome.response;
      }

      const { error, classification, retryAfterMs } = outcome;
      if (countsAgainstCircuit(classification.category)) {
        this.breaker?.recordFailure(endpoint);
      } else {
        this.breaker?.recordSuccess(endpoint);
      }

      const decision = decideRetry({
        retryable: classification.retryable,
        attempt,
        maxRetries,
        retryAfterMs,
        baseDelayMs: this.baseDelayMs,
      });

      if (!decision.retry) {
        this.metrics.recordError(endpoint, method, classification.category);
        if (!classification.retryable) throw error;
        this.log.debug('Retries exhausted', { endpoint, method, attempts: attempt, category: classification.category });
        throw new RetryExhaustedError(attempt, error, endpoint, method);
      }

      this.log.debug('Attempt failed, retrying', {
        endpoint,
        method,
        attempt,
        category: classification.category,
        waitMs: decision.waitMs,
      });
      await this.sleep(decision.waitMs, signal);
    }
  }

  private async attempt(
    request: RequestFactory,
    ctx: { endpoint: string; method: string; url: string; signal?: AbortSignal },
  ): Promise<AttemptOutcome> {
    const { endpoint, method, url, signal } = ctx;
    const labels = { endpoint, method };
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const started = this.now();
    try {
      let response: Response;
      try {
        response = await request(controller.signal);
      } catch (err) {
        this.metrics.recordRequestDuration(endpoint, method, this.now() - started, null);
        if (signal?.aborted && !timedOut) {
          throw new CancelledError(`${method} ${endpoint} cancelled`);
        }
        // Errors raised while building the request (credential refresh) are already typed.
        if (err instanceof ClusterOpsError) {
          this.metrics.recordError(endpoint, method, err.category ?? 'unknown');
          throw err;
        }
        if (timedOut) {
          const error = new TimeoutError(`Request to ${url} timed out after ${this.timeoutMs}ms`, this.timeoutMs);
          const classification = this.classifier.classify({ kind: 'transport', error }, labels);
          return { ok: false, error, classification, retryAfterMs: null };
        }
        const classification = this.classifier.classify({ kind: 'transport', error: err }, labels);
        return { ok: false, error: this.transportError(err, classification, url), classification, retryAfterMs: null };
      }

      this.metrics.recordRequestDuration(endpoint, method, this.now() - started, response.status);
      if (response.ok) return { ok: true, response };

      const classification = this.classifier.classify({ kind: 'http', status: response.status }, labels);
      const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'), this.now());
      const error = await this.httpError(response, classification, url, retryAfterMs);
      return { ok: false, error, classification, retryAfterMs };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private transportError(err: unknown, classification: Classification, url: string): ClusterOpsError {
    const reason = err instanceof Error ? err.message : String(err);
    switch (classification.category) {
      case 'timeout':
        return new TimeoutError(`Request to ${url} timed out: ${reason}`, this.timeoutMs);
      case 'tls':
        return new TlsError(`TLS failure talking to ${url}: ${reason}`, err);
      case 'transport':
        return new ConnectionError(`Failed to connect to ${url}: ${reason}`, err);
      default:
        return new UnknownTransportError(`Request to ${url} failed: ${reason}`, err);
    }
  }

  private async httpError(
    response: Response,
    classification: Classification,
    url: string,
    retryAfterMs: number | null,
  ): Promise<ClusterOpsError> {
    const text = await response.text().catch(() => '');
    const message = summarizeErrorBody(text, response.status);

    switch (response.status) {
      case 400:
        return new InvalidRequestError(message, url);
      case 401:
        return new AuthenticationError(message);
      case 403:
        return new ForbiddenError(message, url);
      case 404:
        return new NotFoundError(message, url);
      case 429:
        return new RateLimitError(message, url, retryAfterMs);
      case 503:
        return new BackpressureError(message, url);
      default:
        return new ApiError(message, response.status, url, classification.category);
    }
  }
}
