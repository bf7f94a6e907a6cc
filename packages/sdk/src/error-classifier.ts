/**
 * @clusterops/sdk — Error Classifier
 *
 * Maps a raw failure to one ErrorCategory plus a retry verdict.
 *
 *   retryable:     timeout, transport, 429, 502, 503, 504
 *   not retryable: tls, other 4xx, other 5xx, body parse failures, unknown
 */
import type { ErrorCategory } from '@clusterops/core';
import { RETRYABLE_STATUSES } from '@clusterops/core';
import type { MetricsCollector } from './metrics.js';

export type RawFailure =
  | { kind: 'transport'; error: unknown }
  | { kind: 'http'; status: number }
  | { kind: 'parse'; error: unknown };

export interface Classification {
  category: ErrorCategory;
  retryable: boolean;
}

const TIMEOUT_NAMES = new Set(['TimeoutError', 'AbortError']);
const TIMEOUT_MARKERS = ['timed out', 'timeout', 'etimedout', 'und_err_connect_timeout', 'und_err_headers_timeout'];
const TLS_MARKERS = [
  'tls',
  'ssl',
  'certificate',
  'cert_',
  'x509',
  'handshake',
  'self signed',
  'self-signed',
  'unable_to_verify',
  'depth_zero',
];
const TRANSPORT_MARKERS = [
  'econnrefused',
  'econnreset',
  'enotfound',
  'eai_again',
  'ehostunreach',
  'enetunreach',
  'epipe',
  'connection refused',
  'connection reset',
  'socket hang up',
  'other side closed',
  'und_err_socket',
  'network',
  'dns',
  'fetch failed',
];

interface ErrorFacts {
  names: string[];
  text: string;
}

/** Collect name, message and code from an error and its cause chain. */
function collectFacts(error: unknown): ErrorFacts {
  const names: string[] = [];
  const texts: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth++) {
    if (current instanceof Error) {
      names.push(current.name);
      texts.push(current.message);
      if ('code' in current && typeof current.code === 'string') texts.push(current.code);
      current = current.cause;
    } else {
      texts.push(String(current));
      break;
    }
  }
  return { names, text: texts.join(' ').toLowerCase() };
}

/**
 * Categorise a failure that produced no HTTP response.
 */
export function categorizeTransportError(error: unknown): ErrorCategory {
  const { names, text } = collectFacts(error);
  if (names.some((n) => TIMEOUT_NAMES.has(n)) || TIMEOUT_MARKERS.some((m) => text.includes(m))) {
    return 'timeout';
  }
  if (TLS_MARKERS.some((m) => text.includes(m))) return 'tls';
  if (TRANSPORT_MARKERS.some((m) => text.includes(m))) return 'transport';
  return 'unknown';
}

export function categorizeStatus(status: number): ErrorCategory {
  if (status >= 400 && status < 500) return 'http_4xx';
  if (status >= 500 && status < 600) return 'http_5xx';
  return 'api';
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

/**
 * Pure classification, no side effects.
 */
export function classifyFailure(failure: RawFailure): Classification {
  switch (failure.kind) {
    case 'transport': {
      const category = categorizeTransportError(failure.error);
      return { category, retryable: category === 'transport' || category === 'timeout' };
    }
    case 'http':
      return { category: categorizeStatus(failure.status), retryable: isRetryableStatus(failure.status) };
    case 'parse':
      return { category: 'unknown', retryable: false };
  }
}

/**
 * Classifier bound to a metrics collector: every classified failure is
 * counted by endpoint, method and category.
 */
export class ErrorClassifier {
  constructor(private readonly metrics: MetricsCollector) {}

  classify(failure: RawFailure, labels: { endpoint: string; method: string }): Classification {
    const result = classifyFailure(failure);
    this.metrics.recordAttemptFailure(labels.endpoint, labels.method, result.category);
    return result;
  }
}
