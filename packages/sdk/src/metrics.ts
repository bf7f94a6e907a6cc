/**
 * @clusterops/sdk — API Metrics
 *
 * Request counters, retry counters, latency histograms and error counters
 * with consistent labels (`endpoint`, `method`, `status`, `category`).
 * Recording never throws: a broken recorder is logged at debug level and
 * otherwise ignored.
 */
import type { ErrorCategory, Logger } from '@clusterops/core';
import {
  createLogger,
  getErrorMessage,
  METRIC_ATTEMPT_FAILURES_TOTAL,
  METRIC_DESERIALIZATION_FAILURES,
  METRIC_ERRORS_TOTAL,
  METRIC_REQUEST_DURATION,
  METRIC_REQUESTS_TOTAL,
  METRIC_RETRIES_TOTAL,
} from '@clusterops/core';

export type MetricLabels = Record<string, string>;

/** Sink the collector forwards to. Plug a real exporter in here. */
export interface MetricsRecorder {
  incrementCounter(name: string, labels: MetricLabels, value: number): void;
  observeHistogram(name: string, labels: MetricLabels, value: number): void;
}

export interface HistogramSummary {
  count: number;
  sum: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

function seriesKey(name: string, labels: MetricLabels): string {
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}="${labels[k]}"`);
  return parts.length > 0 ? `${name}{${parts.join(',')}}` : name;
}

/**
 * Process-local recorder. Default sink for the client and the one tests read.
 */
export class InMemoryMetricsRecorder implements MetricsRecorder {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, HistogramSummary>();

  incrementCounter(name: string, labels: MetricLabels, value: number): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  observeHistogram(name: string, labels: MetricLabels, value: number): void {
    const key = seriesKey(name, labels);
    const summary = this.histograms.get(key);
    if (summary) {
      summary.count++;
      summary.sum += value;
    } else {
      this.histograms.set(key, { count: 1, sum: value });
    }
  }

  /** Current value of one counter series (0 when never incremented). */
  counter(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  /** Count and sum of one histogram series. */
  histogram(name: string, labels: MetricLabels = {}): HistogramSummary {
    const summary = this.histograms.get(seriesKey(name, labels));
    return summary ? { ...summary } : { count: 0, sum: 0 };
  }

  snapshot(): MetricsSnapshot {
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, summary] of this.histograms) {
      histograms[key] = { ...summary };
    }
    return { counters: Object.fromEntries(this.counters), histograms };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

export class MetricsCollector {
  private readonly recorder: MetricsRecorder | null;
  private readonly log: Logger;

  constructor(recorder: MetricsRecorder | null, logger: Logger = createLogger('clusterops:metrics')) {
    this.recorder = recorder;
    this.log = logger;
  }

  /** Collector that records nothing. */
  static disabled(): MetricsCollector {
    return new MetricsCollector(null);
  }

  get enabled(): boolean {
    return this.recorder !== null;
  }

  increment(name: string, labels: MetricLabels = {}, value = 1): void {
    this.safely((r) => r.incrementCounter(name, labels, value));
  }

  observe(name: string, labels: MetricLabels, value: number): void {
    this.safely((r) => r.observeHistogram(name, labels, value));
  }

  recordRequest(endpoint: string, method: string): void {
    this.increment(METRIC_REQUESTS_TOTAL, { endpoint, method });
  }

  recordRetry(endpoint: string, method: string, attempt: number): void {
    this.increment(METRIC_RETRIES_TOTAL, { endpoint, method, attempt: String(attempt) });
  }

  /**
   * @param status - HTTP status, or null when no response arrived
   */
  recordRequestDuration(endpoint: string, method: string, durationMs: number, status: number | null): void {
    this.observe(
      METRIC_REQUEST_DURATION,
      { endpoint, method, status: status === null ? 'error' : String(status) },
      durationMs / 1_000,
    );
  }

  recordAttemptFailure(endpoint: string, method: string, category: ErrorCategory): void {
    this.increment(METRIC_ATTEMPT_FAILURES_TOTAL, { endpoint, method, category });
  }

  recordError(endpoint: string, method: string, category: ErrorCategory): void {
    this.increment(METRIC_ERRORS_TOTAL, { endpoint, method, category });
  }

  recordDeserializationFailure(endpoint: string, method: string): void {
    this.increment(METRIC_DESERIALIZATION_FAILURES, { endpoint, method });
  }

  private safely(record: (recorder: MetricsRecorder) => void): void {
    if (!this.recorder) return;
    try {
      record(this.recorder);
    } catch (err) {
      this.log.debug('Metric recording failed', { error: getErrorMessage(err) });
    }
  }
}
