/**
 * @clusterops/sdk — Per-endpoint Circuit Breaker
 *
 * closed    → requests pass; counted failures inside the window open the circuit
 * open      → requests fail fast with CircuitOpenError until the reset timeout
 * half_open → a limited number of probes pass; one success closes, one failure re-opens
 *
 * Only failures that say something about the server's health are counted:
 * transport errors, timeouts and 5xx responses.
 */
import type { ErrorCategory, Logger } from '@clusterops/core';
import {
  createLogger,
  DEFAULT_CIRCUIT_FAILURE_THRESHOLD,
  DEFAULT_CIRCUIT_FAILURE_WINDOW_MS,
  DEFAULT_CIRCUIT_HALF_OPEN_REQUESTS,
  DEFAULT_CIRCUIT_RESET_TIMEOUT_MS,
  METRIC_CIRCUIT_BLOCKED,
  METRIC_CIRCUIT_STATE_TRANSITIONS,
} from '@clusterops/core';
import { CircuitOpenError } from './errors.js';
import { MetricsCollector } from './metrics.js';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
  /** Counted failures within the window that open the circuit (default: 5) */
  failureThreshold?: number;
  /** Sliding window for counting failures (default: 60000) */
  failureWindowMs?: number;
  /** Time spent open before probing (default: 30000) */
  resetTimeoutMs?: number;
  /** Probes allowed while half-open (default: 1) */
  halfOpenRequests?: number;
}

interface EndpointCircuit {
  state: CircuitState;
  failures: number[];
  openedAt: number;
  probesInFlight: number;
}

const COUNTED_CATEGORIES: ReadonlySet<ErrorCategory> = new Set(['transport', 'timeout', 'http_5xx']);

export function countsAgainstCircuit(category: ErrorCategory): boolean {
  return COUNTED_CATEGORIES.has(category);
}

export class CircuitBreaker {
  private readonly config: Required<CircuitBreakerConfig>;
  private readonly circuits = new Map<string, EndpointCircuit>();
  private readonly metrics: MetricsCollector;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    config: CircuitBreakerConfig = {},
    deps: { metrics?: MetricsCollector; logger?: Logger; now?: () => number } = {},
  ) {
    this.config = {
      failureThreshold: config.failureThreshold ?? DEFAULT_CIRCUIT_FAILURE_THRESHOLD,
      failureWindowMs: config.failureWindowMs ?? DEFAULT_CIRCUIT_FAILURE_WINDOW_MS,
      resetTimeoutMs: config.resetTimeoutMs ?? DEFAULT_CIRCUIT_RESET_TIMEOUT_MS,
      halfOpenRequests: config.halfOpenRequests ?? DEFAULT_CIRCUIT_HALF_OPEN_REQUESTS,
    };
    this.metrics = deps.metrics ?? MetricsCollector.disabled();
    this.log = deps.logger ?? createLogger('clusterops:circuit-breaker');
    this.now = deps.now ?? Date.now;
  }

  state(endpoint: string): CircuitState {
    return this.circuits.get(endpoint)?.state ?? 'closed';
  }

  /**
   * Admit one request, or throw CircuitOpenError.
   */
  check(endpoint: string): void {
    const circuit = this.circuit(endpoint);

    if (circuit.state === 'open') {
      if (this.now() - circuit.openedAt < this.config.resetTimeoutMs) {
        this.block(endpoint);
      }
      this.transition(endpoint, circuit, 'half_open');
    }

    if (circuit.state === 'half_open') {
      if (circuit.probesInFlight >= this.config.halfOpenRequests) {
        this.block(endpoint);
      }
      circuit.probesInFlight++;
    }
  }

  recordSuccess(endpoint: string): void {
    const circuit = this.circuits.get(endpoint);
    if (!circuit) return;
    if (circuit.state === 'half_open') {
      this.transition(endpoint, circuit, 'closed');
    }
  }

  /**
   * Give back a probe slot taken by `check` when the attempt ended without a
   * success or a failure to record (cancelled, or rejected before sending).
   */
  release(endpoint: string): void {
    const circuit = this.circuits.get(endpoint);
    if (circuit?.state === 'half_open' && circuit.probesInFlight > 0) {
      circuit.probesInFlight--;
    }
  }

  recordFailure(endpoint: string): void {
    const circuit = this.circuit(endpoint);
    const now = this.now();

    if (circuit.state === 'half_open') {
      this.transition(endpoint, circuit, 'open');
      return;
    }
    if (circuit.state === 'open') return;

    circuit.failures = circuit.failures.filter((t) => now - t < this.config.failureWindowMs);
    circuit.failures.push(now);
    if (circuit.failures.length >= this.config.failureThreshold) {
      this.transition(endpoint, circuit, 'open');
    }
  }

  private circuit(endpoint: string): EndpointCircuit {
    let circuit = this.circuits.get(endpoint);
    if (!circuit) {
      circuit = { state: 'closed', failures: [], openedAt: 0, probesInFlight: 0 };
      this.circuits.set(endpoint, circuit);
    }
    return circuit;
  }

  private block(endpoint: string): never {
    this.metrics.increment(METRIC_CIRCUIT_BLOCKED, { endpoint });
    throw new CircuitOpenError(endpoint);
  }

  private transition(endpoint: string, circuit: EndpointCircuit, to: CircuitState): void {
    const from = circuit.state;
    circuit.state = to;
    circuit.probesInFlight = 0;
    if (to === 'open') circuit.openedAt = this.now();
    if (to === 'closed') circuit.failures = [];

    this.metrics.increment(METRIC_CIRCUIT_STATE_TRANSITIONS, { endpoint, from, to });
    if (to === 'open') {
      this.log.warn(`Circuit opened for ${endpoint}`, { from, failures: circuit.failures.length });
    } else {
      this.log.info(`Circuit ${to} for ${endpoint}`, { from });
    }
  }
}
