/**
 * Tests for the per-endpoint circuit breaker
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CircuitBreaker, countsAgainstCircuit } from '../circuit-breaker.js';
import { CircuitOpenError } from '../errors.js';
import { InMemoryMetricsRecorder, MetricsCollector } from '../metrics.js';

const ENDPOINT = '/services/data/indexes';

describe('CircuitBreaker', () => {
  let now: number;
  let recorder: InMemoryMetricsRecorder;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    now = 0;
    recorder = new InMemoryMetricsRecorder();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    breaker = new CircuitBreaker(
      { failureThreshold: 2, failureWindowMs: 1_000, resetTimeoutMs: 500, halfOpenRequests: 1 },
      { metrics: new MetricsCollector(recorder, logger), logger, now: () => now },
    );
  });

  it('opens after the threshold and blocks requests', () => {
    breaker.recordFailure(ENDPOINT);
    expect(breaker.state(ENDPOINT)).toBe('closed');
    breaker.recordFailure(ENDPOINT);
    expect(breaker.state(ENDPOINT)).toBe('open');

    expect(() => breaker.check(ENDPOINT)).toThrow(CircuitOpenError);
    expect(recorder.counter('clusterops_circuit_breaker_blocked_requests_total', { endpoint: ENDPOINT })).toBe(1);
    expect(
      recorder.counter('clusterops_circuit_breaker_state_transitions_total', {
        endpoint: ENDPOINT,
        from: 'closed',
        to: 'open',
      }),
    ).toBe(1);
  });

  it('only counts failures inside the window', () => {
    breaker.recordFailure(ENDPOINT);
    now = 1_500;
    breaker.recordFailure(ENDPOINT);
    expect(breaker.state(ENDPOINT)).toBe('closed');
  });

  it('lets one probe through after the reset timeout and closes on success', () => {
    breaker.recordFailure(ENDPOINT);
    breaker.recordFailure(ENDPOINT);

    now = 500;
    expect(() => breaker.check(ENDPOINT)).not.toThrow();
    expect(breaker.state(ENDPOINT)).toBe('half_open');
    expect(() => breaker.check(ENDPOINT)).toThrow(CircuitOpenError);

    breaker.recordSuccess(ENDPOINT);
    expect(breaker.state(ENDPOINT)).toBe('closed');
    expect(() => breaker.check(ENDPOINT)).not.toThrow();
  });

  it('re-opens when the probe fails', () => {
    breaker.recordFailure(ENDPOINT);
    breaker.recordFailure(ENDPOINT);
    now = 600;
    breaker.check(ENDPOINT);

    breaker.recordFailure(ENDPOINT);
    expect(breaker.state(ENDPOINT)).toBe('open');

    now = 1_000;
    expect(() => breaker.check(ENDPOINT)).toThrow(CircuitOpenError);
  });

  it('hands a released probe slot to the next request', () => {
    breaker.recordFailure(ENDPOINT);
    breaker.recordFailure(ENDPOINT);
    now = 500;
    breaker.check(ENDPOINT);

    breaker.release(ENDPOINT);
    expect(breaker.state(ENDPOINT)).toBe('half_open');
    expect(() => breaker.check(ENDPOINT)).not.toThrow();
    expect(() => breaker.check(ENDPOINT)).toThrow(CircuitOpenError);
  });

  it('keeps endpoints independent', () => {
    breaker.recordFailure(ENDPOINT);
    breaker.recordFailure(ENDPOINT);
    expect(() => breaker.check('/services/authentication/users')).not.toThrow();
  });
});

describe('countsAgainstCircuit', () => {
  it('counts server-health failures only', () => {
    expect(countsAgainstCircuit('transport')).toBe(true);
    expect(countsAgainstCircuit('timeout')).toBe(true);
    expect(countsAgainstCircuit('http_5xx')).toBe(true);
    expect(countsAgainstCircuit('http_4xx')).toBe(false);
    expect(countsAgainstCircuit('tls')).toBe(false);
  });
});
