/**
 * Tests for operator-facing error text
 */
import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  ConnectionError,
  NotFoundError,
  RetryExhaustedError,
  TransactionFailedError,
} from '@clusterops/sdk';
import { describeError } from '../lib/errors.js';

describe('describeError', () => {
  it('explains transaction failures with the rollback summary', () => {
    const err = new TransactionFailedError(
      '01HRG4S0Y8T6Z2F5YB3W9M6Q1K',
      { kind: 'create_index', params: { name: 'web' } },
      0,
      new Error('boom'),
      { completed: 0, rolledBack: 0, failures: [] },
    );

    expect(describeError(err)).toEqual([
      'Error: Transaction 01HRG4S0Y8T6Z2F5YB3W9M6Q1K failed.',
      "  Operation 1 (create_index 'web') failed: boom; rolled back 0 of 0 completed operations",
    ]);
  });

  it('names the endpoint for exhausted retries', () => {
    const last = new ConnectionError('Failed to connect to https://cluster.test/x: fetch failed');
    const err = new RetryExhaustedError(4, last, '/services/data/indexes', 'POST');

    expect(describeError(err)).toEqual([
      'Error: POST /services/data/indexes kept failing after 4 attempt(s).',
      '  Failed to connect to https://cluster.test/x: fetch failed',
    ]);
  });

  it('points unreachable servers at the url setting', () => {
    expect(describeError(new ConnectionError('Failed to connect'))).toEqual([
      'Error: Cannot reach the management API.',
      '  Failed to connect',
      '  Check the url with: clusterops config get',
    ]);
  });

  it('points authentication failures at the credentials', () => {
    expect(describeError(new AuthenticationError('invalid token'))[0]).toBe('Error: Authentication failed.');
  });

  it('prints other errors as they are', () => {
    expect(describeError(new NotFoundError('Could not find object id=web', 'https://cluster.test'))).toEqual([
      'Error: Could not find object id=web',
    ]);
    expect(describeError('plain')).toEqual(['Error: plain']);
  });
});
