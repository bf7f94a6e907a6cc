/**
 * Tests for TransactionManager: validation, commit, rollback and the
 * on-disk transaction log.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, stat, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Transaction, TransactionOperation } from '@clusterops/core';
import { beginTransaction } from '@clusterops/core';
import { archiveTimestamp, TransactionManager } from '../transaction-manager.js';
import {
  ClusterOpsError,
  TransactionCancelledError,
  TransactionFailedError,
  TransactionLogError,
  ValidationError,
} from '../errors.js';
import { InMemoryMetricsRecorder } from '../metrics.js';

// ─── Helpers ────────────────────────────────────────────────────────

const CREATED = new Date('2024-03-09T07:05:01.000Z');

function fakeExecutor() {
  const ok = () => vi.fn(async () => undefined);
  return {
    createIndex: ok(),
    deleteIndex: ok(),
    modifyIndex: ok(),
    createUser: ok(),
    deleteUser: ok(),
    modifyUser: ok(),
    createRole: ok(),
    deleteRole: ok(),
    modifyRole: ok(),
    createMacro: ok(),
    deleteMacro: ok(),
    updateMacro: ok(),
    createSavedSearch: ok(),
    deleteSavedSearch: ok(),
    updateSavedSearch: ok(),
  };
}

function silentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function tx(...operations: TransactionOperation[]): Transaction {
  const t = beginTransaction(CREATED);
  t.operations.push(...operations);
  return t;
}

const createIndex = (name: string): TransactionOperation => ({ kind: 'create_index', params: { name } });

// ─── Tests ──────────────────────────────────────────────────────────

describe('TransactionManager', () => {
  let dir: string;
  let executor: ReturnType<typeof fakeExecutor>;
  let recorder: InMemoryMetricsRecorder;
  let manager: TransactionManager;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clusterops-tx-'));
    executor = fakeExecutor();
    recorder = new InMemoryMetricsRecorder();
    manager = new TransactionManager({
      logDir: dir,
      executor,
      metrics: recorder,
      logger: silentLogger(),
      now: () => CREATED,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('names the first operation with an empty resource name', () => {
      const t = tx(createIndex('web'), createIndex('   '), { kind: 'delete_user', name: '' });

      const err = (() => {
        try {
          manager.validate(t);
          return null;
        } catch (e) {
          return e;
        }
      })();

      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.message).toBe('Operation 2 (create_index): Index name cannot be empty');
      expect(err.operationIndex).toBe(1);
    });

    it('gives the same answer every time without side effects', async () => {
      const valid = tx(createIndex('web'), { kind: 'delete_macro', name: 'm1' });
      valid.savepoints['base'] = 1;
      const invalid = tx(createIndex('web'), { kind: 'delete_user', name: ' ' });
      const validBefore = structuredClone(valid);
      const invalidBefore = structuredClone(invalid);
      const messages: string[] = [];

      for (let i = 0; i < 2; i++) {
        expect(() => manager.validate(valid)).not.toThrow();
        try {
          manager.validate(invalid);
        } catch (e) {
          if (e instanceof Error) messages.push(e.message);
        }
      }

      expect(messages).toEqual([
        'Operation 2 (delete_user): Username cannot be empty',
        'Operation 2 (delete_user): Username cannot be empty',
      ]);
      expect(valid).toEqual(validBefore);
      expect(invalid).toEqual(invalidBefore);
      expect(await readdir(dir)).toEqual([]);
      for (const call of Object.values(executor)) expect(call).not.toHaveBeenCalled();
      expect(recorder.snapshot()).toEqual({ counters: {}, histograms: {} });
    });

    it('accepts an empty transaction', () => {
      expect(() => manager.validate(tx())).not.toThrow();
    });

    it('rejects before anything is sent or written', async () => {
      const t = tx({ kind: 'modify_role', name: '', params: { capabilities: ['search'] } });

      await expect(manager.commit(t)).rejects.toThrow('Operation 1 (modify_role): Role name cannot be empty');
      expect(executor.modifyRole).not.toHaveBeenCalled();
      expect(await manager.loadPending()).toBeNull();
    });
  });

  describe('commit', () => {
    it('runs operations in order and archives the committed record', async () => {
      const t = tx(createIndex('web'), {
        kind: 'create_user',
        params: { name: 'bob', password: 'test-secret', roles: ['user'] },
      });

      const result = await manager.commit(t);

      const expectedPath = join(dir, 'history', `20240309_070501_${t.id}_committed.json`);
      expect(result).toEqual({ transactionId: t.id, operations: 2, archivePath: expectedPath });
      expect(executor.createIndex).toHaveBeenCalledWith({ name: 'web' }, { signal: undefined });
      expect(executor.createUser).toHaveBeenCalledWith(
        { name: 'bob', password: 'test-secret', roles: ['user'] },
        { signal: undefined },
      );

      const archived: unknown = JSON.parse(await readFile(expectedPath, 'utf-8'));
      expect(archived).toMatchObject({
        id: t.id,
        commitStartedAt: '2024-03-09T07:05:01.000Z',
        operations: [
          { kind: 'create_index', params: { name: 'web' } },
          { kind: 'create_user', params: { name: 'bob', password: '********', roles: ['user'] } },
        ],
      });
      expect(await manager.loadPending()).toBeNull();
      expect(recorder.counter('clusterops_transaction_commit_attempts_total')).toBe(1);
      expect(recorder.counter('clusterops_transaction_commit_successes_total')).toBe(1);
    });

    it('rolls back completed creates when an operation fails', async () => {
      executor.createUser.mockRejectedValueOnce(new Error('User bob already exists'));
      const t = tx(createIndex('a'), {
        kind: 'create_user',
        params: { name: 'bob', password: 'test-secret', roles: [] },
      });

      const err = await manager.commit(t).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransactionFailedError);
      if (!(err instanceof TransactionFailedError)) return;
      expect(err.message).toBe(
        "Operation 2 (create_user 'bob') failed: User bob already exists; rolled back 1 of 1 completed operations",
      );
      expect(err.operationIndex).toBe(1);
      expect(err.rollback).toEqual({ completed: 1, rolledBack: 1, failures: [] });
      expect(executor.deleteIndex).toHaveBeenCalledWith('a', { signal: expect.any(AbortSignal) });

      const history = await manager.listHistory();
      expect(history.map((h) => h.status)).toEqual(['rolled_back']);
      expect(await manager.loadPending()).toBeNull();
      expect(recorder.counter('clusterops_transaction_commit_failures_total')).toBe(1);
      expect(recorder.counter('clusterops_transaction_rollback_attempts_total')).toBe(1);
    });

    it('stops at the first failure', async () => {
      executor.createIndex.mockRejectedValueOnce(new Error('boom'));
      const t = tx(createIndex('first'), createIndex('second'));

      await expect(manager.commit(t)).rejects.toBeInstanceOf(TransactionFailedError);
      expect(executor.createIndex).toHaveBeenCalledTimes(1);
      expect(executor.deleteIndex).not.toHaveBeenCalled();
    });

    it('reports operations that could not be rolled back', async () => {
      executor.deleteMacro.mockRejectedValueOnce(new Error('macro locked'));
      executor.createIndex.mockRejectedValueOnce(new Error('boom'));
      const t = tx(
        { kind: 'delete_role', name: 'old' },
        { kind: 'create_macro', params: { name: 'm1', definition: 'index=main' } },
        createIndex('x'),
      );

      const err = await manager.commit(t).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransactionFailedError);
      if (!(err instanceof TransactionFailedError)) return;
      expect(err.rollback).toEqual({
        completed: 2,
        rolledBack: 0,
        failures: [
          { operation: 'delete_macro', resourceName: 'm1', error: 'macro locked' },
          { operation: 'missing_rollback_path', resourceName: 'old', error: 'no automated rollback path for delete_role' },
        ],
      });
      expect(err.message).toBe(
        "Operation 3 (create_index 'x') failed: boom; rolled back 0 of 2 completed operations; " +
          'rollback also failed for these operations, manual cleanup required: ' +
          "delete_macro 'm1' (macro locked); missing_rollback_path 'old' (no automated rollback path for delete_role)",
      );
      expect(err.cause).toBeInstanceOf(Error);

      const history = await manager.listHistory();
      expect(history.map((h) => h.status)).toEqual(['rollback_failed']);
      expect(recorder.counter('clusterops_transaction_rollback_failures_total')).toBe(2);
    });

    it('gives up on a compensating call that hangs', async () => {
      const slow = new TransactionManager({
        logDir: dir,
        executor,
        rollbackTimeoutMs: 20,
        logger: silentLogger(),
        now: () => CREATED,
      });
      executor.deleteIndex.mockImplementationOnce(() => new Promise<undefined>(() => undefined));
      executor.createRole.mockRejectedValueOnce(new Error('boom'));
      const t = tx(createIndex('a'), { kind: 'create_role', params: { name: 'ops' } });

      const err = await slow.commit(t).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransactionFailedError);
      if (!(err instanceof TransactionFailedError)) return;
      expect(err.rollback.failures).toEqual([
        { operation: 'delete_index', resourceName: 'a', error: 'Rollback operation timed out after 20ms' },
      ]);
    });

    it('keeps the pending record when cancelled between operations', async () => {
      const controller = new AbortController();
      executor.createIndex.mockImplementationOnce(async () => {
        controller.abort();
        return undefined;
      });
      const t = tx(createIndex('a'), createIndex('b'));

      const err = await manager.commit(t, { signal: controller.signal }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransactionCancelledError);
      if (!(err instanceof TransactionCancelledError)) return;
      expect(err.completed).toEqual([createIndex('a')]);
      expect(executor.createIndex).toHaveBeenCalledTimes(1);
      expect(executor.deleteIndex).not.toHaveBeenCalled();

      const pending = await manager.loadPending();
      expect(pending?.id).toBe(t.id);
      expect(pending !== null && manager.isInterrupted(pending)).toBe(true);
      expect(await manager.listHistory()).toEqual([]);
    });

    it('needs an executor', async () => {
      const local = new TransactionManager({ logDir: dir, logger: silentLogger() });

      const err = await local.commit(tx(createIndex('web'))).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ClusterOpsError);
      if (!(err instanceof ClusterOpsError)) return;
      expect(err.code).toBe('CONFIG_ERROR');
    });
  });

  describe('persistence', () => {
    it('returns null when nothing is pending', async () => {
      expect(await manager.loadPending()).toBeNull();
    });

    it('round-trips the pending record with owner-only permissions', async () => {
      const t = tx(createIndex('web'));
      t.savepoints['base'] = 1;

      await manager.savePending(t);

      expect(await manager.loadPending()).toEqual(t);
      const { mode } = await stat(manager.pendingPath);
      expect(mode & 0o777).toBe(0o600);
    });

    it('rejects a pending file that does not parse', async () => {
      await writeFile(manager.pendingPath, '{"id": 42}');

      const err = await manager.loadPending().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransactionLogError);
      if (!(err instanceof TransactionLogError)) return;
      expect(err.message).toMatch(/^Pending transaction file is invalid: /);
      expect(err.path).toBe(manager.pendingPath);
    });

    it('abort archives and clears the pending record', async () => {
      const t = tx(createIndex('web'));
      await manager.savePending(t);

      const path = await manager.abort(t);

      expect(path).toBe(join(dir, 'history', `20240309_070501_${t.id}_aborted.json`));
      expect(await manager.loadPending()).toBeNull();
    });

    it('lists history newest first and skips unrelated files', async () => {
      const older = beginTransaction(new Date('2024-01-02T03:04:05.000Z'));
      const newer = beginTransaction(new Date('2024-05-06T07:08:09.000Z'));
      await manager.archive(older, 'committed');
      await manager.archive(newer, 'rollback_failed');
      await mkdir(manager.historyDir, { recursive: true });
      await writeFile(join(manager.historyDir, 'notes.txt'), 'scratch');

      const history = await manager.listHistory();

      expect(history.map((h) => [h.timestamp, h.id, h.status])).toEqual([
        ['20240506_070809', newer.id, 'rollback_failed'],
        ['20240102_030405', older.id, 'committed'],
      ]);
      expect(await readdir(manager.historyDir)).toHaveLength(3);
    });

    it('returns an empty history when nothing was archived', async () => {
      expect(await manager.listHistory()).toEqual([]);
    });
  });
});

describe('archiveTimestamp', () => {
  it('formats in UTC', () => {
    expect(archiveTimestamp('2024-12-31T23:59:58.000Z')).toBe('20241231_235958');
  });
});
