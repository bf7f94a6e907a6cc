/**
 * @clusterops/sdk — Transaction Manager
 *
 * Validates and commits multi-resource transactions. Operations run strictly
 * in order; the first failure stops the commit and completed operations are
 * rolled back in reverse.
 *
 * Only create operations can be undone (by deleting what was created).
 * Deletes and modifications have no automated rollback path and are reported
 * as needing manual cleanup.
 *
 * On-disk layout inside `logDir`:
 *
 *   pending_transaction.json                       transaction being built or committed
 *   history/{YYYYMMDD_HHMMSS}_{id}_{status}.json  archived transactions
 */
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  CreateIndexParams,
  CreateMacroParams,
  CreateRoleParams,
  CreateSavedSearchParams,
  CreateUserParams,
  Logger,
  ModifyIndexParams,
  ModifyRoleParams,
  ModifyUserParams,
  Transaction,
  TransactionOperation,
  TransactionStatus,
  UpdateMacroParams,
  UpdateSavedSearchParams,
} from '@clusterops/core';
import {
  assertNever,
  createLogger,
  describeOperation,
  getErrorMessage,
  maskTransactionSecrets,
  METRIC_TRANSACTION_COMMIT_ATTEMPTS,
  METRIC_TRANSACTION_COMMIT_FAILURES,
  METRIC_TRANSACTION_COMMIT_SUCCESSES,
  METRIC_TRANSACTION_ROLLBACK_ATTEMPTS,
  METRIC_TRANSACTION_ROLLBACK_FAILURES,
  operationTarget,
  parseTransaction,
  PENDING_TRANSACTION_FILE,
  resourceLabel,
  ROLLBACK_OPERATION_TIMEOUT_MS,
  TRANSACTION_HISTORY_DIR,
} from '@clusterops/core';
import type { CallOptions } from './client.js';
import type { RollbackFailure, RollbackOutcome } from './errors.js';
import {
  CancelledError,
  ClusterOpsError,
  TimeoutError,
  TransactionCancelledError,
  TransactionFailedError,
  TransactionLogError,
  ValidationError,
} from './errors.js';
import type { MetricsRecorder } from './metrics.js';
import { MetricsCollector } from './metrics.js';

/**
 * The API calls a transaction can make. ManagementClient implements it;
 * tests pass a fake.
 */
export interface TransactionExecutor {
  createIndex(params: CreateIndexParams, options?: CallOptions): Promise<unknown>;
  deleteIndex(name: string, options?: CallOptions): Promise<void>;
  modifyIndex(name: string, params: ModifyIndexParams, options?: CallOptions): Promise<unknown>;
  createUser(params: CreateUserParams, options?: CallOptions): Promise<unknown>;
  deleteUser(name: string, options?: CallOptions): Promise<void>;
  modifyUser(name: string, params: ModifyUserParams, options?: CallOptions): Promise<unknown>;
  createRole(params: CreateRoleParams, options?: CallOptions): Promise<unknown>;
  deleteRole(name: string, options?: CallOptions): Promise<void>;
  modifyRole(name: string, params: ModifyRoleParams, options?: CallOptions): Promise<unknown>;
  createMacro(params: CreateMacroParams, options?: CallOptions): Promise<unknown>;
  deleteMacro(name: string, options?: CallOptions): Promise<void>;
  updateMacro(name: string, params: UpdateMacroParams, options?: CallOptions): Promise<unknown>;
  createSavedSearch(params: CreateSavedSearchParams, options?: CallOptions): Promise<unknown>;
  deleteSavedSearch(name: string, options?: CallOptions): Promise<void>;
  updateSavedSearch(name: string, params: UpdateSavedSearchParams, options?: CallOptions): Promise<unknown>;
}

export interface TransactionManagerOptions {
  /** Directory holding the pending file and the history directory */
  logDir: string;
  /** API calls made by commit and rollback; only `commit` needs one */
  executor?: TransactionExecutor;
  /** Upper bound for each compensating call (default: 30000) */
  rollbackTimeoutMs?: number;
  metrics?: MetricsRecorder | null;
  logger?: Logger;
  now?: () => Date;
}

export interface CommitOptions {
  signal?: AbortSignal;
}

export interface CommitResult {
  transactionId: string;
  operations: number;
  archivePath: string;
}

export interface HistoryEntry {
  file: string;
  path: string;
  /** `YYYYMMDD_HHMMSS` (UTC) of the transaction's creation */
  timestamp: string;
  id: string;
  status: TransactionStatus;
}

interface CompensatingAction {
  operation: string;
  resourceName: string;
  run: (signal: AbortSignal) => Promise<void>;
}

const HISTORY_FILE = /^(\d{8}_\d{6})_(.+)_(committed|rolled_back|rollback_failed|aborted)\.json$/;

function isTransactionStatus(value: string): value is TransactionStatus {
  return value === 'committed' || value === 'rolled_back' || value === 'rollback_failed' || value === 'aborted';
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** `2024-03-09T07:05:01.000Z` → `20240309_070501` */
export function archiveTimestamp(createdAt: string): string {
  const d = new Date(createdAt);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

export class TransactionManager {
  readonly logDir: string;
  private readonly executor: TransactionExecutor | null;
  private readonly rollbackTimeoutMs: number;
  private readonly metrics: MetricsCollector;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: TransactionManagerOptions) {
    this.logDir = options.logDir;
    this.executor = options.executor ?? null;
    this.rollbackTimeoutMs = options.rollbackTimeoutMs ?? ROLLBACK_OPERATION_TIMEOUT_MS;
    this.log = options.logger ?? createLogger('clusterops:transaction');
    this.metrics = new MetricsCollector(options.metrics ?? null, this.log);
    this.now = options.now ?? (() => new Date());
  }

  get pendingPath(): string {
    return join(this.logDir, PENDING_TRANSACTION_FILE);
  }

  get historyDir(): string {
    return join(this.logDir, TRANSACTION_HISTORY_DIR);
  }

  // ─── Persistence ─────────────────────────────────────────

  /**
   * Read the pending transaction, or null when there is none.
   */
  async loadPending(): Promise<Transaction | null> {
    const path = this.pendingPath;
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new TransactionLogError(`Failed to read pending transaction: ${getErrorMessage(err)}`, path, err);
    }

    try {
      return parseTransaction(JSON.parse(raw));
    } catch (err) {
      throw new TransactionLogError(`Pending transaction file is invalid: ${getErrorMessage(err)}`, path, err);
    }
  }

  async savePending(tx: Transaction): Promise<void> {
    const path = this.pendingPath;
    try {
      await mkdir(this.logDir, { recursive: true });
      // Holds passwords of users being created; owner-only.
      await writeFile(path, JSON.stringify(tx, null, 2) + '\n', { mode: 0o600 });
    } catch (err) {
      throw new TransactionLogError(`Failed to write pending transaction: ${getErrorMessage(err)}`, path, err);
    }
  }

  async clearPending(): Promise<void> {
    try {
      await rm(this.pendingPath, { force: true });
    } catch (err) {
      throw new TransactionLogError(
        `Failed to remove pending transaction: ${getErrorMessage(err)}`,
        this.pendingPath,
        err,
      );
    }
  }

  /**
   * Write a password-masked copy of `tx` to the history directory.
   * Returns the path written.
   */
  async archive(tx: Transaction, status: TransactionStatus): Promise<string> {
    const file = `${archiveTimestamp(tx.createdAt)}_${tx.id}_${status}.json`;
    const path = join(this.historyDir, file);
    try {
      await mkdir(this.historyDir, { recursive: true });
      await writeFile(path, JSON.stringify(maskTransactionSecrets(tx), null, 2) + '\n');
    } catch (err) {
      throw new TransactionLogError(`Failed to write transaction archive: ${getErrorMessage(err)}`, path, err);
    }
    return path;
  }

  /**
   * Archived transactions, newest first.
   */
  async listHistory(): Promise<HistoryEntry[]> {
    let files: string[];
    try {
      files = await readdir(this.historyDir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new TransactionLogError(`Failed to read history: ${getErrorMessage(err)}`, this.historyDir, err);
    }

    const entries: HistoryEntry[] = [];
    for (const file of files) {
      const match = HISTORY_FILE.exec(file);
      if (!match) continue;
      const [, timestamp, id, status] = match;
      if (timestamp === undefined || id === undefined || status === undefined || !isTransactionStatus(status)) {
        continue;
      }
      entries.push({ file, path: join(this.historyDir, file), timestamp, id, status });
    }
    return entries.sort((a, b) => (a.file < b.file ? 1 : a.file > b.file ? -1 : 0));
  }

  /** True when `tx` was being committed when its process stopped. */
  isInterrupted(tx: Transaction): boolean {
    return tx.commitStartedAt !== undefined;
  }

  // ─── Lifecycle ───────────────────────────────────────────

  /**
   * Local checks only. Every operation must name the resource it acts on.
   *
   * @throws ValidationError naming the first offending operation
   */
  validate(tx: Transaction): void {
    tx.operations.forEach((op, index) => {
      const target = operationTarget(op);
      if (target.name.trim().length === 0) {
        throw new ValidationError(
          `Operation ${index + 1} (${op.kind}): ${resourceLabel(target.resource)} cannot be empty`,
          index,
        );
      }
    });
  }

  /**
   * Validate, persist, then execute every operation in order.
   *
   * @throws ValidationError before anything is written or sent
   * @throws TransactionFailedError when an operation fails (after rollback)
   * @throws TransactionCancelledError when `signal` aborts between operations
   */
  async commit(tx: Transaction, options: CommitOptions = {}): Promise<CommitResult> {
    const { signal } = options;
    this.validate(tx);
    const executor = this.executor;
    if (!executor) {
      throw new ClusterOpsError('Transaction manager has no executor; cannot commit', 0, 'CONFIG_ERROR');
    }

    this.metrics.increment(METRIC_TRANSACTION_COMMIT_ATTEMPTS);
    const record: Transaction = { ...tx, commitStartedAt: this.now().toISOString() };
    await this.savePending(record);
    this.log.info(`Committing transaction ${record.id}`, { operations: record.operations.length });

    const completed: TransactionOperation[] = [];
    for (const [index, op] of record.operations.entries()) {
      if (signal?.aborted) throw this.cancelled(record, completed);

      try {
        await this.execute(executor, op, signal);
      } catch (err) {
        if (err instanceof CancelledError && signal?.aborted) throw this.cancelled(record, completed);

        this.metrics.increment(METRIC_TRANSACTION_COMMIT_FAILURES);
        this.log.warn(`Operation failed in transaction ${record.id}, rolling back`, {
          operation: describeOperation(op),
          index,
          error: getErrorMessage(err),
        });
        const rollback = await this.rollback(executor, completed);
        await this.finishFailed(record, rollback);
        throw new TransactionFailedError(record.id, op, index, err, rollback);
      }
      completed.push(op);
    }

    const archivePath = await this.archive(record, 'committed');
    await this.clearPending();
    this.metrics.increment(METRIC_TRANSACTION_COMMIT_SUCCESSES);
    this.log.info(`Transaction ${record.id} committed`, { operations: completed.length });
    return { transactionId: record.id, operations: completed.length, archivePath };
  }

  /**
   * Discard a transaction that was never committed (or whose interrupted
   * commit the operator has dealt with): archive it as `aborted` and remove
   * the pending record.
   */
  async abort(tx: Transaction): Promise<string> {
    const path = await this.archive(tx, 'aborted');
    await this.clearPending();
    this.log.info(`Transaction ${tx.id} aborted`);
    return path;
  }

  // ─── Internal ────────────────────────────────────────────

  private cancelled(record: Transaction, completed: TransactionOperation[]): TransactionCancelledError {
    this.log.warn(`Transaction ${record.id} cancelled; pending record kept`, {
      completed: completed.length,
      pending: this.pendingPath,
    });
    return new TransactionCancelledError(record.id, [...completed]);
  }

  private async finishFailed(record: Transaction, rollback: RollbackOutcome): Promise<void> {
    const status: TransactionStatus = rollback.failures.length === 0 ? 'rolled_back' : 'rollback_failed';
    try {
      await this.archive(record, status);
      await this.clearPending();
    } catch (err) {
      // The operation's own failure is what the caller gets; the pending record stays for inspection.
      this.log.error(`Failed to archive transaction ${record.id}`, {
        status,
        error: getErrorMessage(err),
        pending: this.pendingPath,
      });
    }
  }

  private execute(x: TransactionExecutor, op: TransactionOperation, signal: AbortSignal | undefined): Promise<unknown> {
    const options: CallOptions = { signal };
    switch (op.kind) {
      case 'create_index':
        return x.createIndex(op.params, options);
      case 'delete_index':
        return x.deleteIndex(op.name, options);
      case 'modify_index':
        return x.modifyIndex(op.name, op.params, options);
      case 'create_user':
        return x.createUser(op.params, options);
      case 'delete_user':
        return x.deleteUser(op.name, options);
      case 'modify_user':
        return x.modifyUser(op.name, op.params, options);
      case 'create_role':
        return x.createRole(op.params, options);
      case 'delete_role':
        return x.deleteRole(op.name, options);
      case 'modify_role':
        return x.modifyRole(op.name, op.params, options);
      case 'create_macro':
        return x.createMacro(op.params, options);
      case 'delete_macro':
        return x.deleteMacro(op.name, options);
      case 'update_macro':
        return x.updateMacro(op.name, op.params, options);
      case 'create_saved_search':
        return x.createSavedSearch(op.params, options);
      case 'delete_saved_search':
        return x.deleteSavedSearch(op.name, options);
      case 'update_saved_search':
        return x.updateSavedSearch(op.name, op.params, options);
      default:
        return assertNever(op, 'transaction operation');
    }
  }

  /**
   * The call that undoes `op`, or null when there is none.
   */
  private compensation(x: TransactionExecutor, op: TransactionOperation): CompensatingAction | null {
    switch (op.kind) {
      case 'create_index': {
        const name = op.params.name;
        return { operation: 'delete_index', resourceName: name, run: (signal) => x.deleteIndex(name, { signal }) };
      }
      case 'create_user': {
        const name = op.params.name;
        return { operation: 'delete_user', resourceName: name, run: (signal) => x.deleteUser(name, { signal }) };
      }
      case 'create_role': {
        const name = op.params.name;
        return { operation: 'delete_role', resourceName: name, run: (signal) => x.deleteRole(name, { signal }) };
      }
      case 'create_macro': {
        const name = op.params.name;
        return { operation: 'delete_macro', resourceName: name, run: (signal) => x.deleteMacro(name, { signal }) };
      }
      case 'create_saved_search': {
        const name = op.params.name;
        return {
          operation: 'delete_saved_search',
          resourceName: name,
          run: (signal) => x.deleteSavedSearch(name, { signal }),
        };
      }
      case 'delete_index':
      case 'modify_index':
      case 'delete_user':
      case 'modify_user':
      case 'delete_role':
      case 'modify_role':
      case 'delete_macro':
      case 'update_macro':
      case 'delete_saved_search':
      case 'update_saved_search':
        return null;
      default:
        return assertNever(op, 'transaction operation');
    }
  }

  /**
   * Undo `completed` in reverse order. Never throws: every failure is logged
   * and recorded in the outcome.
   */
  private async rollback(x: TransactionExecutor, completed: TransactionOperation[]): Promise<RollbackOutcome> {
    const failures: RollbackFailure[] = [];
    let rolledBack = 0;
    if (completed.length > 0) {
      this.log.info(`Rolling back ${completed.length} operation(s)`);
      this.metrics.increment(METRIC_TRANSACTION_ROLLBACK_ATTEMPTS, {}, completed.length);
    }

    for (const op of [...completed].reverse()) {
      const action = this.compensation(x, op);
      if (!action) {
        this.metrics.increment(METRIC_TRANSACTION_ROLLBACK_FAILURES);
        this.log.warn('No automated rollback path for operation', { operation: describeOperation(op) });
        failures.push({
          operation: 'missing_rollback_path',
          resourceName: operationTarget(op).name,
          error: `no automated rollback path for ${op.kind}`,
        });
        continue;
      }

      try {
        await this.withRollbackTimeout(action.run);
        rolledBack++;
      } catch (err) {
        this.metrics.increment(METRIC_TRANSACTION_ROLLBACK_FAILURES);
        this.log.error('Rollback operation failed', {
          operation: action.operation,
          resource: action.resourceName,
          error: getErrorMessage(err),
        });
        failures.push({ operation: action.operation, resourceName: action.resourceName, error: getErrorMessage(err) });
      }
    }

    return { completed: completed.length, rolledBack, failures };
  }

  private async withRollbackTimeout(run: (signal: AbortSignal) => Promise<void>): Promise<void> {
    const ms = this.rollbackTimeoutMs;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(`Rollback operation timed out after ${ms}ms`, ms));
      }, ms);
    });
    try {
      await Promise.race([run(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
