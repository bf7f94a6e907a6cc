/**
 * Tests for the CLI transaction command
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TransactionManager } from '@clusterops/sdk';

// ─── Mock API client ────────────────────────────────────────────────

const { executor } = vi.hoisted(() => {
  const ok = () => vi.fn(async () => undefined);
  return {
    executor: {
      metrics: null,
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
    },
  };
});

vi.mock('../lib/client.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('../lib/client.js')>();
  return { ...original, createClientFromConfig: () => executor };
});

import { runTransactionCommand } from '../commands/transaction.js';

// ─── Helpers ────────────────────────────────────────────────────────

let consoleOutput: string[];
let originalLog: typeof console.log;
let originalError: typeof console.error;
let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'clusterops-cli-'));
  vi.stubEnv('CLUSTEROPS_CONFIG_DIR', dir);
  vi.stubEnv('LOG_LEVEL', 'error');
  consoleOutput = [];
  originalLog = console.log;
  originalError = console.error;
  console.log = (...args: unknown[]) => consoleOutput.push(args.join(' '));
  console.error = (...args: unknown[]) => consoleOutput.push(args.join(' '));
  vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${String(code)})`);
  });
  vi.clearAllMocks();
});

afterEach(async () => {
  console.log = originalLog;
  console.error = originalError;
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  await rm(dir, { recursive: true, force: true });
});

function manager(): TransactionManager {
  return new TransactionManager({ logDir: join(dir, 'transactions') });
}

async function begin(): Promise<string> {
  await runTransactionCommand(['begin']);
  const line = consoleOutput.find((l) => l.startsWith('Started new transaction: '));
  if (!line) throw new Error('begin printed no transaction id');
  consoleOutput = [];
  return line.slice('Started new transaction: '.length);
}

// ─── Tests ──────────────────────────────────────────────────────────

describe('transaction begin', () => {
  it('creates the pending record', async () => {
    const id = await begin();

    const pending = await manager().loadPending();
    expect(pending?.id).toBe(id);
    expect(pending?.operations).toEqual([]);
  });

  it('refuses to start a second transaction', async () => {
    const id = await begin();

    await expect(runTransactionCommand(['begin'])).rejects.toThrow('process.exit(1)');
    expect(consoleOutput).toContain(`A transaction is already in progress (${id}). Commit or abort it first.`);
  });
});

describe('transaction add', () => {
  it('stages a create operation with params', async () => {
    await begin();

    await runTransactionCommand(['add', 'create_index', '--name', 'web', '--params', '{"maxDataSizeMb":500}']);

    expect(consoleOutput).toEqual(["Added create_index 'web' (operation 1)"]);
    const pending = await manager().loadPending();
    expect(pending?.operations).toEqual([{ kind: 'create_index', params: { maxDataSizeMb: 500, name: 'web' } }]);
  });

  it('stages a delete operation by name', async () => {
    await begin();

    await runTransactionCommand(['add', 'delete_macro', '--name', 'old_macro']);

    const pending = await manager().loadPending();
    expect(pending?.operations).toEqual([{ kind: 'delete_macro', name: 'old_macro' }]);
  });

  it('needs a transaction in progress', async () => {
    await expect(runTransactionCommand(['add', 'delete_index', '--name', 'web'])).rejects.toThrow('process.exit(1)');
    expect(consoleOutput).toContain('No transaction in progress. Start one with: clusterops transaction begin');
  });

  it('rejects unknown kinds', async () => {
    await begin();

    await expect(runTransactionCommand(['add', 'rename_index', '--name', 'web'])).rejects.toThrow('process.exit(1)');
    expect(consoleOutput[0]).toBe('Unknown operation kind: rename_index');
  });

  it('rejects params that do not fit the kind', async () => {
    await begin();

    await expect(runTransactionCommand(['add', 'create_user', '--name', 'bob'])).rejects.toThrow('process.exit(1)');
    expect(consoleOutput[0]).toMatch(/^Invalid create_user operation: /);
  });

  it('rejects params that are not a JSON object', async () => {
    await begin();

    await expect(
      runTransactionCommand(['add', 'create_index', '--name', 'web', '--params', '[1,2]']),
    ).rejects.toThrow('process.exit(1)');
    expect(consoleOutput).toEqual(['Invalid --params JSON: expected an object']);
  });
});

describe('transaction savepoints', () => {
  it('rolls back to a savepoint', async () => {
    await begin();
    await runTransactionCommand(['add', 'create_index', '--name', 'a']);
    await runTransactionCommand(['savepoint', 'base']);
    await runTransactionCommand(['add', 'create_index', '--name', 'b']);
    await runTransactionCommand(['rollback-to', 'base']);

    expect(consoleOutput).toContain("Savepoint 'base' set at position 1");
    expect(consoleOutput).toContain("Rolled back to savepoint 'base' (1 operations staged)");
    const pending = await manager().loadPending();
    expect(pending?.operations).toEqual([{ kind: 'create_index', params: { name: 'a' } }]);
  });

  it('reports an unknown savepoint', async () => {
    await begin();

    await expect(runTransactionCommand(['rollback-to', 'missing'])).rejects.toThrow('process.exit(1)');
    expect(consoleOutput).toContain('Savepoint not found: missing');
  });

  it('keeps staged operations when the name matches an object member', async () => {
    await begin();
    await runTransactionCommand(['add', 'create_index', '--name', 'a']);

    await expect(runTransactionCommand(['rollback-to', 'toString'])).rejects.toThrow('process.exit(1)');

    expect(consoleOutput).toContain('Savepoint not found: toString');
    const pending = await manager().loadPending();
    expect(pending?.operations).toHaveLength(1);
  });
});

describe('transaction help', () => {
  it('lists --url and --format under the subcommands that take them', async () => {
    await runTransactionCommand(['--help']);

    const help = consoleOutput[0] ?? '';
    expect(help).toContain('  commit [--dry-run] [--url <url>]\n');
    expect(help).toContain('  --url <url>                    commit: server URL (overrides config)\n');
    expect(help).toContain('  --format <fmt>                 status, history: table (default) or json\n');
  });
});

describe('transaction status', () => {
  it('says when nothing is staged', async () => {
    await runTransactionCommand(['status']);
    expect(consoleOutput).toEqual(['No transaction in progress.']);
  });

  it('lists staged operations', async () => {
    const id = await begin();
    await runTransactionCommand(['add', 'create_index', '--name', 'web']);
    consoleOutput = [];

    await runTransactionCommand(['status']);

    expect(consoleOutput[0]).toBe(`Transaction in progress: ${id}`);
    expect(consoleOutput).toContain('Staged operations: 1');
    expect(consoleOutput).toContain(' 1 │ create_index │ web  ');
  });
});

describe('transaction validate and commit', () => {
  it('reports an empty resource name', async () => {
    await begin();
    await runTransactionCommand(['add', 'delete_user', '--name', '  ']);

    await expect(runTransactionCommand(['validate'])).rejects.toThrow(
      'Operation 1 (delete_user): Username cannot be empty',
    );
  });

  it('lists operations on a dry run without calling the API', async () => {
    const id = await begin();
    await runTransactionCommand(['add', 'create_index', '--name', 'web']);
    consoleOutput = [];

    await runTransactionCommand(['commit', '--dry-run']);

    expect(consoleOutput).toEqual([
      `Validating transaction ${id}...`,
      'Transaction is valid. Staged operations:',
      "  1. create_index 'web'",
    ]);
    expect(executor.createIndex).not.toHaveBeenCalled();
  });

  it('commits through the client and archives the record', async () => {
    const id = await begin();
    await runTransactionCommand(['add', 'create_index', '--name', 'web']);
    consoleOutput = [];

    await runTransactionCommand(['commit']);

    expect(consoleOutput).toEqual([
      `Committing transaction ${id}...`,
      'Transaction committed successfully (1 operations).',
    ]);
    expect(executor.createIndex).toHaveBeenCalledTimes(1);
    expect(await manager().loadPending()).toBeNull();
    const history = await manager().listHistory();
    expect(history.map((h) => [h.id, h.status])).toEqual([[id, 'committed']]);
  });

  it('refuses to commit an interrupted transaction', async () => {
    const id = await begin();
    const m = manager();
    const pending = await m.loadPending();
    if (!pending) throw new Error('no pending record');
    await m.savePending({ ...pending, commitStartedAt: '2024-03-09T07:05:01.000Z' });

    await expect(runTransactionCommand(['commit'])).rejects.toThrow('process.exit(1)');
    expect(consoleOutput[0]).toBe(`Transaction ${id} was interrupted during an earlier commit.`);
  });
});

describe('transaction abort and history', () => {
  it('archives an aborted transaction', async () => {
    const id = await begin();

    await runTransactionCommand(['abort']);

    expect(consoleOutput).toEqual([`Transaction ${id} aborted.`]);
    const history = await manager().listHistory();
    expect(history.map((h) => h.status)).toEqual(['aborted']);
  });

  it('says when there is no history', async () => {
    await runTransactionCommand(['history']);
    expect(consoleOutput).toEqual(['No archived transactions.']);
  });
});
