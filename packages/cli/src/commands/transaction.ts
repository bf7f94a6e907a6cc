/**
 * clusterops transaction — stage, inspect and commit multi-resource changes
 *
 * Staged operations live in the pending transaction file until `commit`
 * or `abort`.
 */
import { parseArgs } from 'node:util';
import {
  addOperation,
  beginTransaction,
  describeOperation,
  getErrorMessage,
  OPERATION_KINDS,
  operationTarget,
  parseTransactionOperation,
  rollbackToSavepoint,
  setSavepoint,
} from '@clusterops/core';
import type { Transaction, TransactionOperation } from '@clusterops/core';
import type { TransactionManager } from '@clusterops/sdk';
import { createClientFromConfig, createTransactionManager } from '../lib/client.js';
import { printJson, printTable, truncate } from '../lib/output.js';

const HELP = `Usage: clusterops transaction <subcommand> [options]

Stage configuration changes and apply them all-or-nothing.

Subcommands:
  begin                          Start a new transaction
  add <kind> --name <name>       Stage an operation (--params '<json>' for create/modify/update)
  savepoint <name>               Mark the current position
  rollback-to <name>             Drop operations staged after a savepoint
  status [--format <fmt>]        Show the staged transaction
  validate                       Check the staged transaction locally
  commit [--dry-run] [--url <url>]
                                 Apply the staged operations
  abort                          Discard the staged transaction
  history [--format <fmt>]       List archived transactions

Options:
  --format <fmt>                 status, history: table (default) or json
  --dry-run                      commit: validate and list the operations only
  --url <url>                    commit: server URL (overrides config)
  -h, --help                     Show help

Operation kinds:
  ${OPERATION_KINDS.join(', ')}

Examples:
  clusterops transaction begin
  clusterops transaction add create_index --name web --params '{"maxDataSizeMb":500}'
  clusterops transaction add create_user --name bob --params '{"password":"...","roles":["user"]}'
  clusterops transaction savepoint users
  clusterops transaction commit --dry-run
  clusterops transaction commit`;

export async function runTransactionCommand(argv: string[]): Promise<void> {
  const subcommand = argv[0];
  const rest = argv.slice(1);

  switch (subcommand) {
    case 'begin':
      return handleBegin();
    case 'add':
      return handleAdd(rest);
    case 'savepoint':
      return handleSavepoint(rest);
    case 'rollback-to':
      return handleRollbackTo(rest);
    case 'status':
      return handleStatus(rest);
    case 'validate':
      return handleValidate();
    case 'commit':
      return handleCommit(rest);
    case 'abort':
      return handleAbort();
    case 'history':
      return handleHistory(rest);
    case '--help':
    case '-h':
    case undefined:
      console.log(HELP);
      return;
    default:
      console.error(`Unknown subcommand: ${subcommand}`);
      console.log(HELP);
      process.exit(1);
  }
}

async function requirePending(manager: TransactionManager): Promise<Transaction> {
  const tx = await manager.loadPending();
  if (!tx) {
    console.error('No transaction in progress. Start one with: clusterops transaction begin');
    process.exit(1);
  }
  return tx;
}

// ─── Begin ─────────────────────────────────────────────────────────

async function handleBegin(): Promise<void> {
  const manager = createTransactionManager();
  const existing = await manager.loadPending();
  if (existing) {
    console.error(`A transaction is already in progress (${existing.id}). Commit or abort it first.`);
    process.exit(1);
  }

  const tx = beginTransaction();
  await manager.savePending(tx);
  console.log(`Started new transaction: ${tx.id}`);
}

// ─── Add ───────────────────────────────────────────────────────────

function buildOperation(kind: string, name: string, params: Record<string, unknown>): unknown {
  if (kind.startsWith('create_')) return { kind, params: { ...params, name } };
  if (kind.startsWith('delete_')) return { kind, name };
  return { kind, name, params };
}

async function handleAdd(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      name: { type: 'string', short: 'n' },
      params: { type: 'string', short: 'p' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });

  const kind = positionals[0];
  if (values.help || !kind || !values.name) {
    console.log('Usage: clusterops transaction add <kind> --name <name> [--params <json>]');
    console.log(`Kinds: ${OPERATION_KINDS.join(', ')}`);
    return;
  }
  if (!OPERATION_KINDS.some((k) => k === kind)) {
    console.error(`Unknown operation kind: ${kind}`);
    console.error(`Valid kinds: ${OPERATION_KINDS.join(', ')}`);
    process.exit(1);
  }

  let params: Record<string, unknown> = {};
  if (values.params) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(values.params);
    } catch (err) {
      console.error(`Invalid --params JSON: ${getErrorMessage(err)}`);
      process.exit(1);
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      console.error('Invalid --params JSON: expected an object');
      process.exit(1);
    }
    params = Object.fromEntries(Object.entries(parsed));
  }

  let op: TransactionOperation;
  try {
    op = parseTransactionOperation(buildOperation(kind, values.name, params));
  } catch (err) {
    console.error(`Invalid ${kind} operation: ${getErrorMessage(err)}`);
    process.exit(1);
  }

  const manager = createTransactionManager();
  const tx = await requirePending(manager);
  addOperation(tx, op);
  await manager.savePending(tx);
  console.log(`Added ${describeOperation(op)} (operation ${tx.operations.length})`);
}

// ─── Savepoints ────────────────────────────────────────────────────

async function handleSavepoint(argv: string[]): Promise<void> {
  const name = argv[0];
  if (!name) {
    console.error('Usage: clusterops transaction savepoint <name>');
    process.exit(1);
  }

  const manager = createTransactionManager();
  const tx = await requirePending(manager);
  const position = setSavepoint(tx, name);
  await manager.savePending(tx);
  console.log(`Savepoint '${name}' set at position ${position}`);
}

async function handleRollbackTo(argv: string[]): Promise<void> {
  const name = argv[0];
  if (!name) {
    console.error('Usage: clusterops transaction rollback-to <name>');
    process.exit(1);
  }

  const manager = createTransactionManager();
  const tx = await requirePending(manager);
  if (!rollbackToSavepoint(tx, name)) {
    console.error(`Savepoint not found: ${name}`);
    process.exit(1);
  }
  await manager.savePending(tx);
  console.log(`Rolled back to savepoint '${name}' (${tx.operations.length} operations staged)`);
}

// ─── Status ────────────────────────────────────────────────────────

function printOperations(tx: Transaction): void {
  const rows = tx.operations.map((op, i) => [String(i + 1), op.kind, truncate(operationTarget(op).name, 40)]);
  printTable(['#', 'Operation', 'Name'], rows);
}

async function handleStatus(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      format: { type: 'string', short: 'f' },
    },
    allowPositionals: false,
  });

  const manager = createTransactionManager();
  const tx = await manager.loadPending();

  if (values.format === 'json') {
    printJson(tx);
    return;
  }

  if (!tx) {
    console.log('No transaction in progress.');
    return;
  }

  console.log(`Transaction in progress: ${tx.id}`);
  console.log(`Created at: ${tx.createdAt}`);
  if (manager.isInterrupted(tx)) {
    console.log(`Commit started at ${tx.commitStartedAt ?? ''} and did not finish; check the cluster before retrying.`);
  }
  console.log(`Staged operations: ${tx.operations.length}`);
  if (tx.operations.length > 0) {
    console.log('');
    printOperations(tx);
  }

  const savepoints = Object.entries(tx.savepoints);
  if (savepoints.length > 0) {
    console.log('\nSavepoints:');
    for (const [name, position] of savepoints) {
      console.log(`  - ${name} (at position ${position})`);
    }
  }
}

// ─── Validate / Commit ─────────────────────────────────────────────

async function handleValidate(): Promise<void> {
  const manager = createTransactionManager();
  const tx = await requirePending(manager);
  manager.validate(tx);
  console.log(`Transaction ${tx.id} is valid (${tx.operations.length} operations).`);
}

async function handleCommit(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'dry-run': { type: 'boolean', default: false },
      url: { type: 'string' },
    },
    allowPositionals: false,
  });

  if (values['dry-run']) {
    const manager = createTransactionManager();
    const tx = await requirePending(manager);
    console.log(`Validating transaction ${tx.id}...`);
    manager.validate(tx);
    console.log('Transaction is valid. Staged operations:');
    tx.operations.forEach((op, i) => console.log(`  ${i + 1}. ${describeOperation(op)}`));
    return;
  }

  const manager = createTransactionManager(createClientFromConfig(values.url));
  const tx = await requirePending(manager);
  if (manager.isInterrupted(tx)) {
    console.error(`Transaction ${tx.id} was interrupted during an earlier commit.`);
    console.error('Check which operations reached the cluster, then run: clusterops transaction abort');
    process.exit(1);
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    console.log(`Committing transaction ${tx.id}...`);
    const result = await manager.commit(tx, { signal: controller.signal });
    console.log(`Transaction committed successfully (${result.operations} operations).`);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

async function handleAbort(): Promise<void> {
  const manager = createTransactionManager();
  const tx = await manager.loadPending();
  if (!tx) {
    console.log('No transaction in progress.');
    return;
  }
  await manager.abort(tx);
  console.log(`Transaction ${tx.id} aborted.`);
}

// ─── History ───────────────────────────────────────────────────────

async function handleHistory(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      limit: { type: 'string', short: 'l' },
      format: { type: 'string', short: 'f' },
    },
    allowPositionals: false,
  });

  const manager = createTransactionManager();
  const limit = values.limit ? parseInt(values.limit, 10) : 20;
  const entries = (await manager.listHistory()).slice(0, Number.isNaN(limit) ? 20 : limit);

  if (values.format === 'json') {
    printJson(entries);
    return;
  }

  if (entries.length === 0) {
    console.log('No archived transactions.');
    return;
  }
  printTable(
    ['Created', 'ID', 'Status'],
    entries.map((e) => [e.timestamp, e.id, e.status]),
  );
}
