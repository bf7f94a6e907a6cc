/**
 * @clusterops/core — Transaction Model
 *
 * Building a transaction is purely local: these helpers never touch the
 * network or the disk. Execution and persistence live in the SDK's
 * TransactionManager.
 */
import { ulid } from 'ulid';
import { assertNever } from './errors.js';
import type {
  ResourceType,
  Transaction,
  TransactionOperation,
  TransactionOperationKind,
} from './types.js';

export type OperationAction = 'create' | 'delete' | 'modify';

export interface OperationTarget {
  action: OperationAction;
  resource: ResourceType;
  /** Identifying name of the resource the operation acts on */
  name: string;
}

/**
 * Start a new, empty transaction.
 */
export function beginTransaction(now: Date = new Date()): Transaction {
  return {
    id: ulid(now.getTime()),
    operations: [],
    savepoints: {},
    createdAt: now.toISOString(),
  };
}

export function addOperation(tx: Transaction, op: TransactionOperation): void {
  tx.operations.push(op);
}

/**
 * Mark the current end of the operation list. Setting an existing name moves it.
 *
 * @throws RangeError for `__proto__`, which a plain record cannot hold as a key
 */
export function setSavepoint(tx: Transaction, name: string): number {
  if (name === '__proto__') throw new RangeError(`Invalid savepoint name: ${name}`);
  const position = tx.operations.length;
  tx.savepoints[name] = position;
  return position;
}

/**
 * Drop every operation added after the named savepoint.
 * Savepoints that pointed past the new end are dropped too.
 * Returns false (and changes nothing) when the savepoint does not exist.
 */
export function rollbackToSavepoint(tx: Transaction, name: string): boolean {
  if (!Object.hasOwn(tx.savepoints, name)) return false;
  const position = tx.savepoints[name];
  if (position === undefined) return false;

  tx.operations.splice(position);
  for (const [other, otherPosition] of Object.entries(tx.savepoints)) {
    if (otherPosition > position) delete tx.savepoints[other];
  }
  return true;
}

/**
 * Resolve what an operation acts on. Exhaustive over every operation kind.
 */
export function operationTarget(op: TransactionOperation): OperationTarget {
  switch (op.kind) {
    case 'create_index':
      return { action: 'create', resource: 'index', name: op.params.name };
    case 'delete_index':
      return { action: 'delete', resource: 'index', name: op.name };
    case 'modify_index':
      return { action: 'modify', resource: 'index', name: op.name };
    case 'create_user':
      return { action: 'create', resource: 'user', name: op.params.name };
    case 'delete_user':
      return { action: 'delete', resource: 'user', name: op.name };
    case 'modify_user':
      return { action: 'modify', resource: 'user', name: op.name };
    case 'create_role':
      return { action: 'create', resource: 'role', name: op.params.name };
    case 'delete_role':
      return { action: 'delete', resource: 'role', name: op.name };
    case 'modify_role':
      return { action: 'modify', resource: 'role', name: op.name };
    case 'create_macro':
      return { action: 'create', resource: 'macro', name: op.params.name };
    case 'delete_macro':
      return { action: 'delete', resource: 'macro', name: op.name };
    case 'update_macro':
      return { action: 'modify', resource: 'macro', name: op.name };
    case 'create_saved_search':
      return { action: 'create', resource: 'saved_search', name: op.params.name };
    case 'delete_saved_search':
      return { action: 'delete', resource: 'saved_search', name: op.name };
    case 'update_saved_search':
      return { action: 'modify', resource: 'saved_search', name: op.name };
    default:
      return assertNever(op, 'transaction operation');
  }
}

/** Short, secret-free label such as `create_index 'web'`. */
export function describeOperation(op: TransactionOperation): string {
  return `${op.kind} '${operationTarget(op).name}'`;
}

const RESOURCE_LABELS: Record<ResourceType, string> = {
  index: 'Index name',
  user: 'Username',
  role: 'Role name',
  macro: 'Macro name',
  saved_search: 'Saved search name',
};

export function resourceLabel(resource: ResourceType): string {
  return RESOURCE_LABELS[resource];
}

/** Every operation kind, in declaration order. */
export const OPERATION_KINDS: readonly TransactionOperationKind[] = [
  'create_index',
  'delete_index',
  'modify_index',
  'create_user',
  'delete_user',
  'modify_user',
  'create_role',
  'delete_role',
  'modify_role',
  'create_macro',
  'delete_macro',
  'update_macro',
  'create_saved_search',
  'delete_saved_search',
  'update_saved_search',
] as const;

/**
 * Copy of a transaction with user passwords masked, for records that
 * outlive the commit.
 */
export function maskTransactionSecrets(tx: Transaction): Transaction {
  return {
    ...tx,
    savepoints: { ...tx.savepoints },
    operations: tx.operations.map((op): TransactionOperation => {
      if (op.kind === 'create_user') {
        return { ...op, params: { ...op.params, password: '********' } };
      }
      if (op.kind === 'modify_user' && op.params.password !== undefined) {
        return { ...op, params: { ...op.params, password: '********' } };
      }
      return op;
    }),
  };
}
