/**
 * @clusterops/core — Core Type Definitions
 */

// ─── Error Classification ───────────────────────────────────────────

/** Closed taxonomy every failed attempt is sorted into */
export type ErrorCategory =
  | 'transport'
  | 'http_4xx'
  | 'http_5xx'
  | 'api'
  | 'timeout'
  | 'tls'
  | 'unknown';

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'transport',
  'http_4xx',
  'http_5xx',
  'api',
  'timeout',
  'tls',
  'unknown',
] as const;

// ─── Resource Parameters ────────────────────────────────────────────

export interface CreateIndexParams {
  name: string;
  /** Upper bound on the index size on disk */
  maxDataSizeMb?: number;
  /** Age after which events roll to frozen */
  frozenTimePeriodSecs?: number;
  homePath?: string;
  coldPath?: string;
  thawedPath?: string;
}

export type ModifyIndexParams = Partial<Omit<CreateIndexParams, 'name'>>;

export interface CreateUserParams {
  name: string;
  password: string;
  roles: string[];
  realName?: string;
  email?: string;
  defaultApp?: string;
}

export type ModifyUserParams = Partial<Omit<CreateUserParams, 'name'>>;

export interface CreateRoleParams {
  name: string;
  capabilities?: string[];
  importedRoles?: string[];
  searchIndexesAllowed?: string[];
  searchIndexesDefault?: string[];
  defaultApp?: string;
}

export type ModifyRoleParams = Partial<Omit<CreateRoleParams, 'name'>>;

export interface CreateMacroParams {
  name: string;
  definition: string;
  args?: string;
  description?: string;
  disabled?: boolean;
  isEval?: boolean;
}

export type UpdateMacroParams = Partial<Omit<CreateMacroParams, 'name'>>;

export interface CreateSavedSearchParams {
  name: string;
  search: string;
  description?: string;
  disabled?: boolean;
  cronSchedule?: string;
  isScheduled?: boolean;
}

export type UpdateSavedSearchParams = Partial<Omit<CreateSavedSearchParams, 'name'>>;

// ─── Transactions ───────────────────────────────────────────────────

/** A single reversible step of a transaction */
export type TransactionOperation =
  | { kind: 'create_index'; params: CreateIndexParams }
  | { kind: 'delete_index'; name: string }
  | { kind: 'modify_index'; name: string; params: ModifyIndexParams }
  | { kind: 'create_user'; params: CreateUserParams }
  | { kind: 'delete_user'; name: string }
  | { kind: 'modify_user'; name: string; params: ModifyUserParams }
  | { kind: 'create_role'; params: CreateRoleParams }
  | { kind: 'delete_role'; name: string }
  | { kind: 'modify_role'; name: string; params: ModifyRoleParams }
  | { kind: 'create_macro'; params: CreateMacroParams }
  | { kind: 'delete_macro'; name: string }
  | { kind: 'update_macro'; name: string; params: UpdateMacroParams }
  | { kind: 'create_saved_search'; params: CreateSavedSearchParams }
  | { kind: 'delete_saved_search'; name: string }
  | { kind: 'update_saved_search'; name: string; params: UpdateSavedSearchParams };

export type TransactionOperationKind = TransactionOperation['kind'];

export type ResourceType = 'index' | 'user' | 'role' | 'macro' | 'saved_search';

export interface Transaction {
  /** ULID */
  id: string;
  /** Operations in execution order */
  operations: TransactionOperation[];
  /** Savepoint name → number of operations present when it was set */
  savepoints: Record<string, number>;
  /** ISO-8601 */
  createdAt: string;
  /** Set once commit starts executing; a pending record carrying it was interrupted */
  commitStartedAt?: string;
}

/** Terminal label written into an archived transaction's file name */
export type TransactionStatus = 'committed' | 'rolled_back' | 'rollback_failed' | 'aborted';
