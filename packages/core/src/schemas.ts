/**
 * @clusterops/core — Zod Validation Schemas
 *
 * Runtime validation for transaction records read back from disk and for
 * operations staged from the command line. Names are not required to be
 * non-empty here; that check belongs to transaction validation so it can
 * report which operation is at fault.
 */
import { z } from 'zod';
import type { Transaction, TransactionOperation } from './types.js';

const stringList = z.array(z.string());

// ─── Resource Parameter Schemas ─────────────────────────────────────

export const createIndexParamsSchema = z.object({
  name: z.string(),
  maxDataSizeMb: z.number().int().positive().optional(),
  frozenTimePeriodSecs: z.number().int().positive().optional(),
  homePath: z.string().optional(),
  coldPath: z.string().optional(),
  thawedPath: z.string().optional(),
});

export const modifyIndexParamsSchema = createIndexParamsSchema.omit({ name: true }).partial();

export const createUserParamsSchema = z.object({
  name: z.string(),
  password: z.string(),
  roles: stringList,
  realName: z.string().optional(),
  email: z.string().optional(),
  defaultApp: z.string().optional(),
});

export const modifyUserParamsSchema = createUserParamsSchema.omit({ name: true }).partial();

export const createRoleParamsSchema = z.object({
  name: z.string(),
  capabilities: stringList.optional(),
  importedRoles: stringList.optional(),
  searchIndexesAllowed: stringList.optional(),
  searchIndexesDefault: stringList.optional(),
  defaultApp: z.string().optional(),
});

export const modifyRoleParamsSchema = createRoleParamsSchema.omit({ name: true }).partial();

export const createMacroParamsSchema = z.object({
  name: z.string(),
  definition: z.string(),
  args: z.string().optional(),
  description: z.string().optional(),
  disabled: z.boolean().optional(),
  isEval: z.boolean().optional(),
});

export const updateMacroParamsSchema = createMacroParamsSchema.omit({ name: true }).partial();

export const createSavedSearchParamsSchema = z.object({
  name: z.string(),
  search: z.string(),
  description: z.string().optional(),
  disabled: z.boolean().optional(),
  cronSchedule: z.string().optional(),
  isScheduled: z.boolean().optional(),
});

export const updateSavedSearchParamsSchema = createSavedSearchParamsSchema
  .omit({ name: true })
  .partial();

// ─── Transaction Schemas ────────────────────────────────────────────

export const transactionOperationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('create_index'), params: createIndexParamsSchema }),
  z.object({ kind: z.literal('delete_index'), name: z.string() }),
  z.object({ kind: z.literal('modify_index'), name: z.string(), params: modifyIndexParamsSchema }),
  z.object({ kind: z.literal('create_user'), params: createUserParamsSchema }),
  z.object({ kind: z.literal('delete_user'), name: z.string() }),
  z.object({ kind: z.literal('modify_user'), name: z.string(), params: modifyUserParamsSchema }),
  z.object({ kind: z.literal('create_role'), params: createRoleParamsSchema }),
  z.object({ kind: z.literal('delete_role'), name: z.string() }),
  z.object({ kind: z.literal('modify_role'), name: z.string(), params: modifyRoleParamsSchema }),
  z.object({ kind: z.literal('create_macro'), params: createMacroParamsSchema }),
  z.object({ kind: z.literal('delete_macro'), name: z.string() }),
  z.object({ kind: z.literal('update_macro'), name: z.string(), params: updateMacroParamsSchema }),
  z.object({ kind: z.literal('create_saved_search'), params: createSavedSearchParamsSchema }),
  z.object({ kind: z.literal('delete_saved_search'), name: z.string() }),
  z.object({
    kind: z.literal('update_saved_search'),
    name: z.string(),
    params: updateSavedSearchParamsSchema,
  }),
]);

export const transactionSchema = z
  .object({
    id: z.string().min(1),
    operations: z.array(transactionOperationSchema),
    savepoints: z.record(z.number().int().nonnegative()),
    createdAt: z.string().datetime(),
    commitStartedAt: z.string().datetime().optional(),
  })
  .superRefine((tx, ctx) => {
    for (const [name, position] of Object.entries(tx.savepoints)) {
      if (position > tx.operations.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['savepoints', name],
          message: `Savepoint '${name}' points past the last operation (${position} > ${tx.operations.length})`,
        });
      }
    }
  });

/**
 * Parse an unknown value (typically JSON from disk) into a transaction.
 * Throws a ZodError describing every problem when the shape is wrong.
 */
export function parseTransaction(value: unknown): Transaction {
  return transactionSchema.parse(value);
}

/**
 * Parse an unknown value into a single transaction operation.
 */
export function parseTransactionOperation(value: unknown): TransactionOperation {
  return transactionOperationSchema.parse(value);
}
