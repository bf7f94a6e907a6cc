/**
 * CLI Configuration — stored in ~/.clusterops/config.json
 *
 * CLUSTEROPS_CONFIG_DIR points the CLI at another directory.
 */
import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { getErrorMessage } from '@clusterops/core';

export const cliConfigSchema = z.object({
  url: z.string().url(),
  apiToken: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().positive().optional(),
  transactionDir: z.string().min(1).optional(),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

const DEFAULT_CONFIG: CliConfig = {
  url: 'https://localhost:8089',
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function configDir(): string {
  return process.env.CLUSTEROPS_CONFIG_DIR ?? join(homedir(), '.clusterops');
}

export function configPath(): string {
  return join(configDir(), 'config.json');
}

/** Directory holding the pending transaction and its history. */
export function transactionDir(config: CliConfig): string {
  return config.transactionDir ?? join(configDir(), 'transactions');
}

/**
 * Load config from ~/.clusterops/config.json (returns defaults if missing).
 */
export function loadConfig(): CliConfig {
  const path = configPath();
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return { ...DEFAULT_CONFIG };
    throw new Error(`Cannot read config at ${path}: ${getErrorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config at ${path} is not valid JSON: ${getErrorMessage(err)}`);
  }

  const stored = parsed !== null && typeof parsed === 'object' ? parsed : {};
  const result = cliConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...stored });
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid config at ${path}: ${problems}`);
  }
  return result.data;
}

/**
 * Save config to ~/.clusterops/config.json. The file may hold credentials,
 * so it is written owner-only.
 */
export function saveConfig(config: CliConfig): void {
  mkdirSync(configDir(), { recursive: true });
  writeFileSync(configPath(), JSON.stringify(config, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
}

/**
 * Mask a secret for display: show the first 4 chars and mask the rest.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 4) return '•'.repeat(secret.length);
  return secret.slice(0, 4) + '•'.repeat(Math.min(secret.length - 4, 24));
}
