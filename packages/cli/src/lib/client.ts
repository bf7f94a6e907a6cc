/**
 * Build SDK objects from CLI config.
 */
import { authFromEnv, ManagementClient, TransactionManager } from '@clusterops/sdk';
import type { AuthStrategy } from '@clusterops/sdk';
import type { CliConfig } from './config.js';
import { loadConfig, transactionDir } from './config.js';

/**
 * Credentials from the config file, falling back to CLUSTEROPS_* env vars.
 */
export function resolveAuth(config: CliConfig): AuthStrategy {
  if (config.apiToken) return { kind: 'api-token', token: config.apiToken };
  if (config.username && config.password) {
    return { kind: 'session', username: config.username, password: config.password };
  }
  const fromEnv = authFromEnv();
  if (fromEnv) return fromEnv;
  throw new Error(
    'No credentials configured. Set them with: clusterops config set api-token <token> ' +
      '(or username and password)',
  );
}

/**
 * @param urlOverride - Optional URL that takes precedence over the stored config.
 */
export function createClientFromConfig(urlOverride?: string): ManagementClient {
  const config = loadConfig();
  return new ManagementClient({
    url: urlOverride ?? config.url,
    auth: resolveAuth(config),
    timeoutMs: config.timeoutMs,
    retry: { maxRetries: config.maxRetries },
  });
}

/**
 * Transaction manager over the configured transaction directory. Pass a
 * client when the command needs to commit.
 */
export function createTransactionManager(client?: ManagementClient): TransactionManager {
  const config = loadConfig();
  return new TransactionManager({
    logDir: transactionDir(config),
    executor: client,
    metrics: client?.metrics ?? null,
  });
}
