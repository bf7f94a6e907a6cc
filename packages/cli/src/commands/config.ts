/**
 * clusterops config — get/set configuration
 */
import type { CliConfig } from '../lib/config.js';
import { cliConfigSchema, configPath, loadConfig, maskSecret, saveConfig, transactionDir } from '../lib/config.js';

const KEYS = ['url', 'api-token', 'username', 'password', 'max-retries', 'timeout-ms', 'transaction-dir'] as const;
type ConfigKey = (typeof KEYS)[number];

function isConfigKey(key: string): key is ConfigKey {
  return KEYS.some((k) => k === key);
}

function parseCount(key: ConfigKey, value: string): number {
  if (!/^\d+$/.test(value)) {
    console.error(`Invalid value for ${key}: expected a whole number`);
    process.exit(1);
  }
  return Number(value);
}

function applySetting(config: CliConfig, key: ConfigKey, value: string): CliConfig {
  switch (key) {
    case 'url':
      return { ...config, url: value };
    case 'api-token':
      return { ...config, apiToken: value };
    case 'username':
      return { ...config, username: value };
    case 'password':
      return { ...config, password: value };
    case 'max-retries':
      return { ...config, maxRetries: parseCount(key, value) };
    case 'timeout-ms':
      return { ...config, timeoutMs: parseCount(key, value) };
    case 'transaction-dir':
      return { ...config, transactionDir: value };
  }
}

export function runConfigCommand(args: string[]): void {
  const subcommand = args[0];

  if (subcommand === 'set') {
    const key = args[1];
    const value = args[2];

    if (!key || !value) {
      console.error('Usage: clusterops config set <key> <value>');
      console.error(`Keys: ${KEYS.join(', ')}`);
      process.exit(1);
    }

    if (!isConfigKey(key)) {
      console.error(`Unknown config key: ${key}`);
      console.error(`Valid keys: ${KEYS.join(', ')}`);
      process.exit(1);
    }

    const result = cliConfigSchema.safeParse(applySetting(loadConfig(), key, value));
    if (!result.success) {
      console.error(`Invalid value for ${key}: ${result.error.issues.map((i) => i.message).join('; ')}`);
      process.exit(1);
    }

    saveConfig(result.data);
    console.log(`✓ Set ${key}`);
    return;
  }

  if (subcommand === 'get' || !subcommand) {
    const config = loadConfig();
    console.log(`clusterops configuration (${configPath()}):`);
    console.log(`  url:             ${config.url}`);
    console.log(`  api-token:       ${config.apiToken ? maskSecret(config.apiToken) : '(not set)'}`);
    console.log(`  username:        ${config.username ?? '(not set)'}`);
    console.log(`  password:        ${config.password ? '********' : '(not set)'}`);
    console.log(`  max-retries:     ${config.maxRetries ?? '(default)'}`);
    console.log(`  timeout-ms:      ${config.timeoutMs ?? '(default)'}`);
    console.log(`  transaction-dir: ${transactionDir(config)}`);
    return;
  }

  console.error(`Unknown config subcommand: ${subcommand}`);
  console.error('Usage: clusterops config [get|set <key> <value>]');
  process.exit(1);
}
