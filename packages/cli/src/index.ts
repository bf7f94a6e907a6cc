#!/usr/bin/env node
/**
 * @clusterops/cli — Operator command line for the cluster management API
 *
 * Uses node:util parseArgs for lightweight argument parsing.
 */

import { runConfigCommand } from './commands/config.js';
import { runTransactionCommand } from './commands/transaction.js';
import { describeError } from './lib/errors.js';

const HELP = `clusterops — Operator client for the cluster management API

Usage: clusterops <command> [options]

Commands:
  config              Get or set configuration (url, api-token, username, ...)
  transaction         Stage and commit multi-resource changes

Run "clusterops <command> --help" for command-specific help.

Configuration:
  clusterops config set url https://cluster.example.com:8089
  clusterops config set api-token <token>
  clusterops config get
`;

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case 'config':
      runConfigCommand(rest);
      break;

    case 'transaction':
    case 'tx':
      await runTransactionCommand(rest);
      break;

    case '--help':
    case '-h':
    case undefined:
      console.log(HELP);
      break;

    case '--version':
    case '-v':
      console.log('0.1.0');
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  for (const line of describeError(err)) console.error(line);
  process.exit(1);
});
