#!/usr/bin/env node

/**
 * API key administration CLI
 *
 * Works directly on the configured key store; the gateway does not need
 * to be running. Stop it first when the store is a file it also writes.
 *
 * Usage:
 *   gateway-keys create-admin --owner <name> [--expires-in-days <n>]
 *   gateway-keys list [--json] [--active-only]
 *   gateway-keys revoke <id|prefix>
 *   gateway-keys activate <id|prefix>
 */

import { KeyRegistry } from '../auth/key-registry.js';
import { loadConfig } from '../config/loader.js';
import { GatewayError } from '../api/errors.js';
import { createStore, parseArgs, runCommand, stringFlag } from './key-commands.js';

function printHelp(): void {
  console.log(`
gateway-keys - Manage gateway API keys

USAGE:
  gateway-keys create-admin --owner <name> [options]   Create a key with every capability
  gateway-keys list [options]                          List keys
  gateway-keys revoke <id|prefix>                      Revoke a key
  gateway-keys activate <id|prefix>                    Re-activate a revoked key

OPTIONS:
  --owner <name>                        Key owner (create-admin)
  --expires-in-days <n>                 Expiry in days (create-admin)
  --active-only                         Only usable keys (list)
  --json                                Output as JSON (list)
  --config <path>                       Configuration file
  --help                                Show this help message

ENVIRONMENT VARIABLES:
  GATEWAY_CONFIG                        Configuration file path
  NODE_ENV                              Configuration environment
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.flags.help === true) {
    printHelp();
    process.exit(0);
  }

  const config = loadConfig(stringFlag(args, 'config'));
  const registry = new KeyRegistry({
    store: createStore(config),
    defaultRateLimit: {
      maxRequests: config.auth.default_rate_limit.max_requests,
      windowMs: config.auth.default_rate_limit.window_ms,
    },
    keyPrefix: config.auth.key_prefix,
    usageFlushIntervalMs: 0,
  });

  try {
    await registry.load();
    const code = await runCommand(registry, args, (line) => console.log(line));
    if (code !== 0 && args._.length === 0) {
      printHelp();
    }
    process.exitCode = code;
  } finally {
    await registry.close();
  }
}

main().catch((error: unknown) => {
  const message = error instanceof GatewayError ? `${error.code}: ${error.message}` : String(error);
  console.error(`Error: ${message}`);
  process.exit(1);
});
