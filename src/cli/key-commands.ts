/**
 * Commands behind the gateway-keys CLI.
 */

import type { KeyRegistry } from '../auth/key-registry.js';
import { FileKeyStore, InMemoryKeyStore, type KeyStore } from '../auth/key-store.js';
import type { RuntimeConfig } from '../types/schemas/config.js';
import type { ApiKeyView } from '../types/auth.js';

export interface CLIArgs {
  _: string[];
  flags: Record<string, string | true>;
}

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [], flags: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const nextArg = args[i + 1];

      if (nextArg !== undefined && !nextArg.startsWith('--')) {
        result.flags[key] = nextArg;
        i++;
      } else {
        result.flags[key] = true;
      }
    } else {
      result._.push(arg);
    }
  }

  return result;
}

export function stringFlag(args: CLIArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === 'string' ? value : undefined;
}

export function createStore(config: RuntimeConfig): KeyStore {
  if (config.auth.store === 'file' && config.auth.store_path !== undefined) {
    return new FileKeyStore({ filePath: config.auth.store_path });
  }
  return new InMemoryKeyStore();
}

function formatKey(key: ApiKeyView): string {
  const expires = key.expiresAt !== undefined ? new Date(key.expiresAt).toISOString() : 'never';
  return [
    `${key.keyPrefix}...  ${key.status.padEnd(8)} ${key.owner}`,
    `   id: ${key.id}`,
    `   capabilities: ${key.capabilities.join(', ')}`,
    `   rate limit: ${key.rateLimit.maxRequests} / ${key.rateLimit.windowMs}ms, expires: ${expires}`,
    `   requests: ${key.usage.authorizations}`,
  ].join('\n');
}

/**
 * Run one command against a loaded registry. Returns the exit code.
 */
export async function runCommand(registry: KeyRegistry, args: CLIArgs, out: (line: string) => void): Promise<number> {
  const command = args._[0];

  switch (command) {
    case 'create-admin': {
      const owner = stringFlag(args, 'owner');
      if (owner === undefined) {
        out('Error: --owner is required');
        return 1;
      }
      const days = stringFlag(args, 'expires-in-days');
      const expiresInDays = days !== undefined ? Number.parseInt(days, 10) : undefined;
      if (expiresInDays !== undefined && !(expiresInDays > 0)) {
        out('Error: --expires-in-days must be a positive integer');
        return 1;
      }

      const created = await registry.create({
        owner,
        description: 'Administrator key',
        capabilities: ['generate', 'transcribe', 'embed', 'ocr', 'business', 'admin'],
        expiresInDays,
      });
      out(`Created admin key for ${owner}`);
      out(`API key: ${created.rawKey}`);
      out('Store it now; it cannot be shown again.');
      return 0;
    }

    case 'list': {
      const keys = registry.list({ activeOnly: args.flags['active-only'] === true });
      if (args.flags.json === true) {
        out(JSON.stringify(keys, null, 2));
      } else if (keys.length === 0) {
        out('No keys');
      } else {
        for (const key of keys) {
          out(formatKey(key));
        }
      }
      return 0;
    }

    case 'revoke':
    case 'activate': {
      const target = args._[1];
      if (target === undefined) {
        out(`Error: ${command} needs a key id or prefix`);
        return 1;
      }
      const key = command === 'revoke' ? await registry.revoke(target) : await registry.activate(target);
      out(`Key ${key.keyPrefix} is now ${key.status}`);
      return 0;
    }

    default:
      out(command === undefined ? 'Error: No command specified' : `Error: Unknown command "${command}"`);
      return 1;
  }
}
