/**
 * API key persistence.
 *
 * The registry keeps every record in memory and hands the store whole
 * snapshots. Stores only need to load the last snapshot and persist a
 * new one; they never see raw keys.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { ApiKeyRecord } from '../types/auth.js';
import { KEY_STORE_VERSION, KeyStoreSnapshotSchema } from '../types/schemas/keys.js';
import { configurationError, zodErrorToGatewayError } from '../api/errors.js';

export interface KeyStore {
  load(): Promise<ApiKeyRecord[]>;
  save(records: readonly ApiKeyRecord[]): Promise<void>;
  /** Resolves once every pending write has settled */
  flush(): Promise<void>;
}

function cloneRecord(record: ApiKeyRecord): ApiKeyRecord {
  return {
    ...record,
    capabilities: [...record.capabilities],
    rateLimit: { ...record.rateLimit },
    usage: { ...record.usage, byCapability: { ...record.usage.byCapability } },
  };
}

export class InMemoryKeyStore implements KeyStore {
  private records: ApiKeyRecord[];
  private saves = 0;

  constructor(initial: readonly ApiKeyRecord[] = []) {
    this.records = initial.map(cloneRecord);
  }

  async load(): Promise<ApiKeyRecord[]> {
    return this.records.map(cloneRecord);
  }

  async save(records: readonly ApiKeyRecord[]): Promise<void> {
    this.records = records.map(cloneRecord);
    this.saves += 1;
  }

  async flush(): Promise<void> {
    return;
  }

  getSaveCount(): number {
    return this.saves;
  }
}

export interface FileKeyStoreOptions {
  filePath: string;
  logger?: Logger;
}

/**
 * JSON snapshot on disk. Each write goes to a temp file that is renamed
 * over the target, and writes run strictly one after another.
 */
export class FileKeyStore implements KeyStore {
  private readonly filePath: string;
  private readonly logger?: Logger;
  private writeQueue: Promise<void> = Promise.resolve();
  private writeCount = 0;

  constructor(options: FileKeyStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.logger = options.logger;
  }

  async load(): Promise<ApiKeyRecord[]> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger?.info({ filePath: this.filePath }, 'Key store not found, starting empty');
        return [];
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw configurationError(`Key store ${this.filePath} is not valid JSON: ${message}`);
    }

    const parsed = KeyStoreSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw zodErrorToGatewayError(parsed.error, 'ConfigurationError');
    }

    this.logger?.info({ filePath: this.filePath, keys: parsed.data.keys.length }, 'Key store loaded');
    return parsed.data.keys;
  }

  save(records: readonly ApiKeyRecord[]): Promise<void> {
    // Snapshot is taken at call time, not at write time
    const payload = JSON.stringify({ version: KEY_STORE_VERSION, keys: records }, null, 2);

    const run = this.writeQueue.then(() => this.writeSnapshot(payload));
    this.writeQueue = run.catch((error: unknown) => {
      this.logger?.debug({ err: error }, 'Key store write failed, continuing with next snapshot');
    });
    return run;
  }

  flush(): Promise<void> {
    return this.writeQueue;
  }

  private async writeSnapshot(payload: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    this.writeCount += 1;
    const tempPath = `${this.filePath}.${process.pid}.${this.writeCount}.tmp`;
    try {
      await fs.writeFile(tempPath, payload, { encoding: 'utf-8', mode: 0o600 });
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
