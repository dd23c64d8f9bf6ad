/**
 * API Key Registry
 *
 * Owns every ApiKeyRecord. Raw keys exist only in the create() return
 * value; the registry keeps a SHA-256 digest and a short display prefix
 * that doubles as the lookup index. Authentication compares digests in
 * constant time.
 *
 * Admin mutations for one key are serialized by a per-key mutex and
 * persisted before they resolve. Usage counters change on the request
 * path synchronously and are persisted in the background.
 */

import { createHash, randomBytes, randomUUID, timingSafeEqual } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  ApiKeyRecord,
  ApiKeyView,
  Capability,
  CreateKeyOptions,
  CreatedKey,
  GlobalKeyStats,
  KeyStats,
  ListKeysOptions,
  RateLimitPolicy,
  UpdateKeyOptions,
} from '../types/auth.js';
import { CAPABILITIES } from '../types/schemas/config.js';
import {
  GatewayError,
  authError,
  configurationError,
  notFound,
  permissionDenied,
  validationError,
} from '../api/errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { TimerGuard } from '../utils/timer-guard.js';
import { lazyLog } from '../utils/logger-helpers.js';
import type { KeyStore } from './key-store.js';
import type { UsageLog } from './usage-log.js';

/** Characters of the raw key used as display prefix and lookup index */
export const KEY_PREFIX_LENGTH = 12;

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_CREATE_ATTEMPTS = 5;

// Compared against when no candidate matches, so a miss costs one comparison too
const DUMMY_DIGEST = Buffer.alloc(32);

export interface KeyRegistryOptions {
  store: KeyStore;
  defaultRateLimit: RateLimitPolicy;
  /** Leading marker of generated keys (default "ai_") */
  keyPrefix?: string;
  usageLog?: UsageLog;
  /** Background persistence of usage counters; 0 disables (default 30s) */
  usageFlushIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export function hashKey(rawKey: string): string {
  return createHash('sha256').update(rawKey, 'utf8').digest('hex');
}

function toView(record: ApiKeyRecord): ApiKeyView {
  return {
    id: record.id,
    keyPrefix: record.keyPrefix,
    owner: record.owner,
    description: record.description,
    status: record.status,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    expiresAt: record.expiresAt,
    capabilities: [...record.capabilities],
    rateLimit: { ...record.rateLimit },
    usage: { ...record.usage, byCapability: { ...record.usage.byCapability } },
  };
}

type EditableFields = Pick<
  ApiKeyRecord,
  'owner' | 'description' | 'capabilities' | 'rateLimit' | 'status' | 'updatedAt'
>;

function editableFields(record: ApiKeyRecord): EditableFields {
  return {
    owner: record.owner,
    description: record.description,
    capabilities: [...record.capabilities],
    rateLimit: { ...record.rateLimit },
    status: record.status,
    updatedAt: record.updatedAt,
  };
}

function normalizeCapabilities(capabilities: readonly Capability[]): Capability[] {
  const wanted = new Set(capabilities);
  return CAPABILITIES.filter((capability) => wanted.has(capability));
}

export class KeyRegistry {
  private readonly store: KeyStore;
  private readonly defaultRateLimit: RateLimitPolicy;
  private readonly keyMarker: string;
  private readonly usageLog?: UsageLog;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly usageFlushIntervalMs: number;

  private readonly records = new Map<string, ApiKeyRecord>();
  private readonly idsByPrefix = new Map<string, string>();
  private readonly idsByDigest = new Map<string, string>();
  private readonly mutex = new KeyedMutex();
  private readonly flushTimer = new TimerGuard();
  private usageDirty = false;
  private loaded = false;

  constructor(options: KeyRegistryOptions) {
    this.store = options.store;
    this.defaultRateLimit = { ...options.defaultRateLimit };
    this.keyMarker = options.keyPrefix ?? 'ai_';
    this.usageLog = options.usageLog;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.usageFlushIntervalMs = options.usageFlushIntervalMs ?? 30_000;

    if (this.keyMarker.length >= KEY_PREFIX_LENGTH) {
      throw configurationError(`Key prefix must be shorter than ${KEY_PREFIX_LENGTH} characters`);
    }
  }

  /**
   * Read the store and rebuild the lookup indexes.
   */
  async load(): Promise<void> {
    const records = await this.store.load();

    this.records.clear();
    this.idsByPrefix.clear();
    this.idsByDigest.clear();

    for (const record of records) {
      if (this.idsByDigest.has(record.digest) || this.idsByPrefix.has(record.keyPrefix)) {
        throw configurationError(`Key store contains a duplicate key (prefix ${record.keyPrefix})`);
      }
      this.index(record);
    }

    this.loaded = true;
    if (this.usageFlushIntervalMs > 0) {
      this.flushTimer.setInterval(() => {
        this.flushUsage().catch((error: unknown) => {
          this.logger?.error({ err: error }, 'Failed to persist key usage counters');
        });
      }, this.usageFlushIntervalMs);
    }

    this.logger?.info({ keys: this.records.size }, 'Key registry loaded');
  }

  /**
   * Resolve a raw key to its record.
   *
   * Missing, unknown, revoked and expired keys all fail with AuthError.
   */
  authenticate(rawKey: string | undefined): ApiKeyView {
    if (rawKey === undefined || rawKey.length === 0) {
      throw authError('API key missing');
    }

    const digest = Buffer.from(hashKey(rawKey), 'hex');
    const candidateId = this.idsByPrefix.get(rawKey.slice(0, KEY_PREFIX_LENGTH));
    const candidate = candidateId !== undefined ? this.records.get(candidateId) : undefined;
    const expected = candidate ? Buffer.from(candidate.digest, 'hex') : DUMMY_DIGEST;
    const matches = timingSafeEqual(digest, expected) && candidate !== undefined;

    if (!matches || !candidate) {
      lazyLog(this.logger, 'debug', () => ({ keyPrefix: rawKey.slice(0, KEY_PREFIX_LENGTH) }), 'Unknown API key');
      throw authError();
    }

    if (!this.isUsable(candidate)) {
      lazyLog(
        this.logger,
        'debug',
        () => ({ keyPrefix: candidate.keyPrefix, status: candidate.status, expiresAt: candidate.expiresAt }),
        'Rejected revoked or expired API key'
      );
      throw authError();
    }

    candidate.usage.authentications += 1;
    candidate.usage.lastUsedAt = this.now();
    this.usageDirty = true;

    return toView(candidate);
  }

  /**
   * Check a capability against the current record.
   *
   * The live record is consulted, so a key revoked or narrowed after
   * authentication is refused here as well. `admin` grants nothing else.
   */
  authorize(key: Pick<ApiKeyView, 'id'>, capability: Capability): void {
    const record = this.records.get(key.id);
    if (!record || !this.isUsable(record)) {
      throw authError();
    }

    this.usageDirty = true;
    if (!record.capabilities.includes(capability)) {
      record.usage.denials += 1;
      lazyLog(this.logger, 'debug', () => ({ keyPrefix: record.keyPrefix, capability }), 'Capability denied');
      throw permissionDenied(capability);
    }

    record.usage.authorizations += 1;
    record.usage.byCapability[capability] = (record.usage.byCapability[capability] ?? 0) + 1;
  }

  /**
   * Issue a new key. The raw key is only ever returned here.
   */
  async create(options: CreateKeyOptions): Promise<CreatedKey> {
    this.ensureLoaded();

    const owner = options.owner.trim();
    if (owner.length === 0) {
      throw validationError('Key owner cannot be empty', { field: 'owner' });
    }
    const capabilities = normalizeCapabilities(options.capabilities);
    if (capabilities.length === 0) {
      throw validationError('At least one capability is required', { field: 'capabilities' });
    }
    if (options.expiresInDays !== undefined && !(options.expiresInDays > 0)) {
      throw validationError('expiresInDays must be positive', { field: 'expiresInDays' });
    }

    const { rawKey, digest, keyPrefix } = this.generateUniqueKey();
    const now = this.now();
    const record: ApiKeyRecord = {
      id: randomUUID(),
      keyPrefix,
      digest,
      owner,
      description: options.description ?? '',
      capabilities,
      rateLimit: { ...(options.rateLimit ?? this.defaultRateLimit) },
      status: 'active',
      createdAt: now,
      updatedAt: now,
      expiresAt: options.expiresInDays !== undefined ? now + options.expiresInDays * DAY_MS : undefined,
      usage: { authentications: 0, authorizations: 0, denials: 0, byCapability: {} },
    };

    this.index(record);

    try {
      await this.mutex.runExclusive(record.id, () => this.persist());
    } catch (error) {
      this.unindex(record);
      throw error;
    }

    this.logger?.info({ keyPrefix, owner, capabilities }, 'API key created');
    return { record: toView(record), rawKey };
  }

  async revoke(idOrPrefix: string): Promise<ApiKeyView> {
    return this.mutate(idOrPrefix, 'revoked', (record) => {
      record.status = 'revoked';
    });
  }

  async activate(idOrPrefix: string): Promise<ApiKeyView> {
    return this.mutate(idOrPrefix, 'activated', (record) => {
      record.status = 'active';
    });
  }

  async update(idOrPrefix: string, changes: UpdateKeyOptions): Promise<ApiKeyView> {
    if (changes.owner !== undefined && changes.owner.trim().length === 0) {
      throw validationError('Key owner cannot be empty', { field: 'owner' });
    }
    const capabilities = changes.capabilities ? normalizeCapabilities(changes.capabilities) : undefined;
    if (capabilities && capabilities.length === 0) {
      throw validationError('At least one capability is required', { field: 'capabilities' });
    }

    return this.mutate(idOrPrefix, 'updated', (record) => {
      if (changes.owner !== undefined) {
        record.owner = changes.owner.trim();
      }
      if (changes.description !== undefined) {
        record.description = changes.description;
      }
      if (capabilities) {
        record.capabilities = capabilities;
      }
      if (changes.rateLimit) {
        record.rateLimit = { ...changes.rateLimit };
      }
    });
  }

  /**
   * Records newest first.
   */
  list(options: ListKeysOptions = {}): ApiKeyView[] {
    return [...this.records.values()]
      .filter((record) => !options.activeOnly || this.isUsable(record))
      .sort((a, b) => b.createdAt - a.createdAt)
      .map(toView);
  }

  get(idOrPrefix: string): ApiKeyView {
    return toView(this.resolve(idOrPrefix));
  }

  stats(): GlobalKeyStats;
  stats(idOrPrefix: string): KeyStats;
  stats(idOrPrefix?: string): GlobalKeyStats | KeyStats {
    if (idOrPrefix !== undefined) {
      const record = this.resolve(idOrPrefix);
      const summary = this.usageLog?.summarize(record.keyPrefix);
      return {
        keyPrefix: record.keyPrefix,
        owner: record.owner,
        status: record.status,
        expired: this.isExpired(record),
        createdAt: record.createdAt,
        capabilities: [...record.capabilities],
        usage: { ...record.usage, byCapability: { ...record.usage.byCapability } },
        loggedRequests: summary?.requests ?? 0,
        uniqueEndpoints: summary?.uniqueEndpoints ?? 0,
        firstRequestAt: summary?.firstRequestAt,
        lastRequestAt: summary?.lastRequestAt,
      };
    }

    const stats: GlobalKeyStats = {
      totalKeys: this.records.size,
      activeKeys: 0,
      revokedKeys: 0,
      expiredKeys: 0,
      adminKeys: 0,
      totalRequests: 0,
      keysUsed: 0,
      loggedRequests: this.usageLog?.size ?? 0,
    };

    for (const record of this.records.values()) {
      if (record.status === 'revoked') {
        stats.revokedKeys += 1;
      } else if (this.isExpired(record)) {
        stats.expiredKeys += 1;
      } else {
        stats.activeKeys += 1;
      }
      if (record.capabilities.includes('admin')) {
        stats.adminKeys += 1;
      }
      if (record.usage.authentications > 0) {
        stats.keysUsed += 1;
      }
      stats.totalRequests += record.usage.authorizations;
    }

    return stats;
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Persist usage counters if any changed since the last write.
   */
  async flushUsage(): Promise<void> {
    if (!this.usageDirty) {
      return;
    }
    this.usageDirty = false;
    try {
      await this.persist();
    } catch (error) {
      this.usageDirty = true;
      throw error;
    }
  }

  /**
   * Stop background persistence and write the final snapshot.
   */
  async close(): Promise<void> {
    this.flushTimer.clear();
    if (this.loaded) {
      await this.flushUsage();
    }
    await this.store.flush();
  }

  private async mutate(
    idOrPrefix: string,
    action: string,
    apply: (record: ApiKeyRecord) => void
  ): Promise<ApiKeyView> {
    this.ensureLoaded();
    const { id } = this.resolve(idOrPrefix);

    return this.mutex.runExclusive(id, async () => {
      const record = this.records.get(id);
      if (!record) {
        throw notFound('API key');
      }

      const before = editableFields(record);
      apply(record);
      record.updatedAt = this.now();

      try {
        await this.persist();
      } catch (error) {
        // Usage counters may have moved while the write was pending
        Object.assign(record, before);
        throw error;
      }

      this.logger?.info({ keyPrefix: record.keyPrefix, status: record.status }, `API key ${action}`);
      return toView(record);
    });
  }

  private resolve(idOrPrefix: string): ApiKeyRecord {
    const id = this.records.has(idOrPrefix) ? idOrPrefix : this.idsByPrefix.get(idOrPrefix);
    const record = id !== undefined ? this.records.get(id) : undefined;
    if (!record) {
      throw notFound('API key');
    }
    return record;
  }

  private generateUniqueKey(): { rawKey: string; digest: string; keyPrefix: string } {
    for (let attempt = 0; attempt < MAX_CREATE_ATTEMPTS; attempt++) {
      const rawKey = `${this.keyMarker}${randomBytes(32).toString('base64url')}`;
      const keyPrefix = rawKey.slice(0, KEY_PREFIX_LENGTH);
      const digest = hashKey(rawKey);
      if (!this.idsByPrefix.has(keyPrefix) && !this.idsByDigest.has(digest)) {
        return { rawKey, digest, keyPrefix };
      }
    }
    throw new GatewayError('InternalError', 'Could not generate a unique API key');
  }

  private index(record: ApiKeyRecord): void {
    this.records.set(record.id, record);
    this.idsByPrefix.set(record.keyPrefix, record.id);
    this.idsByDigest.set(record.digest, record.id);
  }

  private unindex(record: ApiKeyRecord): void {
    this.records.delete(record.id);
    this.idsByPrefix.delete(record.keyPrefix);
    this.idsByDigest.delete(record.digest);
  }

  private isExpired(record: ApiKeyRecord): boolean {
    return record.expiresAt !== undefined && record.expiresAt <= this.now();
  }

  private isUsable(record: ApiKeyRecord): boolean {
    return record.status === 'active' && !this.isExpired(record);
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new GatewayError('InternalError', 'Key registry used before load()');
    }
  }

  private async persist(): Promise<void> {
    await this.store.save([...this.records.values()]);
  }
}
