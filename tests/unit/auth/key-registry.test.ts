import { describe, it, expect, beforeEach, vi } from 'vitest';
import { KeyRegistry, KEY_PREFIX_LENGTH, hashKey } from '../../../src/auth/key-registry.js';
import { InMemoryKeyStore, type KeyStore } from '../../../src/auth/key-store.js';
import { UsageLog } from '../../../src/auth/usage-log.js';
import type { ApiKeyRecord } from '../../../src/types/auth.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('KeyRegistry', () => {
  let clock: number;
  let store: InMemoryKeyStore;
  let registry: KeyRegistry;

  beforeEach(async () => {
    clock = 1_700_000_000_000;
    store = new InMemoryKeyStore();
    registry = new KeyRegistry({
      store,
      defaultRateLimit: { maxRequests: 10, windowMs: 60_000 },
      usageFlushIntervalMs: 0,
      now: () => clock,
    });
    await registry.load();
  });

  describe('create', () => {
    it('returns the raw key once and stores only its digest', async () => {
      const { rawKey, record } = await registry.create({ owner: 'ops team', capabilities: ['embed'] });

      expect(rawKey.startsWith('ai_')).toBe(true);
      expect(record.keyPrefix).toBe(rawKey.slice(0, KEY_PREFIX_LENGTH));
      expect(record).not.toHaveProperty('digest');

      const [persisted] = await store.load();
      expect(persisted.digest).toBe(hashKey(rawKey));
      expect(JSON.stringify(persisted)).not.toContain(rawKey);
    });

    it('applies the default rate limit and canonical capability order', async () => {
      const { record } = await registry.create({ owner: 'ops', capabilities: ['admin', 'embed', 'embed'] });

      expect(record.capabilities).toEqual(['embed', 'admin']);
      expect(record.rateLimit).toEqual({ maxRequests: 10, windowMs: 60_000 });
      expect(record.status).toBe('active');
    });

    it('rejects an empty owner or capability list', async () => {
      await expect(registry.create({ owner: '   ', capabilities: ['embed'] })).rejects.toMatchObject({
        code: 'ValidationError',
      });
      await expect(registry.create({ owner: 'ops', capabilities: [] })).rejects.toMatchObject({
        code: 'ValidationError',
      });
    });

    it('drops the new record when the store refuses the write', async () => {
      const failing: KeyStore = {
        load: async () => [],
        save: async () => {
          throw new Error('disk full');
        },
        flush: async () => undefined,
      };
      const fragile = new KeyRegistry({
        store: failing,
        defaultRateLimit: { maxRequests: 1, windowMs: 1000 },
        usageFlushIntervalMs: 0,
      });
      await fragile.load();

      await expect(fragile.create({ owner: 'ops', capabilities: ['embed'] })).rejects.toThrow('disk full');
      expect(fragile.size).toBe(0);
    });
  });

  describe('authenticate', () => {
    it('resolves a valid key and counts the use', async () => {
      const { rawKey, record } = await registry.create({ owner: 'ops', capabilities: ['embed'] });

      const key = registry.authenticate(rawKey);

      expect(key.id).toBe(record.id);
      expect(key.usage.authentications).toBe(1);
      expect(key.usage.lastUsedAt).toBe(clock);
    });

    it('fails with AuthError for missing, unknown and tampered keys', async () => {
      const { rawKey } = await registry.create({ owner: 'ops', capabilities: ['embed'] });

      expect(() => registry.authenticate(undefined)).toThrow(expect.objectContaining({ code: 'AuthError' }));
      expect(() => registry.authenticate('')).toThrow(expect.objectContaining({ code: 'AuthError' }));
      expect(() => registry.authenticate('ai_not-a-real-key')).toThrow(expect.objectContaining({ code: 'AuthError' }));
      expect(() => registry.authenticate(`${rawKey}x`)).toThrow(expect.objectContaining({ code: 'AuthError' }));
    });

    it('refuses revoked keys and accepts them again after activation', async () => {
      const { rawKey, record } = await registry.create({ owner: 'ops', capabilities: ['embed'] });

      await registry.revoke(record.keyPrefix);
      expect(() => registry.authenticate(rawKey)).toThrow(expect.objectContaining({ code: 'AuthError' }));

      await registry.activate(record.id);
      expect(registry.authenticate(rawKey).status).toBe('active');
    });

    it('refuses expired keys', async () => {
      const { rawKey } = await registry.create({ owner: 'ops', capabilities: ['embed'], expiresInDays: 1 });

      clock += DAY_MS;

      expect(() => registry.authenticate(rawKey)).toThrow(expect.objectContaining({ code: 'AuthError' }));
    });
  });

  describe('authorize', () => {
    it('grants listed capabilities only', async () => {
      const { rawKey } = await registry.create({ owner: 'ops', capabilities: ['embed'] });
      const key = registry.authenticate(rawKey);

      expect(() => registry.authorize(key, 'embed')).not.toThrow();
      expect(() => registry.authorize(key, 'transcribe')).toThrow(
        expect.objectContaining({ code: 'PermissionDenied' })
      );
      expect(registry.get(key.id).usage).toMatchObject({
        authorizations: 1,
        denials: 1,
        byCapability: { embed: 1 },
      });
    });

    it('does not treat admin as a wildcard', async () => {
      const { rawKey } = await registry.create({ owner: 'root', capabilities: ['admin'] });
      const key = registry.authenticate(rawKey);

      expect(() => registry.authorize(key, 'generate')).toThrow(expect.objectContaining({ code: 'PermissionDenied' }));
    });

    it('sees a revocation that happened after authentication', async () => {
      const { rawKey, record } = await registry.create({ owner: 'ops', capabilities: ['embed'] });
      const key = registry.authenticate(rawKey);

      await registry.revoke(record.keyPrefix);

      expect(() => registry.authorize(key, 'embed')).toThrow(expect.objectContaining({ code: 'AuthError' }));
    });
  });

  describe('administration', () => {
    it('lists newest first and filters unusable keys', async () => {
      const first = await registry.create({ owner: 'first', capabilities: ['embed'] });
      clock += 1000;
      const second = await registry.create({ owner: 'second', capabilities: ['embed'] });
      await registry.revoke(first.record.keyPrefix);

      expect(registry.list().map((key) => key.owner)).toEqual(['second', 'first']);
      expect(registry.list({ activeOnly: true }).map((key) => key.id)).toEqual([second.record.id]);
    });

    it('updates capabilities and rate limit', async () => {
      const { record } = await registry.create({ owner: 'ops', capabilities: ['embed'] });

      const updated = await registry.update(record.keyPrefix, {
        capabilities: ['ocr', 'embed'],
        rateLimit: { maxRequests: 3, windowMs: 1000 },
      });

      expect(updated.capabilities).toEqual(['embed', 'ocr']);
      expect(updated.rateLimit).toEqual({ maxRequests: 3, windowMs: 1000 });
    });

    it('rolls back a failed edit without losing usage counted meanwhile', async () => {
      const backing = new InMemoryKeyStore();
      const pendingSaves: Array<(error: Error) => void> = [];
      let stall = false;
      const gated: KeyStore = {
        load: () => backing.load(),
        save: (records) => {
          if (!stall) {
            return backing.save(records);
          }
          return new Promise<void>((_resolve, reject) => {
            pendingSaves.push(reject);
          });
        },
        flush: () => backing.flush(),
      };
      const keys = new KeyRegistry({
        store: gated,
        defaultRateLimit: { maxRequests: 10, windowMs: 60_000 },
        usageFlushIntervalMs: 0,
        now: () => clock,
      });
      await keys.load();
      const { rawKey, record } = await keys.create({ owner: 'ops', capabilities: ['embed'] });

      stall = true;
      clock += 5000;
      const editing = keys.update(record.keyPrefix, { owner: 'platform', capabilities: ['ocr'] });
      await vi.waitFor(() => expect(pendingSaves).toHaveLength(1));

      const view = keys.authenticate(rawKey);
      keys.authorize(view, 'ocr');
      pendingSaves[0](new Error('disk full'));
      await expect(editing).rejects.toThrow('disk full');

      const after = keys.get(record.id);
      expect(after.owner).toBe('ops');
      expect(after.capabilities).toEqual(['embed']);
      expect(after.updatedAt).toBe(record.updatedAt);
      expect(after.usage).toMatchObject({
        authentications: 1,
        authorizations: 1,
        lastUsedAt: clock,
        byCapability: { ocr: 1 },
      });
    });

    it('reports NotFound for unknown references', async () => {
      await expect(registry.revoke('ai_missing00')).rejects.toMatchObject({ code: 'NotFound' });
      expect(() => registry.get('nope')).toThrow(expect.objectContaining({ code: 'NotFound' }));
    });

    it('computes global statistics', async () => {
      const admin = await registry.create({ owner: 'root', capabilities: ['admin'] });
      await registry.create({ owner: 'user', capabilities: ['embed'], expiresInDays: 1 });
      const gone = await registry.create({ owner: 'gone', capabilities: ['embed'] });
      await registry.revoke(gone.record.id);
      registry.authorize(registry.authenticate(admin.rawKey), 'admin');

      clock += 2 * DAY_MS;

      expect(registry.stats()).toEqual({
        totalKeys: 3,
        activeKeys: 1,
        revokedKeys: 1,
        expiredKeys: 1,
        adminKeys: 1,
        totalRequests: 1,
        keysUsed: 1,
        loggedRequests: 0,
      });
    });

    it('derives per-key statistics from the usage log', async () => {
      const usageLog = new UsageLog(10);
      const withLog = new KeyRegistry({
        store: new InMemoryKeyStore(),
        defaultRateLimit: { maxRequests: 10, windowMs: 60_000 },
        usageLog,
        usageFlushIntervalMs: 0,
      });
      await withLog.load();
      const { record } = await withLog.create({ owner: 'ops', capabilities: ['embed'] });

      const entry = { keyPrefix: record.keyPrefix, method: 'POST', status: 200, ip: '127.0.0.1' };
      usageLog.record({ ...entry, endpoint: '/embeddings/', timestamp: 10 });
      usageLog.record({ ...entry, endpoint: '/embeddings/', timestamp: 20 });
      usageLog.record({ ...entry, endpoint: '/embeddings/similarity', timestamp: 30 });

      expect(withLog.stats(record.keyPrefix)).toMatchObject({
        keyPrefix: record.keyPrefix,
        loggedRequests: 3,
        uniqueEndpoints: 2,
        firstRequestAt: 10,
        lastRequestAt: 30,
      });
    });
  });

  describe('persistence', () => {
    it('reloads records from the store', async () => {
      const { rawKey } = await registry.create({ owner: 'ops', capabilities: ['embed'] });

      const reloaded = new KeyRegistry({
        store,
        defaultRateLimit: { maxRequests: 10, windowMs: 60_000 },
        usageFlushIntervalMs: 0,
      });
      await reloaded.load();

      expect(reloaded.authenticate(rawKey).owner).toBe('ops');
    });

    it('refuses a store holding the same digest twice', async () => {
      const { record } = await registry.create({ owner: 'ops', capabilities: ['embed'] });
      const [stored] = await store.load();
      const duplicate: ApiKeyRecord = { ...stored, id: 'other-id', keyPrefix: 'ai_dupe00000' };

      const broken = new KeyRegistry({
        store: new InMemoryKeyStore([stored, duplicate]),
        defaultRateLimit: { maxRequests: 10, windowMs: 60_000 },
        usageFlushIntervalMs: 0,
      });

      await expect(broken.load()).rejects.toMatchObject({ code: 'ConfigurationError' });
      expect(record.id).toBe(stored.id);
    });

    it('persists usage counters on flush and close', async () => {
      const { rawKey } = await registry.create({ owner: 'ops', capabilities: ['embed'] });
      const savesBefore = store.getSaveCount();

      registry.authenticate(rawKey);
      await registry.close();

      expect(store.getSaveCount()).toBe(savesBefore + 1);
      const [persisted] = await store.load();
      expect(persisted.usage.authentications).toBe(1);
    });
  });
});
