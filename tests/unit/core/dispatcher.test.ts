import { describe, it, expect, beforeEach } from 'vitest';
import { Dispatcher } from '../../../src/core/dispatcher.js';
import { AdmissionController } from '../../../src/core/admission-controller.js';
import { ModelSlotManager } from '../../../src/core/model-slot-manager.js';
import { KeyRegistry } from '../../../src/auth/key-registry.js';
import { InMemoryKeyStore } from '../../../src/auth/key-store.js';
import { RateLimiter } from '../../../src/auth/rate-limiter.js';
import { FakeBackend } from '../../helpers/fake-backend.js';

const MODEL = 'embed:mini';

interface Harness {
  backend: FakeBackend;
  registry: KeyRegistry;
  rateLimiter: RateLimiter;
  slots: ModelSlotManager;
  admission: AdmissionController;
  dispatcher: Dispatcher;
}

async function createHarness(maxRequests = 10, queueDepth = 0): Promise<Harness> {
  const backend = new FakeBackend({ handlers: { echo: (params) => params } });
  const registry = new KeyRegistry({
    store: new InMemoryKeyStore(),
    defaultRateLimit: { maxRequests, windowMs: 60_000 },
    usageFlushIntervalMs: 0,
  });
  await registry.load();
  const rateLimiter = new RateLimiter({ cleanupIntervalMs: 0 });
  const slots = new ModelSlotManager(backend, {
    budgetBytes: 1000,
    models: [{ id: MODEL, kind: 'embed', estimatedBytes: 100, options: {} }],
    drainTimeoutMs: 100,
  });
  const admission = new AdmissionController({
    models: { [MODEL]: { maxConcurrent: 1, queueDepth, queueTimeoutMs: 1000 } },
  });
  const dispatcher = new Dispatcher({ registry, rateLimiter, slots, admission });
  return { backend, registry, rateLimiter, slots, admission, dispatcher };
}

describe('Dispatcher', () => {
  let h: Harness;
  let rawKey: string;

  beforeEach(async () => {
    h = await createHarness();
    ({ rawKey } = await h.registry.create({ owner: 'ops', capabilities: ['embed'] }));
  });

  it('runs the full pipeline and gives everything back', async () => {
    const result = await h.dispatcher.dispatch({ rawKey, capability: 'embed', modelId: MODEL }, (model) =>
      model.call('echo', { value: 1 })
    );

    expect(result.value).toEqual({ value: 1 });
    expect(result.context.key.owner).toBe('ops');
    expect(result.context.rateLimit.remaining).toBe(9);
    expect(h.slots.getSlotStatus(MODEL)?.refCount).toBe(0);
    expect(h.admission.getStats().totalActive).toBe(0);
  });

  it('stops at authentication before touching any model', async () => {
    await expect(
      h.dispatcher.dispatch({ rawKey: 'ai_unknownkey', capability: 'embed', modelId: MODEL }, (model) =>
        model.call('echo', {})
      )
    ).rejects.toMatchObject({ code: 'AuthError' });
    expect(h.backend.loads).toEqual([]);
  });

  it('does not charge quota for a denied capability', async () => {
    await expect(
      h.dispatcher.dispatch({ rawKey, capability: 'ocr', modelId: MODEL }, (model) => model.call('echo', {}))
    ).rejects.toMatchObject({ code: 'PermissionDenied' });

    const key = h.registry.list()[0];
    expect(h.rateLimiter.peek(key.id, key.rateLimit).remaining).toBe(10);
    expect(h.backend.loads).toEqual([]);
  });

  it('stops at the rate limit before loading', async () => {
    const limited = await createHarness(1);
    const created = await limited.registry.create({ owner: 'ops', capabilities: ['embed'] });
    limited.dispatcher.authorizeRequest(created.rawKey, 'embed');

    await expect(
      limited.dispatcher.dispatch({ rawKey: created.rawKey, capability: 'embed', modelId: MODEL }, (model) =>
        model.call('echo', {})
      )
    ).rejects.toMatchObject({ code: 'RateLimitExceeded' });
    expect(limited.backend.loads).toEqual([]);
  });

  it('maps invoker failures to BackendError and still releases', async () => {
    await expect(
      h.dispatcher.dispatch({ rawKey, capability: 'embed', modelId: MODEL }, (model) => model.call('missing', {}))
    ).rejects.toMatchObject({ code: 'BackendError', message: 'No handler for missing' });

    expect(h.slots.getSlotStatus(MODEL)?.refCount).toBe(0);
    expect(h.admission.getStats().models[MODEL]).toMatchObject({ active: 0, completed: 1 });
  });

  it('refuses an already aborted request without loading', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      h.dispatcher.dispatch(
        { rawKey, capability: 'embed', modelId: MODEL, signal: controller.signal },
        (model) => model.call('echo', {})
      )
    ).rejects.toMatchObject({ code: 'Cancelled' });
    expect(h.backend.loads).toEqual([]);
  });

  it('rejects with queue_full when the model is saturated', async () => {
    h.backend.hold();
    const context = h.dispatcher.authorizeRequest(rawKey, 'embed');
    const first = h.dispatcher.runOnModel(context, MODEL, (model) => model.call('echo', 'first'));

    await expect.poll(() => h.admission.getStats().totalActive).toBe(1);

    await expect(
      h.dispatcher.runOnModel(context, MODEL, (model) => model.call('echo', 'second'))
    ).rejects.toMatchObject({ code: 'ModelUnavailable', details: { reason: 'queue_full' } });
    expect(h.slots.getSlotStatus(MODEL)?.refCount).toBe(1);

    h.backend.release();
    await expect(first).resolves.toBe('first');
    expect(h.slots.getSlotStatus(MODEL)?.refCount).toBe(0);
  });

  it('gives everything back when queued and running requests are cancelled', async () => {
    const q = await createHarness(10, 1);
    const created = await q.registry.create({ owner: 'ops', capabilities: ['embed'] });
    const running = new AbortController();
    const waiting = new AbortController();
    q.backend.hold();

    const first = q.dispatcher.dispatch(
      { rawKey: created.rawKey, capability: 'embed', modelId: MODEL, signal: running.signal },
      (model, options) => model.call('echo', 'first', options)
    );
    await expect.poll(() => q.backend.activeCalls).toBe(1);
    const second = q.dispatcher.dispatch(
      { rawKey: created.rawKey, capability: 'embed', modelId: MODEL, signal: waiting.signal },
      (model, options) => model.call('echo', 'second', options)
    );
    await expect.poll(() => q.admission.getStats().totalQueued).toBe(1);

    waiting.abort();
    await expect(second).rejects.toMatchObject({ code: 'Cancelled' });
    running.abort();
    await expect(first).rejects.toMatchObject({ code: 'Cancelled' });

    expect(q.slots.getSlotStatus(MODEL)?.refCount).toBe(0);
    expect(q.admission.getStats()).toMatchObject({ totalActive: 0, totalQueued: 0 });
    expect(q.admission.getStats().models[MODEL]).toMatchObject({ cancelled: 1, completed: 1 });
    expect(q.backend.calls.map((call) => call.params)).toEqual(['first']);
  });

  it('checks access without consuming quota', () => {
    const key = h.dispatcher.checkAccess(rawKey, 'embed');

    expect(h.rateLimiter.peek(key.id, key.rateLimit).remaining).toBe(10);
    expect(() => h.dispatcher.checkAccess(rawKey, 'admin')).toThrow(
      expect.objectContaining({ code: 'PermissionDenied' })
    );
  });
});
