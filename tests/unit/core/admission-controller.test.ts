import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AdmissionController } from '../../../src/core/admission-controller.js';
import type { ExecutionTicket } from '../../../src/types/admission.js';

const MODEL = 'llm:tiny';

function createController(overrides: { queueDepth?: number; maxConcurrent?: number; priorityOrdering?: boolean } = {}) {
  return new AdmissionController({
    models: {
      [MODEL]: {
        maxConcurrent: overrides.maxConcurrent ?? 1,
        queueDepth: overrides.queueDepth ?? 4,
        queueTimeoutMs: 1000,
      },
    },
    priorityOrdering: overrides.priorityOrdering,
  });
}

describe('AdmissionController', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('admits immediately below the concurrency cap', async () => {
    const controller = createController({ maxConcurrent: 2 });

    const first = await controller.admit(MODEL);
    const second = await controller.admit(MODEL);

    expect(first.ticketId).not.toBe(second.ticketId);
    expect(first.waitedMs).toBe(0);
    expect(controller.getStats().models[MODEL].active).toBe(2);
  });

  it('queues at the cap and admits in FIFO order on completion', async () => {
    const controller = createController();
    const order: number[] = [];

    const held = await controller.admit(MODEL);
    const waiting = [1, 2, 3].map((n) =>
      controller.admit(MODEL).then((ticket) => {
        order.push(n);
        return ticket;
      })
    );

    expect(controller.getStats().models[MODEL].queued).toBe(3);

    controller.complete(held);
    const t1 = await waiting[0];
    controller.complete(t1);
    const t2 = await waiting[1];
    controller.complete(t2);
    await waiting[2];

    expect(order).toEqual([1, 2, 3]);
  });

  it('orders waiters by priority when enabled', async () => {
    const controller = createController({ priorityOrdering: true });
    const order: string[] = [];

    const held = await controller.admit(MODEL);
    const low = controller.admit(MODEL, { priority: 0 }).then((t) => (order.push('low'), t));
    const high = controller.admit(MODEL, { priority: 5 }).then((t) => (order.push('high'), t));

    controller.complete(held);
    controller.complete(await high);
    await low;

    expect(order).toEqual(['high', 'low']);
  });

  it('rejects with queue_full once the queue is at depth', async () => {
    const controller = createController({ queueDepth: 1 });
    const rejected = vi.fn();
    controller.on('rejected', rejected);

    const held = await controller.admit(MODEL);
    const queued = controller.admit(MODEL);

    await expect(controller.admit(MODEL)).rejects.toMatchObject({
      code: 'ModelUnavailable',
      details: { modelId: MODEL, reason: 'queue_full' },
    });
    expect(rejected).toHaveBeenCalledWith(MODEL, 'queue_full');

    controller.complete(held);
    await expect(queued).resolves.toMatchObject({ modelId: MODEL });
  });

  it('times out a queued request without leaking a unit', async () => {
    const controller = createController();
    const held = await controller.admit(MODEL);

    const waiting = controller.admit(MODEL, { timeoutMs: 200 });
    const assertion = expect(waiting).rejects.toMatchObject({ code: 'RequestTimeout' });
    await vi.advanceTimersByTimeAsync(200);
    await assertion;

    const stats = controller.getStats().models[MODEL];
    expect(stats.queued).toBe(0);
    expect(stats.timedOut).toBe(1);

    controller.complete(held);
    expect(controller.getStats().models[MODEL].active).toBe(0);
  });

  it('removes a cancelled waiter from the queue', async () => {
    const controller = createController();
    const held = await controller.admit(MODEL);
    const abort = new AbortController();

    const waiting = controller.admit(MODEL, { signal: abort.signal });
    abort.abort();

    await expect(waiting).rejects.toMatchObject({ code: 'Cancelled' });
    expect(controller.getStats().models[MODEL]).toMatchObject({ queued: 0, cancelled: 1, active: 1 });

    controller.complete(held);
    expect(controller.getStats().models[MODEL].active).toBe(0);
  });

  it('treats a second complete of the same ticket as a no-op', async () => {
    const controller = createController({ maxConcurrent: 2 });
    const a = await controller.admit(MODEL);
    await controller.admit(MODEL);

    expect(controller.complete(a)).toBe(true);
    expect(controller.complete(a)).toBe(false);
    expect(controller.getStats().models[MODEL].active).toBe(1);
  });

  it('fails fast for unknown models and aborted signals', async () => {
    const controller = createController();
    const abort = new AbortController();
    abort.abort();

    await expect(controller.admit('llm:other')).rejects.toMatchObject({
      details: { reason: 'unknown_model' },
    });
    await expect(controller.admit(MODEL, { signal: abort.signal })).rejects.toMatchObject({ code: 'Cancelled' });
  });

  it('rejects waiters and new requests after cleanup', async () => {
    const controller = createController();
    const held: ExecutionTicket = await controller.admit(MODEL);
    const waiting = controller.admit(MODEL);

    controller.cleanup();

    await expect(waiting).rejects.toMatchObject({ details: { reason: 'shutting_down' } });
    await expect(controller.admit(MODEL)).rejects.toMatchObject({ details: { reason: 'shutting_down' } });

    const idle = controller.waitForIdle(1000);
    controller.complete(held);
    await expect(idle).resolves.toBe(true);
  });

  it('reports false from waitForIdle when work outlives the timeout', async () => {
    const controller = createController();
    await controller.admit(MODEL);

    const idle = controller.waitForIdle(100);
    await vi.advanceTimersByTimeAsync(100);

    await expect(idle).resolves.toBe(false);
  });
});
