/**
 * Model Slot Manager
 *
 * Keeps one slot per configured model and moves it through
 * unloaded -> loading -> ready -> unloading -> unloaded (or failed).
 *
 * Responsibilities:
 * - Single-flight loads: concurrent acquirers of a cold model share one
 *   backend load and all receive handles when it completes
 * - Reference counting: a slot with live handles is never unloaded
 * - Memory budget: a load reserves its estimated footprint up front;
 *   least-recently-used idle slots are evicted to make room, and a load
 *   that cannot be satisfied fails immediately with resource_exhausted
 * - Pinned models are never evicted; preload warms models at startup
 * - Worker crashes move the slot to failed so the next acquire reloads
 *
 * Every state transition happens synchronously between awaits, so the
 * slot table needs no lock; no transition is held across a backend call.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type {
  AcquireOptions,
  LoadedModel,
  ModelBackend,
  ModelHandle,
  ModelSlotStatus,
  ModelSpec,
  SlotManagerMetrics,
  SlotState,
} from '../types/models.js';
import {
  GatewayError,
  cancelled,
  configurationError,
  modelUnavailable,
  notFound,
  validationError,
} from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';

export type UnloadReason = 'eviction' | 'manual' | 'shutdown';

export interface ModelSlotDefinition extends ModelSpec {
  /** Disabled models refuse acquisition (default true) */
  enabled?: boolean;
}

export interface ModelSlotManagerConfig {
  budgetBytes: number;
  models: ModelSlotDefinition[];
  /** Never selected for eviction */
  pinned?: string[];
  /** Loaded by preload() */
  preload?: string[];
  /** How long shutdown waits for in-flight references */
  drainTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface PreloadResult {
  completed: string[];
  failed: Array<{ modelId: string; error: GatewayError }>;
  durationMs: number;
}

/**
 * Lifecycle events emitted by the manager
 */
export interface ModelSlotEvents {
  modelLoaded: (modelId: string, status: ModelSlotStatus) => void;
  modelLoadFailed: (modelId: string, error: GatewayError) => void;
  modelUnloaded: (modelId: string, reason: UnloadReason | 'crashed') => void;
  modelEvicted: (modelId: string, forModelId: string) => void;
  modelAcquired: (modelId: string, refCount: number) => void;
  modelReleased: (modelId: string, refCount: number) => void;
}

interface LoadWaiter {
  resolve: (handle: ModelHandle) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/** Internal per-model tracking structure */
interface ModelSlot {
  spec: ModelSpec;
  enabled: boolean;
  pinned: boolean;
  state: SlotState;
  reservedBytes: number;
  lastAccessedMs: number;
  refCount: number;
  generation: number;
  loadCount: number;
  lastError?: string;
  model?: LoadedModel;
  pendingLoad?: Promise<void>;
  pendingUnload?: Promise<void>;
  detachExit?: () => void;
  loadWaiters: LoadWaiter[];
}

interface OutstandingHandle {
  modelId: string;
  generation: number;
}

type DrainResolution = (drained: boolean) => void;

const DEFAULT_DRAIN_TIMEOUT_MS = 30_000;

const RESERVING_STATES: ReadonlySet<SlotState> = new Set<SlotState>(['loading', 'ready', 'unloading']);

export class ModelSlotManager extends EventEmitter<ModelSlotEvents> {
  private readonly backend: ModelBackend;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly budgetBytes: number;
  private readonly drainTimeoutMs: number;
  private readonly preloadIds: string[];
  private readonly slots = new Map<string, ModelSlot>();
  private readonly handles = new Map<number, OutstandingHandle>();
  private readonly drainWaiters = new Map<string, Set<DrainResolution>>();
  private readonly loadAbort = new AbortController();

  private nextHandleId = 1;
  private shuttingDown = false;

  private metrics = {
    loads: 0,
    loadFailures: 0,
    evictions: 0,
    crashes: 0,
    acquisitions: 0,
  };

  constructor(backend: ModelBackend, config: ModelSlotManagerConfig) {
    super();
    this.backend = backend;
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
    this.budgetBytes = config.budgetBytes;
    this.drainTimeoutMs = config.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.preloadIds = [...(config.preload ?? [])];

    const pinned = new Set(config.pinned ?? []);

    for (const definition of config.models) {
      if (this.slots.has(definition.id)) {
        throw configurationError(`Duplicate model id "${definition.id}"`);
      }
      if (definition.estimatedBytes > this.budgetBytes) {
        throw configurationError(
          `Model ${definition.id} needs ${definition.estimatedBytes} bytes but the memory budget is ${this.budgetBytes}`,
          { modelId: definition.id }
        );
      }
      const { enabled, ...spec } = definition;
      this.slots.set(definition.id, {
        spec,
        enabled: enabled ?? true,
        pinned: pinned.has(definition.id),
        state: 'unloaded',
        reservedBytes: 0,
        lastAccessedMs: 0,
        refCount: 0,
        generation: 0,
        loadCount: 0,
        loadWaiters: [],
      });
    }

    let pinnedBytes = 0;
    for (const modelId of pinned) {
      const slot = this.slots.get(modelId);
      if (!slot) {
        throw configurationError(`Pinned model "${modelId}" is not defined`);
      }
      pinnedBytes += slot.spec.estimatedBytes;
    }
    if (pinnedBytes > this.budgetBytes) {
      throw configurationError(
        `Pinned models need ${pinnedBytes} bytes but the memory budget is ${this.budgetBytes}`
      );
    }

    for (const modelId of this.preloadIds) {
      if (!this.slots.has(modelId)) {
        throw configurationError(`Preloaded model "${modelId}" is not defined`);
      }
    }
  }

  /**
   * Obtain a reference to a ready model, loading it if needed.
   */
  public async acquire(modelId: string, options: AcquireOptions = {}): Promise<ModelHandle> {
    const { signal } = options;
    const slot = this.slots.get(modelId);
    if (!slot) {
      throw modelUnavailable(modelId, 'unknown_model', `Unknown model ${modelId}`);
    }

    for (;;) {
      if (this.shuttingDown) {
        throw modelUnavailable(modelId, 'shutting_down', 'Gateway is shutting down');
      }
      if (!slot.enabled) {
        throw modelUnavailable(modelId, 'disabled', `Model ${modelId} is disabled`);
      }
      if (signal?.aborted) {
        throw cancelled();
      }

      switch (slot.state) {
        case 'ready':
          return this.issueHandle(slot);

        case 'loading':
          return this.waitForLoad(slot, signal);

        case 'unloading':
          if (slot.pendingUnload) {
            await this.awaitWithSignal(slot.pendingUnload, signal);
          }
          continue;

        case 'unloaded':
        case 'failed':
          this.startLoad(slot);
          return this.waitForLoad(slot, signal);
      }
    }
  }

  /**
   * Drop one reference. Releasing the same handle twice is a no-op, and
   * handles from a generation that crashed release without effect.
   */
  public release(handle: ModelHandle): boolean {
    const outstanding = this.handles.get(handle.handleId);
    if (!outstanding) {
      return false;
    }
    this.handles.delete(handle.handleId);

    const slot = this.slots.get(outstanding.modelId);
    if (!slot) {
      return false;
    }

    if (slot.state === 'ready' && slot.generation === outstanding.generation && slot.refCount > 0) {
      slot.refCount -= 1;
      slot.lastAccessedMs = this.now();
      if (slot.refCount === 0) {
        this.notifyDrainWaiters(slot.spec.id);
      }
    }

    this.emit('modelReleased', slot.spec.id, slot.refCount);
    return true;
  }

  /**
   * Load configured preload models. Failures are logged and reported,
   * never thrown; failed slots stay retryable.
   */
  public async preload(): Promise<PreloadResult> {
    const start = this.now();
    const completed: string[] = [];
    const failed: PreloadResult['failed'] = [];

    for (const modelId of this.preloadIds) {
      try {
        const handle = await this.acquire(modelId);
        this.release(handle);
        completed.push(modelId);
      } catch (error) {
        const gatewayError =
          error instanceof GatewayError ? error : new GatewayError('InternalError', String(error));
        failed.push({ modelId, error: gatewayError });
        this.logger?.warn({ modelId, error: gatewayError.message }, 'Model preload failed');
      }
    }

    if (completed.length > 0) {
      this.logger?.info({ completed }, 'Model preload completed');
    }
    return { completed, failed, durationMs: this.now() - start };
  }

  /**
   * Unload an idle model on request. Fails while references are held.
   */
  public async unloadModel(modelId: string): Promise<void> {
    const slot = this.slots.get(modelId);
    if (!slot) {
      throw notFound(`Model ${modelId}`);
    }

    switch (slot.state) {
      case 'unloaded':
        return;
      case 'failed':
        slot.state = 'unloaded';
        return;
      case 'unloading':
        await slot.pendingUnload;
        return;
      case 'loading':
        throw validationError(`Model ${modelId} is loading`);
      case 'ready':
        if (slot.refCount > 0) {
          throw validationError(`Model ${modelId} is in use (${slot.refCount} active references)`);
        }
        await this.beginUnload(slot, 'manual');
        return;
    }
  }

  /**
   * Refuse new acquisitions, wait for references to drain (bounded by
   * the drain timeout), then unload every model.
   */
  public async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.loadAbort.abort();

    const pendingLoads = [...this.slots.values()]
      .map((slot) => slot.pendingLoad)
      .filter((pending): pending is Promise<void> => pending !== undefined);
    await Promise.allSettled(pendingLoads);

    await Promise.all(
      [...this.slots.values()].map(async (slot) => {
        if (slot.state === 'unloading' && slot.pendingUnload) {
          await slot.pendingUnload;
          return;
        }
        if (slot.state !== 'ready') {
          return;
        }

        const drained = await this.waitForDrain(slot.spec.id);
        if (!drained) {
          this.logger?.warn(
            { modelId: slot.spec.id, refCount: slot.refCount },
            'Drain timeout; forcing unload'
          );
          // Outstanding handles of this generation become inert
          slot.generation += 1;
          slot.refCount = 0;
        }
        if (slot.state === 'ready') {
          await this.beginUnload(slot, 'shutdown');
        }
      })
    );

    this.logger?.info({ metrics: this.metrics }, 'Model slot manager shut down');
  }

  public getSlotStatus(modelId: string): ModelSlotStatus | undefined {
    const slot = this.slots.get(modelId);
    return slot ? this.toStatus(slot) : undefined;
  }

  public listSlots(): ModelSlotStatus[] {
    return [...this.slots.values()].map((slot) => this.toStatus(slot));
  }

  public getMetrics(): SlotManagerMetrics {
    const slots: Record<SlotState, number> = {
      unloaded: 0,
      loading: 0,
      ready: 0,
      unloading: 0,
      failed: 0,
    };
    for (const slot of this.slots.values()) {
      slots[slot.state] += 1;
    }
    return {
      budgetBytes: this.budgetBytes,
      reservedBytes: this.committedBytes(),
      ...this.metrics,
      slots,
    };
  }

  private issueHandle(slot: ModelSlot): ModelHandle {
    const model = slot.model;
    if (slot.state !== 'ready' || !model) {
      throw new GatewayError('InternalError', `Model ${slot.spec.id} is not ready`);
    }

    slot.refCount += 1;
    slot.lastAccessedMs = this.now();
    this.metrics.acquisitions += 1;

    const handle: ModelHandle = Object.freeze({
      handleId: this.nextHandleId++,
      modelId: slot.spec.id,
      kind: slot.spec.kind,
      generation: slot.generation,
      model,
    });
    this.handles.set(handle.handleId, { modelId: slot.spec.id, generation: slot.generation });
    this.emit('modelAcquired', slot.spec.id, slot.refCount);
    return handle;
  }

  /**
   * Reserve budget, pick eviction victims and start the backend load.
   * Synchronous up to the backend call, so concurrent acquirers observe
   * `loading` and join as waiters.
   */
  private startLoad(slot: ModelSlot): void {
    const needed = slot.spec.estimatedBytes;
    const victims = this.selectVictims(slot, needed);

    const victimUnloads = victims.map((victim) => {
      this.metrics.evictions += 1;
      this.emit('modelEvicted', victim.spec.id, slot.spec.id);
      this.logger?.info({ modelId: victim.spec.id, forModelId: slot.spec.id }, 'Evicting idle model');
      return this.beginUnload(victim, 'eviction');
    });

    slot.state = 'loading';
    slot.reservedBytes = needed;
    slot.lastError = undefined;

    const loadPromise = this.performLoad(slot, victimUnloads);
    slot.pendingLoad = loadPromise;
  }

  private async performLoad(slot: ModelSlot, victimUnloads: Promise<void>[]): Promise<void> {
    const modelId = slot.spec.id;
    const start = this.now();

    try {
      await Promise.all(victimUnloads);
      const model = await this.backend.load(slot.spec, this.loadAbort.signal);

      slot.model = model;
      slot.state = 'ready';
      slot.generation += 1;
      slot.loadCount += 1;
      slot.refCount = 0;
      slot.lastAccessedMs = this.now();
      if (model.memoryBytes !== undefined && model.memoryBytes > slot.spec.estimatedBytes) {
        slot.reservedBytes = model.memoryBytes;
        this.logger?.warn(
          { modelId, estimatedBytes: slot.spec.estimatedBytes, reportedBytes: model.memoryBytes },
          'Model footprint exceeds its estimate'
        );
      }
      const generation = slot.generation;
      slot.detachExit = model.onExit?.((reason) => this.handleCrash(slot, generation, reason));

      this.metrics.loads += 1;
      this.logger?.info({ modelId, durationMs: this.now() - start, generation }, 'Model loaded');
      this.emit('modelLoaded', modelId, this.toStatus(slot));

      for (const waiter of slot.loadWaiters.splice(0)) {
        this.detachWaiter(waiter);
        waiter.resolve(this.issueHandle(slot));
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      slot.state = 'failed';
      slot.reservedBytes = 0;
      slot.model = undefined;
      slot.lastError = message;
      this.metrics.loadFailures += 1;

      const failure = this.shuttingDown
        ? modelUnavailable(modelId, 'shutting_down', 'Gateway is shutting down')
        : modelUnavailable(modelId, 'load_failed', `Model ${modelId} failed to load: ${message}`);
      this.logger?.error({ modelId, error: message }, 'Model load failed');
      this.emit('modelLoadFailed', modelId, failure);

      for (const waiter of slot.loadWaiters.splice(0)) {
        this.detachWaiter(waiter);
        waiter.reject(failure);
      }
    } finally {
      slot.pendingLoad = undefined;
    }
  }

  /**
   * Least-recently-used idle, unpinned ready slots until the new
   * footprint fits. Throws without touching any slot when it cannot fit.
   */
  private selectVictims(target: ModelSlot, needed: number): ModelSlot[] {
    let deficit = this.committedBytes() + needed - this.budgetBytes;
    if (deficit <= 0) {
      return [];
    }

    const candidates = [...this.slots.values()]
      .filter((slot) => slot !== target && slot.state === 'ready' && slot.refCount === 0 && !slot.pinned)
      .sort((a, b) => a.lastAccessedMs - b.lastAccessedMs);

    const victims: ModelSlot[] = [];
    for (const candidate of candidates) {
      if (deficit <= 0) {
        break;
      }
      victims.push(candidate);
      deficit -= candidate.reservedBytes;
    }

    if (deficit > 0) {
      lazyLog(
        this.logger,
        'warn',
        () => ({ modelId: target.spec.id, needed, reserved: this.committedBytes(), budget: this.budgetBytes }),
        'Memory budget exhausted'
      );
      throw modelUnavailable(
        target.spec.id,
        'resource_exhausted',
        `Not enough memory to load ${target.spec.id}; all resident models are in use or pinned`
      );
    }

    return victims;
  }

  /**
   * Move an idle ready slot to unloading and release its model.
   * The returned promise never rejects.
   */
  private beginUnload(slot: ModelSlot, reason: UnloadReason): Promise<void> {
    if (slot.state !== 'ready' || slot.refCount !== 0) {
      throw new GatewayError('InternalError', `Cannot unload ${slot.spec.id} in state ${slot.state}`);
    }

    const model = slot.model;
    slot.state = 'unloading';
    slot.detachExit?.();
    slot.detachExit = undefined;
    slot.model = undefined;

    const unloadPromise = (async () => {
      try {
        await model?.unload();
      } catch (error) {
        slot.lastError = error instanceof Error ? error.message : String(error);
        this.logger?.warn({ modelId: slot.spec.id, error: slot.lastError }, 'Model unload reported an error');
      } finally {
        slot.state = 'unloaded';
        slot.reservedBytes = 0;
        slot.pendingUnload = undefined;
        this.logger?.info({ modelId: slot.spec.id, reason }, 'Model unloaded');
        this.emit('modelUnloaded', slot.spec.id, reason);
      }
    })();

    slot.pendingUnload = unloadPromise;
    return unloadPromise;
  }

  private handleCrash(slot: ModelSlot, generation: number, reason: string): void {
    if (slot.generation !== generation || slot.state !== 'ready') {
      return;
    }

    slot.detachExit?.();
    slot.detachExit = undefined;
    slot.state = 'failed';
    slot.model = undefined;
    slot.refCount = 0;
    slot.reservedBytes = 0;
    slot.lastError = `Worker exited: ${reason}`;
    this.metrics.crashes += 1;

    this.logger?.error({ modelId: slot.spec.id, reason }, 'Model worker exited unexpectedly');
    this.emit('modelUnloaded', slot.spec.id, 'crashed');
    this.notifyDrainWaiters(slot.spec.id);
  }

  private waitForLoad(slot: ModelSlot, signal?: AbortSignal): Promise<ModelHandle> {
    return new Promise<ModelHandle>((resolve, reject) => {
      const waiter: LoadWaiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = slot.loadWaiters.indexOf(waiter);
          if (index !== -1) {
            slot.loadWaiters.splice(index, 1);
          }
          reject(cancelled());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      slot.loadWaiters.push(waiter);
    });
  }

  private detachWaiter(waiter: LoadWaiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }

  private awaitWithSignal(promise: Promise<void>, signal?: AbortSignal): Promise<void> {
    if (!signal) {
      return promise;
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => reject(cancelled());
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      );
    });
  }

  private waitForDrain(modelId: string): Promise<boolean> {
    const slot = this.slots.get(modelId);
    if (!slot || slot.refCount === 0) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const waiters = this.drainWaiters.get(modelId) ?? new Set<DrainResolution>();

      const finish: DrainResolution = (drained) => {
        clearTimeout(timeout);
        waiters.delete(finish);
        if (waiters.size === 0) {
          this.drainWaiters.delete(modelId);
        }
        resolve(drained);
      };

      const timeout = setTimeout(() => finish(false), this.drainTimeoutMs);
      waiters.add(finish);
      this.drainWaiters.set(modelId, waiters);
    });
  }

  private notifyDrainWaiters(modelId: string): void {
    const waiters = this.drainWaiters.get(modelId);
    if (!waiters) {
      return;
    }
    for (const resolve of [...waiters]) {
      resolve(true);
    }
    this.drainWaiters.delete(modelId);
  }

  private committedBytes(): number {
    let total = 0;
    for (const slot of this.slots.values()) {
      if (RESERVING_STATES.has(slot.state)) {
        total += slot.reservedBytes;
      }
    }
    return total;
  }

  private toStatus(slot: ModelSlot): ModelSlotStatus {
    return {
      modelId: slot.spec.id,
      kind: slot.spec.kind,
      state: slot.state,
      enabled: slot.enabled,
      pinned: slot.pinned,
      estimatedBytes: slot.spec.estimatedBytes,
      reservedBytes: RESERVING_STATES.has(slot.state) ? slot.reservedBytes : 0,
      refCount: slot.refCount,
      generation: slot.generation,
      loadCount: slot.loadCount,
      lastAccessedMs: slot.lastAccessedMs,
      lastError: slot.lastError,
    };
  }
}
