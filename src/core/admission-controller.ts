/**
 * Per-Model Admission Controller
 *
 * Bounds concurrent inference per model and queues the overflow.
 *
 * Architecture:
 * - Each model has a concurrency cap, a queue depth and a queue timeout
 * - Overflow waits in arrival order; with priority ordering enabled,
 *   higher priority goes first and arrival order breaks ties
 * - A full queue rejects immediately with ModelUnavailable(queue_full)
 * - A queued entry that times out or is aborted is removed and never
 *   runs late
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type {
  AdmissionLimits,
  AdmissionStats,
  AdmitOptions,
  ExecutionTicket,
  ModelAdmissionStats,
} from '../types/admission.js';
import { cancelled, modelUnavailable, requestTimeout } from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';

export interface AdmissionControllerConfig {
  models: Record<string, AdmissionLimits>;
  priorityOrdering?: boolean;
  logger?: Logger;
  now?: () => number;
}

/**
 * Queued request
 */
interface QueuedEntry {
  ticketId: number;
  modelId: string;
  priority: number;
  enqueuedAt: number;
  timeoutMs: number;
  resolve: (ticket: ExecutionTicket) => void;
  reject: (error: Error) => void;
  timeoutHandle?: NodeJS.Timeout;
  signal?: AbortSignal;
  abortHandler?: () => void;
}

interface ModelLane {
  limits: AdmissionLimits;
  active: Set<number>;
  queue: QueuedEntry[];
  counters: {
    admitted: number;
    completed: number;
    timedOut: number;
    cancelled: number;
    rejected: number;
  };
}

/**
 * Admission events
 */
export interface AdmissionControllerEvents {
  admitted: (modelId: string, ticketId: number, waitedMs: number) => void;
  queued: (modelId: string, ticketId: number) => void;
  completed: (modelId: string, ticketId: number) => void;
  timeout: (modelId: string, ticketId: number) => void;
  cancelled: (modelId: string, ticketId: number) => void;
  rejected: (modelId: string, reason: 'queue_full' | 'shutting_down') => void;
}

export class AdmissionController extends EventEmitter<AdmissionControllerEvents> {
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly priorityOrdering: boolean;
  private readonly lanes = new Map<string, ModelLane>();
  private readonly idleWaiters = new Set<() => void>();

  private nextTicketId = 1;
  private closed = false;

  constructor(config: AdmissionControllerConfig) {
    super();
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
    this.priorityOrdering = config.priorityOrdering ?? false;

    for (const [modelId, limits] of Object.entries(config.models)) {
      this.lanes.set(modelId, {
        limits: { ...limits, maxConcurrent: Math.max(1, limits.maxConcurrent) },
        active: new Set(),
        queue: [],
        counters: { admitted: 0, completed: 0, timedOut: 0, cancelled: 0, rejected: 0 },
      });
    }
  }

  /**
   * Reserve one execution unit on a model, waiting in the queue when
   * the model is saturated.
   */
  public admit(modelId: string, options: AdmitOptions = {}): Promise<ExecutionTicket> {
    const lane = this.lanes.get(modelId);
    if (!lane) {
      return Promise.reject(modelUnavailable(modelId, 'unknown_model', `Unknown model ${modelId}`));
    }
    if (this.closed) {
      this.emit('rejected', modelId, 'shutting_down');
      return Promise.reject(modelUnavailable(modelId, 'shutting_down', 'Gateway is shutting down'));
    }
    if (options.signal?.aborted) {
      return Promise.reject(cancelled());
    }

    const ticketId = this.nextTicketId++;

    if (lane.active.size < lane.limits.maxConcurrent && lane.queue.length === 0) {
      return Promise.resolve(this.activate(lane, modelId, ticketId, this.now()));
    }

    if (lane.queue.length >= lane.limits.queueDepth) {
      lane.counters.rejected += 1;
      this.emit('rejected', modelId, 'queue_full');
      lazyLog(this.logger, 'warn', () => ({ modelId, queued: lane.queue.length }), 'Admission queue full');
      return Promise.reject(
        modelUnavailable(modelId, 'queue_full', `Model ${modelId} is busy; retry later`)
      );
    }

    return new Promise<ExecutionTicket>((resolve, reject) => {
      const timeoutMs = options.timeoutMs ?? lane.limits.queueTimeoutMs;
      const entry: QueuedEntry = {
        ticketId,
        modelId,
        priority: options.priority ?? 0,
        enqueuedAt: this.now(),
        timeoutMs,
        resolve,
        reject,
        signal: options.signal,
      };

      entry.timeoutHandle = setTimeout(() => {
        if (this.removeQueued(lane, entry)) {
          lane.counters.timedOut += 1;
          this.emit('timeout', modelId, ticketId);
          this.logger?.warn({ modelId, ticketId, timeoutMs }, 'Queued request timed out');
          reject(requestTimeout(modelId, timeoutMs));
        }
      }, timeoutMs);

      if (entry.signal) {
        entry.abortHandler = () => {
          if (this.removeQueued(lane, entry)) {
            lane.counters.cancelled += 1;
            this.emit('cancelled', modelId, ticketId);
            lazyLog(this.logger, 'debug', () => ({ modelId, ticketId }), 'Queued request cancelled');
            reject(cancelled());
          }
        };
        entry.signal.addEventListener('abort', entry.abortHandler, { once: true });
      }

      this.enqueue(lane, entry);
      this.emit('queued', modelId, ticketId);
      lazyLog(
        this.logger,
        'debug',
        () => ({ modelId, ticketId, queued: lane.queue.length, active: lane.active.size }),
        'Request queued (at concurrency limit)'
      );
    });
  }

  /**
   * Free the ticket's unit and promote the next waiter. Completing a
   * ticket twice is a no-op.
   */
  public complete(ticket: ExecutionTicket): boolean {
    const lane = this.lanes.get(ticket.modelId);
    if (!lane || !lane.active.delete(ticket.ticketId)) {
      return false;
    }

    lane.counters.completed += 1;
    this.emit('completed', ticket.modelId, ticket.ticketId);
    this.processQueue(lane);

    if (this.totalActive() === 0) {
      for (const notify of [...this.idleWaiters]) {
        notify();
      }
    }
    return true;
  }

  /**
   * Resolve once no ticket is active, or false after `timeoutMs`.
   */
  public waitForIdle(timeoutMs: number): Promise<boolean> {
    if (this.totalActive() === 0) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const finish = (idle: boolean): void => {
        clearTimeout(timer);
        this.idleWaiters.delete(onIdle);
        resolve(idle);
      };
      const onIdle = (): void => finish(true);
      const timer = setTimeout(() => finish(false), timeoutMs);
      this.idleWaiters.add(onIdle);
    });
  }

  public getStats(): AdmissionStats {
    const models: Record<string, ModelAdmissionStats> = {};
    let totalActive = 0;
    let totalQueued = 0;

    for (const [modelId, lane] of this.lanes) {
      totalActive += lane.active.size;
      totalQueued += lane.queue.length;
      models[modelId] = {
        active: lane.active.size,
        queued: lane.queue.length,
        maxConcurrent: lane.limits.maxConcurrent,
        queueDepth: lane.limits.queueDepth,
        ...lane.counters,
      };
    }

    return { totalActive, totalQueued, models };
  }

  /**
   * Reject every waiter and refuse new admissions. Active tickets can
   * still complete.
   */
  public cleanup(): void {
    this.closed = true;

    for (const [modelId, lane] of this.lanes) {
      for (const entry of lane.queue.splice(0)) {
        this.disarm(entry);
        entry.reject(modelUnavailable(modelId, 'shutting_down', 'Gateway is shutting down'));
      }
    }

    this.logger?.info('Admission controller cleaned up');
  }

  private activate(lane: ModelLane, modelId: string, ticketId: number, enqueuedAt: number): ExecutionTicket {
    const admittedAt = this.now();
    lane.active.add(ticketId);
    lane.counters.admitted += 1;

    const ticket: ExecutionTicket = Object.freeze({
      ticketId,
      modelId,
      admittedAt,
      waitedMs: admittedAt - enqueuedAt,
    });
    this.emit('admitted', modelId, ticketId, ticket.waitedMs);
    return ticket;
  }

  private enqueue(lane: ModelLane, entry: QueuedEntry): void {
    if (!this.priorityOrdering) {
      lane.queue.push(entry);
      return;
    }
    const index = lane.queue.findIndex((queued) => queued.priority < entry.priority);
    if (index === -1) {
      lane.queue.push(entry);
    } else {
      lane.queue.splice(index, 0, entry);
    }
  }

  private processQueue(lane: ModelLane): void {
    while (lane.active.size < lane.limits.maxConcurrent && lane.queue.length > 0) {
      const next = lane.queue.shift();
      if (!next) {
        return;
      }
      this.disarm(next);
      const ticket = this.activate(lane, next.modelId, next.ticketId, next.enqueuedAt);
      lazyLog(
        this.logger,
        'debug',
        () => ({ modelId: next.modelId, ticketId: next.ticketId, waitedMs: ticket.waitedMs }),
        'Queued request admitted'
      );
      next.resolve(ticket);
    }
  }

  private removeQueued(lane: ModelLane, entry: QueuedEntry): boolean {
    const index = lane.queue.indexOf(entry);
    if (index === -1) {
      return false;
    }
    lane.queue.splice(index, 1);
    this.disarm(entry);
    return true;
  }

  private disarm(entry: QueuedEntry): void {
    if (entry.timeoutHandle) {
      clearTimeout(entry.timeoutHandle);
      entry.timeoutHandle = undefined;
    }
    if (entry.signal && entry.abortHandler) {
      entry.signal.removeEventListener('abort', entry.abortHandler);
      entry.abortHandler = undefined;
    }
  }

  private totalActive(): number {
    let total = 0;
    for (const lane of this.lanes.values()) {
      total += lane.active.size;
    }
    return total;
  }
}
