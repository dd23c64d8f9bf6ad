/**
 * Request Dispatcher
 *
 * Runs one inference request through the gateway pipeline:
 *
 *   authenticate -> authorize -> rate limit -> acquire -> admit
 *     -> invoke -> complete -> release
 *
 * Any step failing short-circuits the rest. Whatever was taken is
 * given back in `finally` blocks, in reverse order.
 */

import type { Logger } from 'pino';
import type { ApiKeyView, Capability, RateLimitInfo } from '../types/auth.js';
import type { CallOptions, LoadedModel, ModelHandle } from '../types/models.js';
import type { ExecutionTicket } from '../types/admission.js';
import type { KeyRegistry } from '../auth/key-registry.js';
import type { RateLimiter } from '../auth/rate-limiter.js';
import type { ModelSlotManager } from './model-slot-manager.js';
import type { AdmissionController } from './admission-controller.js';
import { cancelled, toGatewayError } from '../api/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';

/**
 * Caller identity after the first three pipeline steps.
 */
export interface RequestContext {
  readonly key: ApiKeyView;
  readonly capability: Capability;
  readonly rateLimit: RateLimitInfo;
}

export interface RunOptions {
  signal?: AbortSignal;
  priority?: number;
  /** Queue wait override for this request */
  queueTimeoutMs?: number;
  /** Backend call timeout for this request */
  callTimeoutMs?: number;
}

export interface DispatchRequest extends RunOptions {
  rawKey: string | undefined;
  capability: Capability;
  modelId: string;
}

/**
 * Work executed while the model is held and admitted.
 */
export type ModelInvoker<T> = (model: LoadedModel, options: CallOptions) => Promise<T>;

export interface DispatchResult<T> {
  context: RequestContext;
  value: T;
}

export interface DispatcherDeps {
  registry: KeyRegistry;
  rateLimiter: RateLimiter;
  slots: ModelSlotManager;
  admission: AdmissionController;
  logger?: Logger;
  now?: () => number;
}

export class Dispatcher {
  private readonly registry: KeyRegistry;
  private readonly rateLimiter: RateLimiter;
  private readonly slots: ModelSlotManager;
  private readonly admission: AdmissionController;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(deps: DispatcherDeps) {
    this.registry = deps.registry;
    this.rateLimiter = deps.rateLimiter;
    this.slots = deps.slots;
    this.admission = deps.admission;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Full pipeline for a single-model request.
   */
  public async dispatch<T>(request: DispatchRequest, invoke: ModelInvoker<T>): Promise<DispatchResult<T>> {
    const context = this.authorizeRequest(request.rawKey, request.capability);
    const value = await this.runOnModel(context, request.modelId, invoke, request);
    return { context, value };
  }

  /**
   * Authenticate, authorize and consume one unit of quota.
   */
  public authorizeRequest(rawKey: string | undefined, capability: Capability): RequestContext {
    const key = this.registry.authenticate(rawKey);
    this.registry.authorize(key, capability);
    const rateLimit = this.rateLimiter.checkAndConsume(key.id, key.rateLimit, capability);
    return { key, capability, rateLimit };
  }

  /**
   * Authenticate and authorize without consuming quota.
   */
  public checkAccess(rawKey: string | undefined, capability: Capability): ApiKeyView {
    const key = this.registry.authenticate(rawKey);
    this.registry.authorize(key, capability);
    return key;
  }

  /**
   * Acquire, admit, invoke. Can be called several times under one
   * context; each call holds its own reference and ticket.
   */
  public async runOnModel<T>(
    context: RequestContext,
    modelId: string,
    invoke: ModelInvoker<T>,
    options: RunOptions = {}
  ): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw cancelled();
    }

    const startedAt = this.now();
    const handle: ModelHandle = await this.slots.acquire(modelId, { signal });

    try {
      const ticket: ExecutionTicket = await this.admission.admit(modelId, {
        priority: options.priority,
        timeoutMs: options.queueTimeoutMs,
        signal,
      });

      try {
        if (signal?.aborted) {
          throw cancelled();
        }
        const value = await invoke(handle.model, { signal, timeoutMs: options.callTimeoutMs });
        lazyLog(
          this.logger,
          'debug',
          () => ({
            modelId,
            keyPrefix: context.key.keyPrefix,
            waitedMs: ticket.waitedMs,
            durationMs: this.now() - startedAt,
          }),
          'Inference completed'
        );
        return value;
      } catch (error) {
        throw toGatewayError(error, 'BackendError');
      } finally {
        this.admission.complete(ticket);
      }
    } finally {
      this.slots.release(handle);
    }
  }
}
