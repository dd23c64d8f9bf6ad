/**
 * Gateway assembly
 *
 * Wires the key registry, rate limiter, slot manager, admission
 * controller, dispatcher and HTTP server from one validated
 * configuration, and owns their start/stop order.
 */

import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import type { RuntimeConfig } from './types/schemas/config.js';
import type { AdmissionLimits } from './types/admission.js';
import type { ModelBackend } from './types/models.js';
import { FileKeyStore, InMemoryKeyStore, type KeyStore } from './auth/key-store.js';
import { KeyRegistry } from './auth/key-registry.js';
import { RateLimiter } from './auth/rate-limiter.js';
import { UsageLog } from './auth/usage-log.js';
import { WorkerBackend } from './backends/worker-backend.js';
import { AdmissionController } from './core/admission-controller.js';
import { Dispatcher } from './core/dispatcher.js';
import { ModelSlotManager, type ModelSlotDefinition } from './core/model-slot-manager.js';
import { HttpServer } from './server/http-server.js';
import { RouteContext } from './server/routes/context.js';
import { createLogger } from './utils/logger-helpers.js';

const MB = 1024 * 1024;

export interface GatewayDependencies {
  /** Defaults to a worker process per model */
  backend?: ModelBackend;
  logger?: Logger;
  /** Defaults to the store named in `auth.store` */
  keyStore?: KeyStore;
  now?: () => number;
}

export interface GatewayComponents {
  registry: KeyRegistry;
  rateLimiter: RateLimiter;
  usageLog: UsageLog;
  slots: ModelSlotManager;
  admission: AdmissionController;
  dispatcher: Dispatcher;
  http: HttpServer;
}

function createKeyStore(config: RuntimeConfig, logger: Logger): KeyStore {
  const { store, store_path: storePath } = config.auth;
  if (store === 'file' && storePath !== undefined) {
    return new FileKeyStore({ filePath: storePath, logger });
  }
  return new InMemoryKeyStore();
}

function slotDefinitions(config: RuntimeConfig): ModelSlotDefinition[] {
  return config.models.definitions.map((definition) => ({
    id: definition.id,
    kind: definition.kind,
    path: definition.path,
    estimatedBytes: Math.round(definition.estimated_memory_mb * MB),
    options: definition.options,
    enabled: definition.enabled,
  }));
}

function admissionLimits(config: RuntimeConfig): Record<string, AdmissionLimits> {
  const limits: Record<string, AdmissionLimits> = {};
  for (const definition of config.models.definitions) {
    limits[definition.id] = {
      maxConcurrent: definition.max_concurrent,
      queueDepth: definition.queue_depth,
      queueTimeoutMs: definition.queue_timeout_ms,
    };
  }
  return limits;
}

function workerOverrides(config: RuntimeConfig): Record<string, Partial<RuntimeConfig['models']['default_worker']>> {
  const overrides: Record<string, Partial<RuntimeConfig['models']['default_worker']>> = {};
  for (const definition of config.models.definitions) {
    if (definition.worker) {
      overrides[definition.id] = definition.worker;
    }
  }
  return overrides;
}

/**
 * Gateway
 *
 * @example
 * ```typescript
 * const gateway = createGateway(loadConfig());
 * await gateway.start();
 * // ...
 * await gateway.stop();
 * ```
 */
export class Gateway {
  public readonly config: RuntimeConfig;
  public readonly components: GatewayComponents;
  private readonly logger: Logger;
  private started = false;
  private stopPromise: Promise<void> | null = null;

  constructor(config: RuntimeConfig, dependencies: GatewayDependencies = {}) {
    this.config = config;
    this.logger = dependencies.logger ?? createLogger(config.logging.level);
    const now = dependencies.now;

    const usageLog = new UsageLog(config.usage_log.max_entries);
    const registry = new KeyRegistry({
      store: dependencies.keyStore ?? createKeyStore(config, this.logger),
      defaultRateLimit: {
        maxRequests: config.auth.default_rate_limit.max_requests,
        windowMs: config.auth.default_rate_limit.window_ms,
      },
      keyPrefix: config.auth.key_prefix,
      usageLog,
      usageFlushIntervalMs: config.auth.usage_flush_interval_ms,
      logger: this.logger.child({ component: 'keys' }),
      now,
    });
    const rateLimiter = new RateLimiter({
      scope: config.rate_limit.scope,
      cleanupIntervalMs: config.rate_limit.cleanup_interval_ms,
      logger: this.logger.child({ component: 'rate-limit' }),
      now,
    });

    const backend =
      dependencies.backend ??
      new WorkerBackend({
        defaultWorker: config.models.default_worker,
        overrides: workerOverrides(config),
        logger: this.logger.child({ component: 'worker' }),
      });
    const slots = new ModelSlotManager(backend, {
      budgetBytes: Math.round(config.models.memory_budget_mb * MB),
      models: slotDefinitions(config),
      pinned: config.models.pinned,
      preload: config.models.preload,
      drainTimeoutMs: config.models.drain_timeout_ms,
      logger: this.logger.child({ component: 'slots' }),
      now,
    });
    const admission = new AdmissionController({
      models: admissionLimits(config),
      priorityOrdering: config.admission.priority_ordering,
      logger: this.logger.child({ component: 'admission' }),
      now,
    });
    const dispatcher = new Dispatcher({
      registry,
      rateLimiter,
      slots,
      admission,
      logger: this.logger.child({ component: 'dispatcher' }),
      now,
    });
    const http = new HttpServer(
      new RouteContext({ config, dispatcher, registry, slots, admission, usageLog, logger: this.logger })
    );

    this.components = { registry, rateLimiter, usageLog, slots, admission, dispatcher, http };
    this.attachEventLogging();
  }

  /**
   * Load keys, preload models, then listen. Resolves with the bound
   * address.
   */
  public async start(): Promise<AddressInfo> {
    if (this.started) {
      throw new Error('Gateway already started');
    }
    const { registry, rateLimiter, slots, http } = this.components;

    await registry.load();
    rateLimiter.start();

    const preload = await slots.preload();
    for (const failure of preload.failed) {
      this.logger.warn({ modelId: failure.modelId, err: failure.error }, 'Model preload failed');
    }

    const address = await http.start(this.config.server.port, this.config.server.host);
    this.started = true;
    return address;
  }

  /**
   * Stop accepting requests, drain admissions, unload models and flush
   * the key store. Safe to call more than once.
   */
  public stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.doStop();
    }
    return this.stopPromise;
  }

  private async doStop(): Promise<void> {
    const { registry, rateLimiter, slots, admission, http } = this.components;
    this.logger.info('Gateway shutting down');

    let closeError: unknown;
    const closing = http.stop().catch((error: unknown) => {
      closeError = error;
    });
    admission.cleanup();
    const drained = await admission.waitForIdle(this.config.models.drain_timeout_ms);
    if (!drained) {
      this.logger.warn('In-flight requests still running after drain timeout');
    }
    http.closeAllConnections();
    await slots.shutdown();
    await closing;

    rateLimiter.stop();
    await registry.close();
    this.started = false;
    if (closeError !== undefined) {
      throw closeError;
    }
    this.logger.info('Gateway stopped');
  }

  private attachEventLogging(): void {
    const { admission } = this.components;

    admission.on('rejected', (modelId, reason) => {
      this.logger.warn({ modelId, reason }, 'Admission rejected');
    });
  }
}

export function createGateway(config: RuntimeConfig, dependencies: GatewayDependencies = {}): Gateway {
  return new Gateway(config, dependencies);
}
