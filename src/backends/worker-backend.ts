/**
 * Worker process backend.
 *
 * Every loaded model lives in its own worker process. Loading spawns
 * the worker and sends `load`; unloading sends `shutdown` and escalates
 * to signals. A worker that dies on its own is reported through
 * `onExit` so the slot manager can mark the slot failed.
 */

import type { Logger } from 'pino';
import type { CallOptions, LoadedModel, ModelBackend, ModelSpec } from '../types/models.js';
import type { WorkerConfig } from '../types/schemas/config.js';
import { LoadResultSchema, type LoadParams } from '../bridge/protocol.js';
import { WorkerProcess, type SpawnWorker } from '../bridge/worker-process.js';
import type { JsonRpcTransport } from '../bridge/jsonrpc-transport.js';
import { GatewayError, cancelled, toGatewayError, zodErrorToGatewayError } from '../api/errors.js';

export interface WorkerBackendOptions {
  defaultWorker: WorkerConfig;
  /** Per-model overrides of individual worker fields */
  overrides?: Record<string, Partial<WorkerConfig>>;
  spawnWorker?: SpawnWorker;
  logger?: Logger;
}

class WorkerModel implements LoadedModel {
  constructor(
    public readonly modelId: string,
    public readonly memoryBytes: number | undefined,
    private readonly workerProcess: WorkerProcess,
    private readonly rpc: JsonRpcTransport,
    private readonly requestTimeoutMs: number
  ) {}

  async call(method: string, params: unknown, options: CallOptions = {}): Promise<unknown> {
    if (!this.rpc.isReady()) {
      throw new GatewayError('BackendError', `Worker for ${this.modelId} is not running`, { modelId: this.modelId });
    }
    try {
      return await this.rpc.request(method, params, {
        timeout: options.timeoutMs ?? this.requestTimeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      throw toGatewayError(error, 'BackendError');
    }
  }

  async unload(): Promise<void> {
    await this.workerProcess.stop();
  }

  onExit(listener: (reason: string) => void): () => void {
    this.workerProcess.on('crash', listener);
    return () => {
      this.workerProcess.off('crash', listener);
    };
  }
}

export class WorkerBackend implements ModelBackend {
  private readonly defaultWorker: WorkerConfig;
  private readonly overrides: Record<string, Partial<WorkerConfig>>;
  private readonly spawnWorker?: SpawnWorker;
  private readonly logger?: Logger;

  constructor(options: WorkerBackendOptions) {
    this.defaultWorker = options.defaultWorker;
    this.overrides = options.overrides ?? {};
    this.spawnWorker = options.spawnWorker;
    this.logger = options.logger;
  }

  public workerConfigFor(modelId: string): WorkerConfig {
    return { ...this.defaultWorker, ...this.overrides[modelId] };
  }

  async load(spec: ModelSpec, signal?: AbortSignal): Promise<LoadedModel> {
    if (signal?.aborted) {
      throw cancelled('Model load aborted');
    }

    const worker = this.workerConfigFor(spec.id);
    const workerProcess = new WorkerProcess({
      modelId: spec.id,
      worker,
      spawnWorker: this.spawnWorker,
      logger: this.logger,
    });

    let rpc: JsonRpcTransport;
    try {
      rpc = await workerProcess.start();
    } catch (error) {
      throw new GatewayError(
        'BackendError',
        `Failed to start worker for ${spec.id}: ${error instanceof Error ? error.message : String(error)}`,
        { modelId: spec.id }
      );
    }

    const params: LoadParams = {
      model_id: spec.id,
      kind: spec.kind,
      path: spec.path,
      options: spec.options,
    };

    try {
      const raw = await rpc.request('load', params, { timeout: worker.startup_timeout_ms, signal });
      const parsed = LoadResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw zodErrorToGatewayError(parsed.error, 'BackendError');
      }

      this.logger?.info(
        { modelId: spec.id, pid: workerProcess.pid, memoryBytes: parsed.data.memory_bytes },
        'Worker loaded model'
      );
      return new WorkerModel(spec.id, parsed.data.memory_bytes, workerProcess, rpc, worker.request_timeout_ms);
    } catch (error) {
      await workerProcess.stop();
      throw toGatewayError(error, 'BackendError');
    }
  }
}
