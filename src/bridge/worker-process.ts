/**
 * Model Worker Process
 *
 * One child process per loaded model, speaking line-delimited JSON-RPC
 * over stdio:
 * - Spawns the configured worker command
 * - Wraps stdio in a JsonRpcTransport
 * - Reports unexpected exits
 * - Graceful shutdown: `shutdown` request, then SIGTERM, then SIGKILL
 */

import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { WorkerConfig } from '../types/schemas/config.js';
import { JsonRpcTransport } from './jsonrpc-transport.js';

/**
 * The part of ChildProcess the worker relies on.
 */
export interface WorkerChild {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  once(event: 'spawn', listener: () => void): this;
}

export type SpawnWorker = (command: string, args: string[], env: NodeJS.ProcessEnv) => WorkerChild;

export const spawnWorker: SpawnWorker = (command, args, env) =>
  spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], env });

export interface WorkerProcessOptions {
  modelId: string;
  worker: WorkerConfig;
  spawnWorker?: SpawnWorker;
  logger?: Logger;
}

export type WorkerProcessEvents = {
  /** Exit that was not requested through stop() */
  crash: (reason: string) => void;
  exit: (code: number | null, signal: NodeJS.Signals | null) => void;
};

export type WorkerStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'exited';

export class WorkerProcess extends EventEmitter<WorkerProcessEvents> {
  private readonly modelId: string;
  private readonly worker: WorkerConfig;
  private readonly spawnFn: SpawnWorker;
  private readonly logger?: Logger;

  private child: WorkerChild | null = null;
  private rpc: JsonRpcTransport | null = null;
  private status: WorkerStatus = 'idle';
  private exited: Promise<void> = Promise.resolve();

  constructor(options: WorkerProcessOptions) {
    super();
    this.modelId = options.modelId;
    this.worker = options.worker;
    this.spawnFn = options.spawnWorker ?? spawnWorker;
    this.logger = options.logger?.child({ modelId: options.modelId });
  }

  /**
   * Spawn the worker and resolve once the OS reports it running.
   */
  public start(): Promise<JsonRpcTransport> {
    if (this.status !== 'idle') {
      return Promise.reject(new Error(`Worker for ${this.modelId} already started`));
    }
    this.status = 'starting';

    const child = this.spawnFn(this.worker.command, this.worker.args, {
      ...process.env,
      ...this.worker.env,
    });
    this.child = child;

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout) {
      child.kill('SIGKILL');
      this.status = 'exited';
      return Promise.reject(new Error(`Worker for ${this.modelId} has no stdio pipes`));
    }

    const rpc = new JsonRpcTransport({
      stdin,
      stdout,
      stderr: stderr ?? undefined,
      logger: this.logger,
      defaultTimeout: this.worker.request_timeout_ms,
      maxLineBufferBytes: this.worker.max_line_buffer_bytes,
    });
    this.rpc = rpc;

    rpc.on('error', (err) => {
      this.logger?.error({ err }, 'Worker transport error');
    });

    this.exited = new Promise<void>((resolve) => {
      child.once('exit', (code, signal) => {
        const wasRequested = this.status === 'stopping';
        this.status = 'exited';
        rpc.close();
        this.logger?.info({ pid: child.pid, code, signal }, 'Worker process exited');
        this.emit('exit', code, signal);
        if (!wasRequested) {
          this.emit('crash', `worker exited (code ${code ?? 'null'}, signal ${signal ?? 'null'})`);
        }
        resolve();
      });
    });

    return new Promise<JsonRpcTransport>((resolve, reject) => {
      child.once('error', (err) => {
        if (this.status === 'starting') {
          this.status = 'exited';
          rpc.close();
          reject(err);
          return;
        }
        this.logger?.error({ err }, 'Worker process error');
      });
      child.once('spawn', () => {
        if (this.status === 'starting') {
          this.status = 'running';
          this.logger?.info({ pid: child.pid, command: this.worker.command }, 'Worker process spawned');
          resolve(rpc);
        }
      });
    });
  }

  public get transport(): JsonRpcTransport | null {
    return this.rpc;
  }

  public getStatus(): WorkerStatus {
    return this.status;
  }

  public get pid(): number | undefined {
    return this.child?.pid;
  }

  /**
   * Stop the worker: ask politely, then SIGTERM, then SIGKILL, waiting
   * `shutdown_timeout_ms` between steps.
   */
  public async stop(): Promise<void> {
    const child = this.child;
    if (!child || this.status === 'exited' || this.status === 'idle') {
      this.status = 'exited';
      return;
    }
    if (this.status === 'stopping') {
      await this.exited;
      return;
    }
    this.status = 'stopping';

    const timeoutMs = this.worker.shutdown_timeout_ms;

    if (this.rpc?.isReady()) {
      try {
        await this.rpc.request('shutdown', undefined, { timeout: timeoutMs });
      } catch (err) {
        this.logger?.debug({ err }, 'Worker did not acknowledge shutdown');
      }
    }

    if (await this.waitForExit(timeoutMs)) {
      return;
    }

    this.logger?.warn({ pid: child.pid }, 'Worker still running, sending SIGTERM');
    child.kill('SIGTERM');
    if (await this.waitForExit(timeoutMs)) {
      return;
    }

    this.logger?.warn({ pid: child.pid }, 'Force killing worker process');
    child.kill('SIGKILL');
    await this.exited;
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }
}
