/**
 * JSON-RPC client over a worker's stdio.
 *
 * Requests are numbered and written one per line; replies are matched
 * back by id. Lines that are not protocol messages are logged and
 * skipped, so a worker may print progress to stdout while loading.
 */

import type { Readable, Writable } from 'node:stream';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { lazyLog } from '../utils/logger-helpers.js';
import {
  JSON_CODEC,
  WorkerMessageSchema,
  type Codec,
  type JsonRpcErrorCode,
  type JsonRpcRequest,
} from './protocol.js';

export interface RequestOptions {
  /** Milliseconds before the request fails with a TimeoutError */
  timeout?: number;
  signal?: AbortSignal;
}

export type NotificationHandler = (params: unknown) => void;

export interface JsonRpcTransportEvents {
  error: (error: Error) => void;
  close: () => void;
  notification: (method: string, params: unknown) => void;
}

export interface JsonRpcTransportOptions {
  stdin: Writable;
  stdout: Readable;
  stderr?: Readable;
  codec?: Codec;
  logger?: Logger;
  /** Default 300000 */
  defaultTimeout?: number;
  /** Longest unterminated line kept before the transport gives up. Default 32 MiB */
  maxLineBufferBytes?: number;
}

/**
 * Error reply from the worker.
 */
export class JsonRpcError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'JsonRpcError';
  }

  public is(code: JsonRpcErrorCode): boolean {
    return this.code === code;
  }
}

interface InFlight {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  /** Disarms the timer and abort listener */
  disarm: () => void;
}

function namedError(name: 'AbortError' | 'TimeoutError', message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

export class JsonRpcTransport extends EventEmitter<JsonRpcTransportEvents> {
  private readonly stdin: Writable;
  private readonly stdout: Readable;
  private readonly stderr?: Readable;
  private readonly codec: Codec;
  private readonly logger?: Logger;
  private readonly defaultTimeout: number;
  private readonly maxLineBufferBytes: number;

  private readonly inFlight = new Map<number, InFlight>();
  private readonly subscribers = new Map<string, Set<NotificationHandler>>();
  private lastId = 0;
  private closed = false;
  private partialLine = '';
  /** Tail of the write chain; lines go out in request order */
  private writing: Promise<void> = Promise.resolve();

  private readonly streamListeners = {
    data: (chunk: string): void => this.receive(chunk),
    end: (): void => {
      this.logger?.warn('Worker stdout ended');
      this.close();
    },
    streamError: (err: Error): void => {
      this.logger?.error({ err }, 'Worker stream error');
      this.emit('error', err);
    },
    stderr: (chunk: string): void => {
      const text = chunk.trim();
      if (text.length > 0) {
        this.logger?.warn({ stderr: text }, 'Worker stderr');
      }
    },
  };

  constructor(options: JsonRpcTransportOptions) {
    super();
    this.stdin = options.stdin;
    this.stdout = options.stdout;
    this.stderr = options.stderr;
    this.codec = options.codec ?? JSON_CODEC;
    this.logger = options.logger;
    this.defaultTimeout = options.defaultTimeout ?? 300_000;
    this.maxLineBufferBytes = options.maxLineBufferBytes ?? 32 * 1024 * 1024;

    this.stdout.setEncoding('utf-8');
    this.stdout.on('data', this.streamListeners.data);
    this.stdout.on('end', this.streamListeners.end);
    this.stdout.on('error', this.streamListeners.streamError);
    this.stdin.on('error', this.streamListeners.streamError);
    this.stderr?.setEncoding('utf-8');
    this.stderr?.on('data', this.streamListeners.stderr);
  }

  public get pendingCount(): number {
    return this.inFlight.size;
  }

  public isReady(): boolean {
    return !this.closed && this.stdin.writable;
  }

  /**
   * Call `method` on the worker. Rejects with a JsonRpcError when the
   * worker answers with an error, a TimeoutError or AbortError otherwise.
   */
  public request(method: string, params?: unknown, options: RequestOptions = {}): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new Error('Transport is closed'));
    }
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(namedError('AbortError', `Request aborted: ${method}`));
    }

    const id = ++this.lastId;
    const timeout = options.timeout ?? this.defaultTimeout;

    return new Promise<unknown>((resolve, reject) => {
      const onTimeout = (): void => {
        this.take(id)?.reject(namedError('TimeoutError', `Request timed out after ${timeout}ms: ${method}`));
      };
      const onAbort = (): void => {
        this.take(id)?.reject(namedError('AbortError', `Request aborted: ${method}`));
      };
      const timer = setTimeout(onTimeout, timeout);
      signal?.addEventListener('abort', onAbort, { once: true });

      this.inFlight.set(id, {
        method,
        resolve,
        reject,
        disarm: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      });

      this.enqueueWrite({ jsonrpc: '2.0', id, method, params }).catch((err: unknown) => {
        this.take(id)?.reject(err instanceof Error ? err : new Error(String(err)));
      });
      lazyLog(this.logger, 'debug', () => ({ id, method }), 'Sent worker request');
    });
  }

  /**
   * Subscribe to notifications named `method`. Returns the unsubscribe
   * function.
   */
  public onNotification(method: string, handler: NotificationHandler): () => void {
    const handlers = this.subscribers.get(method) ?? new Set<NotificationHandler>();
    handlers.add(handler);
    this.subscribers.set(method, handlers);

    return () => {
      handlers.delete(handler);
      if (handlers.size === 0 && this.subscribers.get(method) === handlers) {
        this.subscribers.delete(method);
      }
    };
  }

  /**
   * Detach from the streams and fail every request still waiting.
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.stdout.off('data', this.streamListeners.data);
    this.stdout.off('end', this.streamListeners.end);
    this.stdout.off('error', this.streamListeners.streamError);
    this.stdin.off('error', this.streamListeners.streamError);
    this.stderr?.off('data', this.streamListeners.stderr);

    for (const id of [...this.inFlight.keys()]) {
      this.take(id)?.reject(new Error('Transport closed'));
    }
    this.subscribers.clear();
    this.emit('close');
  }

  private take(id: number): InFlight | undefined {
    const entry = this.inFlight.get(id);
    if (entry) {
      this.inFlight.delete(id);
      entry.disarm();
    }
    return entry;
  }

  private receive(chunk: string): void {
    const buffered = this.partialLine + chunk;
    const size = Buffer.byteLength(buffered, 'utf-8');
    if (size > this.maxLineBufferBytes) {
      this.partialLine = '';
      this.logger?.error({ size, limit: this.maxLineBufferBytes }, 'Worker line buffer overflow');
      this.emit('error', new Error(`Worker stdout line buffer exceeded limit (${size} > ${this.maxLineBufferBytes})`));
      this.close();
      return;
    }

    const lines = buffered.split('\n');
    this.partialLine = lines.pop() ?? '';
    for (const line of lines) {
      if (line.trim().length > 0) {
        this.receiveLine(line);
      }
    }
  }

  private receiveLine(line: string): void {
    let decoded: unknown;
    try {
      decoded = this.codec.decode(line);
    } catch (err) {
      lazyLog(this.logger, 'warn', () => ({ err, line: line.slice(0, 200) }), 'Skipping non-protocol worker output');
      return;
    }

    const parsed = WorkerMessageSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger?.error({ issues: parsed.error.issues }, 'Invalid worker message');
      return;
    }
    const message = parsed.data;

    if ('method' in message) {
      this.dispatchNotification(message.method, message.params);
      return;
    }

    const entry = typeof message.id === 'number' ? this.take(message.id) : undefined;
    if (!entry) {
      this.logger?.warn({ id: message.id }, 'Reply for unknown request');
      return;
    }
    if ('error' in message) {
      const { code, message: text, data } = message.error;
      lazyLog(this.logger, 'debug', () => ({ code, method: entry.method }), 'Worker error reply');
      entry.reject(new JsonRpcError(code, text, data));
    } else {
      entry.resolve(message.result);
    }
  }

  private dispatchNotification(method: string, params: unknown): void {
    lazyLog(this.logger, 'debug', () => ({ method }), 'Worker notification');
    this.emit('notification', method, params);
    for (const handler of this.subscribers.get(method) ?? []) {
      try {
        handler(params);
      } catch (err) {
        this.logger?.error({ err, method }, 'Notification handler threw');
      }
    }
  }

  /**
   * Append one line to the write chain. A failed write fails every write
   * queued after it.
   */
  private enqueueWrite(message: JsonRpcRequest): Promise<void> {
    this.writing = this.writing.then(() => this.writeLine(`${this.codec.encode(message)}\n`));
    return this.writing;
  }

  /**
   * Resolves once the line is flushed and, under backpressure, once
   * stdin has drained.
   */
  private writeLine(line: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Transport is closed'));
    }

    return new Promise<void>((resolve, reject) => {
      let flushed = false;
      let needsDrain = false;
      let done = false;

      const settle = (err?: Error | null): void => {
        if (done || (!err && (!flushed || needsDrain))) {
          return;
        }
        done = true;
        this.stdin.off('drain', onDrain);
        this.stdin.off('close', onClose);
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      };
      const onDrain = (): void => {
        needsDrain = false;
        settle();
      };
      const onClose = (): void => settle(new Error('Worker stdin closed before drain'));

      needsDrain = !this.stdin.write(line, 'utf-8', (err?: Error | null) => {
        flushed = true;
        settle(err);
      });
      if (needsDrain) {
        lazyLog(this.logger, 'debug', () => ({ bytes: line.length }), 'Worker stdin backpressure');
        this.stdin.once('drain', onDrain);
        this.stdin.once('close', onClose);
      }
    });
  }
}
