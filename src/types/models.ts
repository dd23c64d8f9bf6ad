/**
 * Model-related type definitions
 */

import type { MODEL_KINDS } from './schemas/config.js';

export type ModelKind = (typeof MODEL_KINDS)[number];

/**
 * Everything a backend needs to bring one model into memory.
 */
export interface ModelSpec {
  /** Canonical identifier, "<type>:<name>" */
  id: string;
  kind: ModelKind;
  /** Local weights path, when the backend needs one */
  path?: string;
  /** Footprint reserved against the memory budget before load */
  estimatedBytes: number;
  /** Backend-specific load options */
  options: Record<string, unknown>;
}

export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * A model resident in some backend. `call` must be safe to invoke
 * concurrently; the admission controller bounds how many run at once.
 */
export interface LoadedModel {
  readonly modelId: string;
  /** Footprint measured by the backend, if it can tell */
  readonly memoryBytes?: number;
  call(method: string, params: unknown, options?: CallOptions): Promise<unknown>;
  unload(): Promise<void>;
  /** Subscribe to unexpected termination; returns an unsubscribe function */
  onExit?(listener: (reason: string) => void): () => void;
}

export interface ModelBackend {
  load(spec: ModelSpec, signal?: AbortSignal): Promise<LoadedModel>;
}

export type SlotState = 'unloaded' | 'loading' | 'ready' | 'unloading' | 'failed';

/**
 * Reference to a ready model held by one request.
 */
export interface ModelHandle {
  readonly handleId: number;
  readonly modelId: string;
  readonly kind: ModelKind;
  /** Slot generation the handle was issued for */
  readonly generation: number;
  readonly model: LoadedModel;
}

export interface ModelSlotStatus {
  modelId: string;
  kind: ModelKind;
  state: SlotState;
  enabled: boolean;
  pinned: boolean;
  estimatedBytes: number;
  /** max(estimate, reported) once loaded */
  reservedBytes: number;
  refCount: number;
  generation: number;
  loadCount: number;
  lastAccessedMs: number;
  lastError?: string;
}

export interface SlotManagerMetrics {
  budgetBytes: number;
  reservedBytes: number;
  loads: number;
  loadFailures: number;
  evictions: number;
  crashes: number;
  acquisitions: number;
  slots: Record<SlotState, number>;
}

export interface AcquireOptions {
  signal?: AbortSignal;
}
