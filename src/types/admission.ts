/**
 * Admission control type definitions
 */

export interface AdmissionLimits {
  /** Concurrent executions allowed for the model */
  maxConcurrent: number;
  /** Waiters allowed beyond the cap; 0 rejects immediately when saturated */
  queueDepth: number;
  /** Default wait before a queued entry times out */
  queueTimeoutMs: number;
}

export interface AdmitOptions {
  /** Higher runs first when priority ordering is enabled */
  priority?: number;
  /** Overrides the model's queue timeout */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Reservation of one concurrency unit on one model.
 */
export interface ExecutionTicket {
  readonly ticketId: number;
  readonly modelId: string;
  readonly admittedAt: number;
  /** Time spent queued before admission */
  readonly waitedMs: number;
}

export interface ModelAdmissionStats {
  active: number;
  queued: number;
  maxConcurrent: number;
  queueDepth: number;
  admitted: number;
  completed: number;
  timedOut: number;
  cancelled: number;
  rejected: number;
}

export interface AdmissionStats {
  totalActive: number;
  totalQueued: number;
  models: Record<string, ModelAdmissionStats>;
}
