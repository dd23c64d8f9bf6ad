/**
 * Gateway error utilities.
 *
 * One error type for every component of the gateway, plus helpers that
 * convert lower-level failures (worker JSON-RPC errors, aborts, zod
 * issues) into GatewayError instances that the HTTP layer can map to a
 * status code without inspecting internals.
 */

import { ZodError } from 'zod';
import { JsonRpcError } from '../bridge/jsonrpc-transport.js';
import { JsonRpcErrorCode } from '../bridge/protocol.js';

/**
 * Error codes surfaced to API consumers.
 */
export type GatewayErrorCode =
  | 'AuthError'
  | 'PermissionDenied'
  | 'RateLimitExceeded'
  | 'ModelUnavailable'
  | 'RequestTimeout'
  | 'Cancelled'
  | 'ValidationError'
  | 'NotFound'
  | 'ConfigurationError'
  | 'BackendError'
  | 'InternalError';

export type ModelUnavailableReason =
  | 'load_failed'
  | 'resource_exhausted'
  | 'queue_full'
  | 'disabled'
  | 'unknown_model'
  | 'shutting_down';

/**
 * Plain error shape used in HTTP bodies and logs.
 */
export interface GatewayErrorShape {
  code: GatewayErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface RetryPolicy {
  /** HTTP status the error maps to */
  status: number;
  /** Whether the client may repeat the same request unchanged */
  retryable: boolean;
  /** Whether a Retry-After hint is attached */
  retryAfterHint: boolean;
}

/**
 * Retry policy per error code. The gateway itself never retries inside
 * a request; this table only describes what the client may do.
 */
export const RETRY_POLICY: Readonly<Record<GatewayErrorCode, RetryPolicy>> = {
  AuthError: { status: 401, retryable: false, retryAfterHint: false },
  PermissionDenied: { status: 403, retryable: false, retryAfterHint: false },
  RateLimitExceeded: { status: 429, retryable: true, retryAfterHint: true },
  ModelUnavailable: { status: 503, retryable: true, retryAfterHint: false },
  RequestTimeout: { status: 504, retryable: true, retryAfterHint: false },
  Cancelled: { status: 499, retryable: true, retryAfterHint: false },
  ValidationError: { status: 400, retryable: false, retryAfterHint: false },
  NotFound: { status: 404, retryable: false, retryAfterHint: false },
  ConfigurationError: { status: 500, retryable: false, retryAfterHint: false },
  BackendError: { status: 502, retryable: true, retryAfterHint: false },
  InternalError: { status: 500, retryable: false, retryAfterHint: false },
};

/**
 * Error implementation used across the gateway.
 */
export class GatewayError extends Error implements GatewayErrorShape {
  public readonly code: GatewayErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: GatewayErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.details = details;
  }

  public get status(): number {
    return RETRY_POLICY[this.code].status;
  }

  public get retryable(): boolean {
    return RETRY_POLICY[this.code].retryable;
  }

  /**
   * Milliseconds until the client may retry, when the code carries one.
   */
  public get retryAfterMs(): number | undefined {
    if (!RETRY_POLICY[this.code].retryAfterHint) {
      return undefined;
    }
    const value = this.details?.retryAfterMs;
    return typeof value === 'number' ? value : undefined;
  }

  /**
   * Reason attached to ModelUnavailable errors.
   */
  public get reason(): ModelUnavailableReason | undefined {
    const value = this.details?.reason;
    return this.code === 'ModelUnavailable' && isModelUnavailableReason(value) ? value : undefined;
  }

  /**
   * Serialize error into plain shape (for JSON responses/logs).
   */
  public toObject(): GatewayErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

const UNAVAILABLE_REASONS: ReadonlySet<string> = new Set<ModelUnavailableReason>([
  'load_failed',
  'resource_exhausted',
  'queue_full',
  'disabled',
  'unknown_model',
  'shutting_down',
]);

function isModelUnavailableReason(value: unknown): value is ModelUnavailableReason {
  return typeof value === 'string' && UNAVAILABLE_REASONS.has(value);
}

export function isGatewayError(error: unknown, code?: GatewayErrorCode): error is GatewayError {
  return error instanceof GatewayError && (code === undefined || error.code === code);
}

export function authError(message = 'Invalid or revoked API key'): GatewayError {
  return new GatewayError('AuthError', message);
}

export function permissionDenied(capability: string): GatewayError {
  return new GatewayError('PermissionDenied', `API key lacks the "${capability}" capability`, {
    capability,
  });
}

export function rateLimitExceeded(retryAfterMs: number, limit: number, windowMs: number): GatewayError {
  return new GatewayError(
    'RateLimitExceeded',
    `Rate limit of ${limit} requests per ${Math.round(windowMs / 1000)}s exceeded`,
    { retryAfterMs, limit, windowMs }
  );
}

export function modelUnavailable(
  modelId: string,
  reason: ModelUnavailableReason,
  message?: string
): GatewayError {
  return new GatewayError(
    'ModelUnavailable',
    message ?? `Model ${modelId} is unavailable (${reason})`,
    { modelId, reason }
  );
}

export function requestTimeout(modelId: string, timeoutMs: number): GatewayError {
  return new GatewayError(
    'RequestTimeout',
    `Request timed out after ${timeoutMs}ms waiting for ${modelId}`,
    { modelId, timeoutMs }
  );
}

export function cancelled(message = 'Request cancelled by caller'): GatewayError {
  return new GatewayError('Cancelled', message);
}

export function notFound(what: string): GatewayError {
  return new GatewayError('NotFound', `${what} not found`);
}

export function validationError(message: string, details?: Record<string, unknown>): GatewayError {
  return new GatewayError('ValidationError', message, details);
}

export function configurationError(message: string, details?: Record<string, unknown>): GatewayError {
  return new GatewayError('ConfigurationError', message, details);
}

const JSON_RPC_CODE_MAP: ReadonlyMap<number, GatewayErrorCode> = new Map<number, GatewayErrorCode>([
  [JsonRpcErrorCode.InvalidParams, 'ValidationError'],
  [JsonRpcErrorCode.ParseError, 'BackendError'],
  [JsonRpcErrorCode.InvalidRequest, 'BackendError'],
  [JsonRpcErrorCode.MethodNotFound, 'BackendError'],
  [JsonRpcErrorCode.InternalError, 'BackendError'],
  [JsonRpcErrorCode.ServerError, 'BackendError'],
  [JsonRpcErrorCode.ModelLoadError, 'BackendError'],
  [JsonRpcErrorCode.InferenceError, 'BackendError'],
]);

/**
 * Map unknown errors into GatewayError instances.
 *
 * @param error - Error thrown by a component, worker or library
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toGatewayError(
  error: unknown,
  fallbackCode: GatewayErrorCode = 'InternalError'
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  if (error instanceof JsonRpcError) {
    const mappedCode = JSON_RPC_CODE_MAP.get(error.code) ?? 'BackendError';
    return new GatewayError(mappedCode, error.message, { rpcCode: error.code });
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return cancelled(error.message || 'Operation aborted by caller');
    }
    if (error.name === 'TimeoutError') {
      return new GatewayError('RequestTimeout', error.message);
    }
    if (error instanceof ZodError) {
      return zodErrorToGatewayError(error);
    }
    return new GatewayError(fallbackCode, error.message);
  }

  return new GatewayError(fallbackCode, 'Unknown gateway error');
}

/**
 * Convert Zod validation error to GatewayError
 *
 * @example
 * ```typescript
 * const result = EmbeddingsRequestSchema.safeParse(body);
 * if (!result.success) {
 *   throw zodErrorToGatewayError(result.error);
 * }
 * // Throws: "Validation error on field 'texts': Array must contain at least 1 element(s)"
 * ```
 */
export function zodErrorToGatewayError(error: ZodError, code: GatewayErrorCode = 'ValidationError'): GatewayError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new GatewayError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
