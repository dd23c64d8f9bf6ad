/**
 * Worker protocol: JSON-RPC 2.0 messages, one per line, over the
 * worker's stdin/stdout.
 *
 * Every worker answers `load` and `shutdown`; the task methods (`chat`,
 * `embed`, `transcribe`, ...) are described in `inference/schemas.ts`.
 */

import { z } from 'zod';

const RequestId = z.union([z.string(), z.number()]);
const ResponseId = RequestId.nullable();

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: RequestId.optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

/** A request without an id */
export type JsonRpcNotification = Omit<JsonRpcRequest, 'id'>;

const ErrorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: ResponseId,
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
  }),
});

const ResultResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: ResponseId,
  result: z.unknown(),
});

const NotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
});

/**
 * Anything a worker may write. `{ error }` is matched before `{ result }`
 * so that a reply carrying both is treated as a failure.
 */
export const WorkerMessageSchema = z.union([ErrorResponseSchema, ResultResponseSchema, NotificationSchema]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

/**
 * Error codes a worker may answer with: the JSON-RPC reserved range plus
 * two of its own for failed loads and failed inference.
 */
export enum JsonRpcErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,
  ServerError = -32000,
  ModelLoadError = -32001,
  InferenceError = -32002,
}

/** `load`: first request after spawn */
export interface LoadParams {
  model_id: string;
  kind: string;
  path?: string;
  options: Record<string, unknown>;
}

export const LoadResultSchema = z.object({
  model_id: z.string(),
  /** Resident size once loaded, when the worker can measure it */
  memory_bytes: z.number().int().nonnegative().optional(),
});

export type LoadResult = z.infer<typeof LoadResultSchema>;

/**
 * Line codec. Encoding appends no newline; framing is the transport's job.
 */
export interface Codec {
  encode(message: JsonRpcRequest | JsonRpcNotification): string;
  decode(line: string): unknown;
}

export const JSON_CODEC: Codec = {
  encode: (message) => JSON.stringify(message),
  decode: (line) => JSON.parse(line),
};
