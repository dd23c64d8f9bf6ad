/**
 * Express plumbing shared by every route module.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from 'pino';
import type { z } from 'zod';
import type { RateLimitInfo } from '../types/auth.js';
import { type GatewayError, toGatewayError, validationError, zodErrorToGatewayError } from '../api/errors.js';

/**
 * Wrap an async handler so rejections reach the error middleware.
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * Parse a body or query object, failing with ValidationError.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw zodErrorToGatewayError(parsed.error);
  }
  return parsed.data;
}

/**
 * Signal aborted when the client goes away before the response is sent.
 */
export function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function setRateLimitHeaders(res: Response, info: RateLimitInfo): void {
  res.setHeader('X-RateLimit-Limit', String(info.limit));
  res.setHeader('X-RateLimit-Remaining', String(info.remaining));
  res.setHeader('X-RateLimit-Reset', String(Math.ceil(info.resetAt / 1000)));
}

/**
 * Write the error body `{ error: { code, message, details? } }`.
 */
export function sendError(res: Response, error: unknown, logger?: Logger): void {
  const gatewayError = fromBodyParserError(error) ?? toGatewayError(error);

  if (gatewayError.status >= 500 && gatewayError.code !== 'ModelUnavailable') {
    logger?.error({ err: error, code: gatewayError.code }, 'Request failed');
  }

  if (res.headersSent) {
    return;
  }

  const retryAfterMs = gatewayError.retryAfterMs;
  if (retryAfterMs !== undefined) {
    res.setHeader('Retry-After', String(Math.max(1, Math.ceil(retryAfterMs / 1000))));
    const limit = gatewayError.details?.limit;
    if (typeof limit === 'number') {
      res.setHeader('X-RateLimit-Limit', String(limit));
      res.setHeader('X-RateLimit-Remaining', '0');
    }
  }

  res.status(gatewayError.status).json({ error: publicShape(gatewayError) });
}

const BODY_PARSER_MESSAGES: Readonly<Record<string, string>> = {
  'entity.parse.failed': 'Malformed JSON body',
  'entity.too.large': 'Request body too large',
  'encoding.unsupported': 'Unsupported body encoding',
  'request.aborted': 'Request body aborted',
};

/**
 * Errors raised by express.json() / express.raw() carry a `type` tag.
 */
function fromBodyParserError(error: unknown): GatewayError | undefined {
  if (!(error instanceof Error) || !('type' in error) || typeof error.type !== 'string') {
    return undefined;
  }
  const message = BODY_PARSER_MESSAGES[error.type];
  return message !== undefined ? validationError(message, { field: 'body' }) : undefined;
}

function publicShape(error: GatewayError): { code: string; message: string; details?: Record<string, unknown> } {
  if (error.code === 'InternalError' || error.code === 'ConfigurationError') {
    return { code: error.code, message: 'Internal server error' };
  }
  return error.details
    ? { code: error.code, message: error.message, details: error.details }
    : { code: error.code, message: error.message };
}

/**
 * First value of a header that may repeat.
 */
export function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
