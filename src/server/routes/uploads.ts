/**
 * Raw binary uploads (audio, images).
 */

import express, { type Request, type RequestHandler } from 'express';
import { validationError } from '../../api/errors.js';
import { headerValue } from '../http-helpers.js';

const MB = 1024 * 1024;

/**
 * Accept any body as a Buffer, up to `limitMb`.
 */
export function rawUpload(limitMb: number): RequestHandler {
  return express.raw({ type: () => true, limit: Math.floor(limitMb * MB) });
}

/**
 * Content type without parameters, lower-cased.
 */
export function mediaType(req: Request): string | undefined {
  const value = headerValue(req, 'content-type');
  const type = value?.split(';')[0]?.trim().toLowerCase();
  return type !== undefined && type.length > 0 ? type : undefined;
}

/**
 * Validated upload: an allowed content type and a non-empty body.
 */
export function readUpload(
  req: Request,
  allowed: readonly string[],
  kind: string
): { contentType: string; data: Buffer } {
  const contentType = mediaType(req);
  if (contentType === undefined || !allowed.includes(contentType)) {
    throw validationError(`Unsupported ${kind} type ${contentType ?? '(none)'}; allowed: ${allowed.join(', ')}`, {
      field: 'content-type',
    });
  }

  const body: unknown = req.body;
  if (!Buffer.isBuffer(body) || body.length === 0) {
    throw validationError(`Empty ${kind} upload`, { field: 'body' });
  }

  return { contentType, data: body };
}
