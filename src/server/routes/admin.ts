/**
 * Key administration and model inspection. Every route needs the
 * `admin` capability and is charged against the caller's quota.
 */

import express, { type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import type { ApiKeyView, GlobalKeyStats, KeyStats } from '../../types/auth.js';
import {
  CreateKeyRequestSchema,
  KeyReferenceRequestSchema,
  KeyStatsQuerySchema,
  ListKeysQuerySchema,
} from '../../types/schemas/requests.js';
import { NonEmptyString } from '../../types/schemas/common.js';
import { asyncHandler, parseInput } from '../http-helpers.js';
import type { RouteContext } from './context.js';

const UnloadModelRequestSchema = z.object({
  model_id: NonEmptyString,
});

function isoOrNull(epochMs: number | undefined): string | null {
  return epochMs !== undefined ? new Date(epochMs).toISOString() : null;
}

export function serializeKey(key: ApiKeyView, now: number = Date.now()): Record<string, unknown> {
  return {
    id: key.id,
    key_prefix: key.keyPrefix,
    owner: key.owner,
    description: key.description,
    capabilities: key.capabilities,
    rate_limit: { max_requests: key.rateLimit.maxRequests, window_ms: key.rateLimit.windowMs },
    status: key.status,
    expired: key.expiresAt !== undefined && key.expiresAt <= now,
    created_at: isoOrNull(key.createdAt),
    updated_at: isoOrNull(key.updatedAt),
    expires_at: isoOrNull(key.expiresAt),
    last_used_at: isoOrNull(key.usage.lastUsedAt),
    usage: {
      authentications: key.usage.authentications,
      authorizations: key.usage.authorizations,
      denials: key.usage.denials,
      by_capability: key.usage.byCapability,
    },
  };
}

function serializeGlobalStats(stats: GlobalKeyStats): Record<string, unknown> {
  return {
    total_keys: stats.totalKeys,
    active_keys: stats.activeKeys,
    revoked_keys: stats.revokedKeys,
    expired_keys: stats.expiredKeys,
    admin_keys: stats.adminKeys,
    total_requests: stats.totalRequests,
    keys_used: stats.keysUsed,
    logged_requests: stats.loggedRequests,
  };
}

function serializeKeyStats(stats: KeyStats): Record<string, unknown> {
  return {
    key_prefix: stats.keyPrefix,
    owner: stats.owner,
    status: stats.status,
    expired: stats.expired,
    created_at: isoOrNull(stats.createdAt),
    capabilities: stats.capabilities,
    usage: {
      authentications: stats.usage.authentications,
      authorizations: stats.usage.authorizations,
      denials: stats.usage.denials,
      by_capability: stats.usage.byCapability,
    },
    logged_requests: stats.loggedRequests,
    unique_endpoints: stats.uniqueEndpoints,
    first_request_at: isoOrNull(stats.firstRequestAt),
    last_request_at: isoOrNull(stats.lastRequestAt),
  };
}

export function createAdminRouter(ctx: RouteContext): Router {
  const router = express.Router();

  router.post(
    '/keys/create',
    ctx.requireKey('admin'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseInput(CreateKeyRequestSchema, req.body);

      const created = await ctx.registry.create({
        owner: body.owner,
        description: body.description,
        capabilities: body.capabilities,
        rateLimit: body.rate_limit
          ? { maxRequests: body.rate_limit.max_requests, windowMs: body.rate_limit.window_ms }
          : undefined,
        expiresInDays: body.expires_in_days,
      });

      res.status(201).json({
        success: true,
        message: 'Store this key now; it cannot be shown again',
        api_key: created.rawKey,
        key_prefix: created.record.keyPrefix,
        expires_at: isoOrNull(created.record.expiresAt),
        key: serializeKey(created.record),
      });
    })
  );

  router.get('/keys/list', ctx.requireKey('admin'), (req: Request, res: Response) => {
    const query = parseInput(ListKeysQuerySchema, req.query);
    const keys = ctx.registry.list({ activeOnly: query.active_only });
    const now = Date.now();
    res.json({ total: keys.length, keys: keys.map((key) => serializeKey(key, now)) });
  });

  router.post(
    '/keys/revoke',
    ctx.requireKey('admin'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseInput(KeyReferenceRequestSchema, req.body);
      const key = await ctx.registry.revoke(body.key_prefix);
      res.json({ success: true, message: `Key ${key.keyPrefix} revoked`, key: serializeKey(key) });
    })
  );

  router.post(
    '/keys/activate',
    ctx.requireKey('admin'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseInput(KeyReferenceRequestSchema, req.body);
      const key = await ctx.registry.activate(body.key_prefix);
      res.json({ success: true, message: `Key ${key.keyPrefix} activated`, key: serializeKey(key) });
    })
  );

  router.get('/keys/stats', ctx.requireKey('admin'), (req: Request, res: Response) => {
    const query = parseInput(KeyStatsQuerySchema, req.query);
    if (query.key_prefix !== undefined) {
      res.json(serializeKeyStats(ctx.registry.stats(query.key_prefix)));
      return;
    }
    res.json(serializeGlobalStats(ctx.registry.stats()));
  });

  router.get('/keys/info/:keyPrefix', ctx.requireKey('admin'), (req: Request, res: Response) => {
    res.json(serializeKey(ctx.registry.get(req.params.keyPrefix)));
  });

  router.get('/models', ctx.requireKey('admin'), (_req: Request, res: Response) => {
    res.json({
      slots: ctx.slots.listSlots(),
      metrics: ctx.slots.getMetrics(),
      admission: ctx.admission.getStats(),
      routes: ctx.config.routes,
    });
  });

  router.post(
    '/models/unload',
    ctx.requireKey('admin'),
    ctx.jsonBody(),
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseInput(UnloadModelRequestSchema, req.body);
      await ctx.slots.unloadModel(body.model_id);
      res.json({ success: true, model_id: body.model_id, slot: ctx.slots.getSlotStatus(body.model_id) ?? null });
    })
  );

  return router;
}
