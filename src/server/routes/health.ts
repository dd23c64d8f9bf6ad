/**
 * Liveness check. No authentication, no quota.
 */

import express, { type Request, type Response, type Router } from 'express';
import type { RouteContext } from './context.js';

export function createHealthRouter(ctx: RouteContext, startedAt: number = Date.now()): Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    const metrics = ctx.slots.getMetrics();
    res.json({
      status: 'ok',
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      models: {
        ready: metrics.slots.ready,
        loading: metrics.slots.loading,
        failed: metrics.slots.failed,
      },
    });
  });

  return router;
}
