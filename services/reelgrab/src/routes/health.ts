import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const [userStats, catalogStats, engineVersion, redisPing] = await Promise.all([
        ctx.ledger.stats(),
        ctx.records.stats(),
        ctx.engine.version(),
        ctx.sweepQueue.ping(),
      ]);

      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        engine: {
          name: ctx.engine.name,
          version: engineVersion,
        },
        users: userStats,
        catalog: catalogStats,
        selections_pending: ctx.selections.size(),
        queue: {
          backend: 'redis',
          redis_ping: redisPing,
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Health check failed';
      res.status(500).json({
        status: 'error',
        error: {
          code: 'HEALTH_CHECK_FAILED',
          message,
        },
      });
    }
  });

  return router;
}
