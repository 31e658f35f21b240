import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createAdminRouter(ctx: AppContext): Router {
  const router = Router();

  router.post('/v1/admin/sweep', async (_req, res) => {
    try {
      const jobId = await ctx.sweepQueue.requestSweep();
      res.status(202).json({ job_id: jobId, status: 'queued' });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to queue sweep';
      res.status(500).json({
        error: {
          code: 'SWEEP_QUEUE_FAILED',
          message,
        },
      });
    }
  });

  return router;
}
