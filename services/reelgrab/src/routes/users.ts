import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

const DEFAULT_HISTORY_LIMIT = 20;

export function createUsersRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/v1/users/:userId/stats', async (req, res) => {
    try {
      const stats = await ctx.records.getUserStats(req.params.userId);
      res.json({
        user_id: req.params.userId,
        total_downloads: stats.totalDownloads,
        downloads_today: stats.downloadsToday,
        daily_limit: stats.dailyLimit,
        remaining_today: stats.remainingToday,
        joined_date: stats.joinedDate,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to load stats';
      res.status(500).json({
        error: {
          code: 'STATS_FAILED',
          message,
        },
      });
    }
  });

  router.get('/v1/users/:userId/downloads', async (req, res) => {
    const rawLimit = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : NaN;
    const limit = Number.isFinite(rawLimit) ? rawLimit : DEFAULT_HISTORY_LIMIT;

    try {
      const records = await ctx.records.listForUser(req.params.userId, limit);
      res.json({
        user_id: req.params.userId,
        downloads: records.map((record) => ({
          id: record.id,
          platform: record.platform,
          url: record.url,
          filename: record.filename,
          file_size: record.file_size,
          status: record.status,
          created_at: record.created_at,
          sent_at: record.sent_at ?? null,
          deleted: record.deleted,
        })),
        count: records.length,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to load downloads';
      res.status(500).json({
        error: {
          code: 'HISTORY_FAILED',
          message,
        },
      });
    }
  });

  return router;
}
