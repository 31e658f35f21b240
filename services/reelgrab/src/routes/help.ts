import { Router } from 'express';
import { FORMAT_CHOICES, FORMAT_LABELS } from '../core/formats.js';
import { SUPPORTED_PLATFORMS } from '../core/platforms.js';
import type { AppContext } from '../types/appContext.js';

export function createHelpRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/help', (_req, res) => {
    const { config } = ctx;
    res.json({
      service: 'reelgrab',
      version: '0.1.0',
      summary: 'Send a social-media link, pick a format, receive the file.',
      base_url: config.publicBaseUrl,
      platforms: SUPPORTED_PLATFORMS,
      formats: FORMAT_CHOICES.map((id) => ({ id, label: FORMAT_LABELS[id] })),
      limits: {
        daily_downloads: config.dailyDownloadLimit,
        max_file_size_mb: config.maxFileSizeMb,
        retention_hours: config.retentionHours,
        selection_timeout_seconds: Math.round(config.selectionTimeoutMs / 1000),
      },
      flow: [
        '1) POST /v1/requests with { user_id, user_name, url } -> request_id and formats',
        '2) POST /v1/requests/{request_id}/download with { user_id, format } -> file bytes',
        '3) DELETE /v1/requests/{request_id} with { user_id } to cancel instead',
      ],
      auth: config.masterApiKey
        ? { gateway_header: 'x-api-key: <MASTER_API_KEY>' }
        : { gateway_header: null },
      endpoints: {
        public: ['GET /help', 'GET /health'],
        gateway_required: [
          'POST /v1/requests',
          'POST /v1/requests/{request_id}/download',
          'DELETE /v1/requests/{request_id}',
          'GET /v1/users/{user_id}/stats',
          'GET /v1/users/{user_id}/downloads',
          'POST /v1/admin/sweep',
        ],
      },
      notes: [
        `Files are deleted after delivery; catalog entries expire after ${config.retentionHours}h.`,
        'Private content cannot be downloaded.',
      ],
    });
  });

  return router;
}
