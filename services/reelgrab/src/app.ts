import express, { type Express } from 'express';
import { createMasterApiKeyMiddleware } from './middleware/masterApiKey.js';
import { createAdminRouter } from './routes/admin.js';
import { createHealthRouter } from './routes/health.js';
import { createHelpRouter } from './routes/help.js';
import { createRequestsRouter } from './routes/requests.js';
import { createUsersRouter } from './routes/users.js';
import type { AppContext } from './types/appContext.js';

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(express.json({ limit: '64kb' }));

  app.use(createHelpRouter(ctx));
  app.use(createHealthRouter(ctx));

  app.use('/v1', createMasterApiKeyMiddleware(ctx.config.masterApiKey));
  app.use(createRequestsRouter(ctx));
  app.use(createUsersRouter(ctx));
  app.use(createAdminRouter(ctx));

  app.use((req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.method} ${req.path} not found`,
      },
    });
  });

  return app;
}
