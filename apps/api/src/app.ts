import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { AppDeps } from './container.js';
import { createProcessingRouter } from './controllers/processing.controller.js';
import { createDataRouter } from './controllers/data.controller.js';
import { createAnalyticsRouter } from './controllers/analytics.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export const API_VERSION = '1.0.0';

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin }));
  if (process.env['NODE_ENV'] !== 'test') app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/processing', createProcessingRouter(deps));
  app.use('/api/analytics', createAnalyticsRouter(deps));
  app.use('/api', createDataRouter(deps));

  app.get('/', (_req, res) => {
    res.json({ message: 'Taxi Analytics API', version: API_VERSION, status: 'running' });
  });

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      aiProvider: deps.aiProvider,
      aiConfigured: deps.aiConfigured,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
