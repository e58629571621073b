import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AppDeps } from '../container.js';
import { HttpError } from '../middleware/error-handler.js';

export function createProcessingRouter(deps: AppDeps): Router {
  const router = Router();

  /** POST /api/processing/start - run the enrichment pipeline in the background */
  router.post('/start', (_req: Request, res: Response, next: NextFunction) => {
    try {
      if (deps.status.isProcessing) {
        throw new HttpError(400, 'Data processing already in progress');
      }
      if (!deps.aiConfigured) {
        throw new HttpError(400, `AI provider "${deps.aiProvider}" is not configured`);
      }

      deps.pipeline
        .run(deps.status)
        .catch((err) => console.error('[processing] pipeline crashed', err));

      res.status(202).json({ message: 'Data processing started', status: 'processing' });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/processing/status */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(deps.status);
  });

  return router;
}
