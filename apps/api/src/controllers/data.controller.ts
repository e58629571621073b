import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppDeps } from '../container.js';

const limitSchema = z.coerce.number().int().min(1).max(10_000).default(1000);

const gpsQuerySchema = z.object({
  limit: limitSchema,
  area: z.enum(['North', 'Center', 'South']).optional(),
});

const taxiQuerySchema = z.object({
  limit: limitSchema,
  tripCategory: z.enum(['Short', 'Medium', 'Long']).optional(),
});

const heatmapQuerySchema = z.object({
  type: z.enum(['density', 'speed', 'altitude']).default('density'),
});

export function createDataRouter(deps: AppDeps): Router {
  const router = Router();

  /** GET /api/gps-data?limit&area */
  router.get('/gps-data', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = gpsQuerySchema.parse(req.query);
      res.json(await deps.gpsRepo.list(query));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/taxi-data?limit&tripCategory */
  router.get('/taxi-data', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = taxiQuerySchema.parse(req.query);
      res.json(await deps.taxiRepo.list(query));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/heatmap-data?type=density|speed|altitude → [lat, lng, weight][] */
  router.get('/heatmap-data', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { type } = heatmapQuerySchema.parse(req.query);
      res.json(await deps.gpsRepo.heatmap(type));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
