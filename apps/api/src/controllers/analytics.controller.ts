import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { AREA_LABELS, TRIP_CATEGORIES } from '@taxi-analytics/domain';
import type { StoredGpsPoint, StoredTaxiTrip } from '@taxi-analytics/domain';
import type { AppDeps } from '../container.js';

const DASHBOARD_SAMPLE_SIZE = 100;
const AREA_SAMPLE_SIZE = 500;
const TRIP_SAMPLE_SIZE = 200;

export function createAnalyticsRouter(deps: AppDeps): Router {
  const router = Router();

  /** GET /api/analytics/metrics - metrics stored by the last processing run */
  router.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await deps.metricsRepo.getAll());
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/analytics/dashboard - fresh metrics, heatmaps and record samples */
  router.get('/dashboard', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const metrics = await deps.aggregator.computeAggregates();
      const density = await deps.gpsRepo.heatmap('density');
      const speed = await deps.gpsRepo.heatmap('speed');
      const altitude = await deps.gpsRepo.heatmap('altitude');
      const gps = await deps.gpsRepo.list({ limit: DASHBOARD_SAMPLE_SIZE });
      const taxi = await deps.taxiRepo.list({ limit: DASHBOARD_SAMPLE_SIZE });

      res.json({
        metrics,
        heatmapData: { density, speed, altitude },
        sampleData: { gps, taxi },
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/analytics/areas - GPS points grouped by area label */
  router.get('/areas', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const byArea: Record<string, StoredGpsPoint[]> = {};
      for (const area of AREA_LABELS) {
        byArea[area] = await deps.gpsRepo.list({ limit: AREA_SAMPLE_SIZE, area });
      }
      res.json(byArea);
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/analytics/trips - taxi trips grouped by trip category */
  router.get('/trips', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const byCategory: Record<string, StoredTaxiTrip[]> = {};
      for (const tripCategory of TRIP_CATEGORIES) {
        byCategory[tripCategory] = await deps.taxiRepo.list({ limit: TRIP_SAMPLE_SIZE, tripCategory });
      }
      res.json(byCategory);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
