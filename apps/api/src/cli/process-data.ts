/**
 * One-shot processing run from the command line.
 *
 * Env vars: see config/env.ts. GPS_DATA_PATH / TAXI_DATA_PATH point at the
 * input CSV files; DATABASE_URL at the target database.
 */

import {
  PgGpsPointRepository,
  PgMetricsRepository,
  PgTaxiTripRepository,
  applySchema,
  closePool,
} from '@taxi-analytics/adapters';
import { createProcessingStatus } from '@taxi-analytics/domain';
import { loadConfig } from '../config/env.js';
import { isAiConfigured } from '../config/ai-provider.js';
import { createPipeline } from '../container.js';

async function main(): Promise<number> {
  const config = loadConfig();
  if (!isAiConfigured(config)) {
    console.error(`[cli] AI provider "${config.ai.provider}" is not configured`);
    return 1;
  }

  await applySchema();
  const { pipeline } = createPipeline(config, {
    gpsRepo: new PgGpsPointRepository(),
    taxiRepo: new PgTaxiTripRepository(),
    metricsRepo: new PgMetricsRepository(),
  });

  const status = createProcessingStatus();
  await pipeline.run(status);

  if (status.status === 'error') {
    console.error(`[cli] processing failed: ${status.error ?? 'unknown error'}`);
    return 1;
  }
  console.log(`[cli] processed ${status.gpsSaved ?? 0} GPS points and ${status.taxiSaved ?? 0} taxi trips`);
  return 0;
}

main()
  .then(async (code) => {
    await closePool();
    process.exit(code);
  })
  .catch(async (err) => {
    console.error('[cli] fatal error', err);
    await closePool();
    process.exit(1);
  });
