import {
  CsvRecordSource,
  PgGpsPointRepository,
  PgMetricsRepository,
  PgTaxiTripRepository,
} from '@taxi-analytics/adapters';
import { createProcessingStatus } from '@taxi-analytics/domain';
import type {
  AnalyticsUseCasePort,
  GpsPointRepositoryPort,
  MetricsRepositoryPort,
  ProcessingStatus,
  ProcessingUseCasePort,
  TaxiTripRepositoryPort,
} from '@taxi-analytics/domain';
import type { AiProvider, AppConfig } from './config/env.js';
import { createAiInference, isAiConfigured } from './config/ai-provider.js';
import { EnrichmentEngine } from './services/enrichment/enrichment-engine.js';
import { Aggregator } from './services/analytics/aggregator.js';
import { ProcessingPipeline } from './services/processing/processing-pipeline.js';

/** Everything the HTTP layer needs; tests build this from in-memory fakes. */
export interface AppDeps {
  gpsRepo: GpsPointRepositoryPort;
  taxiRepo: TaxiTripRepositoryPort;
  metricsRepo: MetricsRepositoryPort;
  aggregator: AnalyticsUseCasePort;
  pipeline: ProcessingUseCasePort;
  status: ProcessingStatus;
  aiProvider: AiProvider;
  aiConfigured: boolean;
  corsOrigin: string;
}

export function createPipeline(
  config: AppConfig,
  repos: Pick<AppDeps, 'gpsRepo' | 'taxiRepo' | 'metricsRepo'>,
): { pipeline: ProcessingPipeline; aggregator: Aggregator } {
  const engine = new EnrichmentEngine(createAiInference(config), {
    maxAttempts: config.oracle.maxAttempts,
    timeoutMs: config.oracle.timeoutMs,
  });
  const aggregator = new Aggregator(repos.gpsRepo, repos.taxiRepo);
  const pipeline = new ProcessingPipeline({
    source: new CsvRecordSource({ gpsPath: config.gpsDataPath, taxiPath: config.taxiDataPath }),
    engine,
    aggregator,
    ...repos,
    batchSize: config.batchSize,
  });
  return { pipeline, aggregator };
}

export function createAppDeps(config: AppConfig): AppDeps {
  const repos = {
    gpsRepo: new PgGpsPointRepository(),
    taxiRepo: new PgTaxiTripRepository(),
    metricsRepo: new PgMetricsRepository(),
  };
  const { pipeline, aggregator } = createPipeline(config, repos);
  return {
    ...repos,
    aggregator,
    pipeline,
    status: createProcessingStatus(),
    aiProvider: config.ai.provider,
    aiConfigured: isAiConfigured(config),
    corsOrigin: config.corsOrigin,
  };
}
