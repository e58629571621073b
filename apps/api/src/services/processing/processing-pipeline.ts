import { createBatchProgress } from '@taxi-analytics/domain';
import type {
  AnalyticsUseCasePort,
  BatchProgress,
  EnrichmentUseCasePort,
  GpsPointRepositoryPort,
  MetricsRepositoryPort,
  ProcessingStatus,
  ProcessingUseCasePort,
  RecordSourcePort,
  TaxiTripRepositoryPort,
} from '@taxi-analytics/domain';
import { BatchDriver } from '../enrichment/batch-driver.js';

const log = {
  info: (msg: string) => console.log(`[pipeline] ${msg}`),
  error: (msg: string, err?: unknown) => console.error(`[pipeline] ${msg}`, err ?? ''),
};

// Share of the progress bar each stage ends at.
const ENRICHED_PROGRESS = 50;
const SAVED_PROGRESS = 80;

export interface ProcessingPipelineDeps {
  source: RecordSourcePort;
  engine: EnrichmentUseCasePort;
  aggregator: AnalyticsUseCasePort;
  gpsRepo: GpsPointRepositoryPort;
  taxiRepo: TaxiTripRepositoryPort;
  metricsRepo: MetricsRepositoryPort;
  batchSize: number;
  now?: () => Date;
}

/**
 * load → enrich (GPS, then trips) → save → aggregate → save metrics.
 *
 * `run` reports through the caller's `ProcessingStatus` and never rejects:
 * a failure leaves the status at `error` with its message.
 */
export class ProcessingPipeline implements ProcessingUseCasePort {
  private readonly driver: BatchDriver;
  private readonly now: () => Date;

  constructor(private readonly deps: ProcessingPipelineDeps) {
    this.driver = new BatchDriver(deps.batchSize);
    this.now = deps.now ?? (() => new Date());
  }

  async run(status: ProcessingStatus): Promise<void> {
    const update = (patch: Partial<ProcessingStatus>): void => {
      Object.assign(status, patch, { lastUpdated: this.now() });
    };

    update({
      isProcessing: true,
      progress: 0,
      status: 'loading_data',
      recordKind: undefined,
      batch: undefined,
      gpsSaved: undefined,
      taxiSaved: undefined,
      error: undefined,
    });

    try {
      const { source, engine, aggregator, gpsRepo, taxiRepo, metricsRepo } = this.deps;

      log.info('loading GPS data...');
      const points = await source.loadGpsPoints();
      log.info('loading taxi data...');
      const trips = await source.loadTaxiTrips();

      const totalBatches = this.driver.countBatches(points.length) + this.driver.countBatches(trips.length);
      let completedBatches = 0;
      const onProgress = (kind: 'gps' | 'taxi') => (p: Readonly<BatchProgress>) => {
        completedBatches += 1;
        update({
          recordKind: kind,
          batch: { ...p },
          progress: Math.floor((completedBatches / totalBatches) * ENRICHED_PROGRESS),
        });
        log.info(`processed ${kind} batch ${p.batchIndex}/${p.totalBatches}`);
      };

      update({ status: 'enriching' });
      const enrichedGps = await this.driver.run(
        points,
        (batch) => engine.enrichGps(batch),
        createBatchProgress(),
        onProgress('gps'),
      );
      const enrichedTrips = await this.driver.run(
        trips,
        (batch) => engine.enrichTrips(batch),
        createBatchProgress(),
        onProgress('taxi'),
      );

      update({ status: 'saving_to_database', progress: ENRICHED_PROGRESS });
      const gpsSaved = await gpsRepo.saveMany(enrichedGps);
      const taxiSaved = await taxiRepo.saveMany(enrichedTrips);

      update({ status: 'calculating_metrics', progress: SAVED_PROGRESS, gpsSaved, taxiSaved });
      const metrics = await aggregator.computeAggregates();
      await metricsRepo.saveAll(metrics);

      update({ isProcessing: false, progress: 100, status: 'completed' });
      log.info(`processing completed. GPS: ${gpsSaved}, Taxi: ${taxiSaved}`);
    } catch (err) {
      update({
        isProcessing: false,
        progress: 0,
        status: 'error',
        error: err instanceof Error ? err.message : String(err),
      });
      log.error('processing failed', err);
    }
  }
}
