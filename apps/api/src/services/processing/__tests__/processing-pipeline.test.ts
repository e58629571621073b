import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { createProcessingStatus } from '@taxi-analytics/domain';
import type {
  EnrichedGpsPoint,
  EnrichedTaxiTrip,
  EnrichmentUseCasePort,
  ProcessingStatus,
  RawGpsPoint,
  RawTaxiTrip,
  RecordSourcePort,
} from '@taxi-analytics/domain';
import { ProcessingPipeline } from '../processing-pipeline.js';
import { EnrichmentEngine } from '../../enrichment/enrichment-engine.js';
import { Aggregator } from '../../analytics/aggregator.js';
import {
  FIXED_NOW,
  InMemoryGpsRepository,
  InMemoryMetricsRepository,
  InMemoryTaxiRepository,
  ScriptedOracle,
  StaticRecordSource,
  makeEnrichedGps,
  makeEnrichedTrip,
  makeRawGps,
  makeRawTrip,
} from '../../../__tests__/support/fakes.js';

/** Labels every record and notes the progress the status showed at each call. */
class ObservingEngine implements EnrichmentUseCasePort {
  readonly seenProgress: number[] = [];

  constructor(private readonly status: ProcessingStatus) {}

  async enrichGps(batch: readonly RawGpsPoint[]): Promise<EnrichedGpsPoint[]> {
    this.seenProgress.push(this.status.progress);
    return batch.map((p) => ({ ...makeEnrichedGps(), ...p }));
  }

  async enrichTrips(batch: readonly RawTaxiTrip[]): Promise<EnrichedTaxiTrip[]> {
    this.seenProgress.push(this.status.progress);
    return batch.map((t) => ({ ...makeEnrichedTrip(), ...t }));
  }
}

class BrokenSource implements RecordSourcePort {
  async loadGpsPoints(): Promise<RawGpsPoint[]> {
    throw new Error('ENOENT: data/gps.csv');
  }

  async loadTaxiTrips(): Promise<RawTaxiTrip[]> {
    return [];
  }
}

const points = [makeRawGps({ id: 'a' }), makeRawGps({ id: 'b' }), makeRawGps({ id: 'c' })];
const trips = [makeRawTrip(), makeRawTrip({ surgeApplied: true })];

function setup(overrides: { source?: RecordSourcePort; engine?: EnrichmentUseCasePort } = {}) {
  const gpsRepo = new InMemoryGpsRepository();
  const taxiRepo = new InMemoryTaxiRepository();
  const metricsRepo = new InMemoryMetricsRepository();
  const pipeline = new ProcessingPipeline({
    source: overrides.source ?? new StaticRecordSource(points, trips),
    engine: overrides.engine ?? new EnrichmentEngine(new ScriptedOracle([new Error('offline')])),
    aggregator: new Aggregator(gpsRepo, taxiRepo),
    gpsRepo,
    taxiRepo,
    metricsRepo,
    batchSize: 2,
    now: () => FIXED_NOW,
  });
  return { pipeline, gpsRepo, taxiRepo, metricsRepo };
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('ProcessingPipeline', () => {
  it('enriches, saves and aggregates every record even with the oracle offline', async () => {
    const { pipeline, gpsRepo, taxiRepo, metricsRepo } = setup();
    const status = createProcessingStatus();

    await pipeline.run(status);

    expect(status).toEqual({
      isProcessing: false,
      progress: 100,
      status: 'completed',
      lastUpdated: FIXED_NOW,
      recordKind: 'taxi',
      batch: { batchIndex: 1, totalBatches: 1, processedRecords: 2, totalRecords: 2 },
      gpsSaved: 3,
      taxiSaved: 2,
      error: undefined,
    });
    expect(gpsRepo.rows.map((r) => r.id)).toEqual(['a', 'b', 'c']);
    expect(gpsRepo.rows.every((r) => r.classificationSource === 'rules')).toBe(true);
    expect(taxiRepo.rows).toHaveLength(2);
    expect(metricsRepo.stored['gps_points_count']?.value).toBe(3);
    expect(metricsRepo.stored['surge_percentage']?.value).toBe(50);
  });

  it('advances progress through the enrichment half batch by batch', async () => {
    const status = createProcessingStatus();
    const engine = new ObservingEngine(status);
    const { pipeline } = setup({ engine });

    await pipeline.run(status);

    // three batches in total: two GPS, one taxi
    expect(engine.seenProgress).toEqual([0, 16, 33]);
    expect(status.progress).toBe(100);
  });

  it('records a failure on the status instead of rejecting', async () => {
    const { pipeline, gpsRepo } = setup({ source: new BrokenSource() });
    const status = createProcessingStatus();

    await expect(pipeline.run(status)).resolves.toBeUndefined();

    expect(status).toMatchObject({
      isProcessing: false,
      progress: 0,
      status: 'error',
      error: 'ENOENT: data/gps.csv',
    });
    expect(gpsRepo.rows).toHaveLength(0);
  });

  it('clears the error of an earlier run when started again', async () => {
    const { pipeline } = setup();
    const status: ProcessingStatus = { ...createProcessingStatus(), status: 'error', error: 'previous failure' };

    await pipeline.run(status);

    expect(status.status).toBe('completed');
    expect(status.error).toBeUndefined();
  });
});
