/**
 * Pg repository tests against a scripted stand-in for the pool.
 * Each query is recorded; the handler decides what it returns or throws.
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import type { AggregateMetrics, EnrichedGpsPoint, EnrichedTaxiTrip } from '@taxi-analytics/domain';
import { applySchema, type DbQueryResult, type Queryable } from '../pool.js';
import { PgGpsPointRepository } from '../gps-point.repository.js';
import { PgTaxiTripRepository } from '../taxi-trip.repository.js';
import { PgMetricsRepository } from '../metrics.repository.js';

type Handler = (text: string, values: unknown[] | undefined, callIndex: number) => DbQueryResult;

class FakeDb implements Queryable {
  readonly calls: { text: string; values?: unknown[] }[] = [];

  constructor(private readonly handler: Handler = () => ({ rows: [], rowCount: 1 })) {}

  async query(text: string, values?: unknown[]): Promise<DbQueryResult> {
    this.calls.push({ text, values });
    return this.handler(text, values, this.calls.length - 1);
  }
}

const NOW = new Date('2024-05-01T10:00:00.000Z');

function gpsPoint(id: string, overrides: Partial<EnrichedGpsPoint> = {}): EnrichedGpsPoint {
  return {
    id,
    lat: 51.1,
    lng: 71.4,
    alt: 350,
    spd: 4,
    azm: 90,
    areaLabel: 'Center',
    activityLabel: 'Medium',
    roadType: 'Street',
    insights: { note: 'busy' },
    confidence: 0.9,
    classificationSource: 'oracle',
    processedAt: NOW,
    ...overrides,
  };
}

function taxiTrip(overrides: Partial<EnrichedTaxiTrip> = {}): EnrichedTaxiTrip {
  return {
    tripDurationSec: 600,
    tripDurationMin: 10,
    distanceKm: 3,
    kph: 18,
    waitTimeCost: 2,
    distanceCost: 9,
    totalFare: 12,
    numPassengers: 1,
    surgeApplied: true,
    tripCategory: 'Medium',
    priceCategory: 'Medium',
    efficiencyScore: 0.65,
    timeOfDay: null,
    insights: 'Error processing: timeout',
    confidence: null,
    classificationSource: 'rules',
    processedAt: NOW,
    ...overrides,
  };
}

beforeEach(() => {
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('PgGpsPointRepository', () => {
  it('inserts one row per point and counts them', async () => {
    const db = new FakeDb();
    const repo = new PgGpsPointRepository(db);

    const saved = await repo.saveMany([gpsPoint('a'), gpsPoint('b')]);

    expect(saved).toBe(2);
    expect(db.calls).toHaveLength(2);
    expect(db.calls[0]?.text).toContain('INSERT INTO analytics.processed_gps_data');
    expect(db.calls[0]?.values).toEqual([
      'a', 51.1, 71.4, 350, 4, 90, 'Center', 'Medium', 'Street', 0.9, 'oracle', '{"note":"busy"}', NOW,
    ]);
  });

  it('skips a point whose insert fails and keeps going', async () => {
    const db = new FakeDb((_text, _values, i) => {
      if (i === 1) throw new Error('value too long');
      return { rows: [], rowCount: 1 };
    });
    const repo = new PgGpsPointRepository(db);

    const saved = await repo.saveMany([gpsPoint('a'), gpsPoint('b'), gpsPoint('c')]);

    expect(saved).toBe(2);
    expect(db.calls).toHaveLength(3);
    expect(console.error).toHaveBeenCalledWith('[gps-repo] failed to save point b', 'value too long');
  });

  it('filters by area and limits', async () => {
    const db = new FakeDb();
    await new PgGpsPointRepository(db).list({ limit: 10, area: 'North' });

    expect(db.calls[0]?.text).toBe(
      'SELECT * FROM analytics.processed_gps_data WHERE area_classification = $1 ORDER BY id LIMIT $2',
    );
    expect(db.calls[0]?.values).toEqual(['North', 10]);
  });

  it('limits without a filter', async () => {
    const db = new FakeDb();
    await new PgGpsPointRepository(db).list({ limit: 5 });

    expect(db.calls[0]?.text).toBe('SELECT * FROM analytics.processed_gps_data ORDER BY id LIMIT $1');
    expect(db.calls[0]?.values).toEqual([5]);
  });

  it('maps stored rows back to enriched points', async () => {
    const db = new FakeDb(() => ({
      rows: [
        {
          id: 7,
          original_id: 'abc',
          lat: 51.13,
          lng: 71.4,
          alt: 300,
          spd: 12,
          azm: 45,
          area_classification: 'North',
          activity_level: 'Sideways',
          road_type: null,
          confidence: null,
          classification_source: 'rules',
          insights: 'Error processing: offline',
          processed_at: NOW,
        },
      ],
    }));

    const [point] = await new PgGpsPointRepository(db).listAll();

    expect(point).toEqual({
      rowId: 7,
      id: 'abc',
      lat: 51.13,
      lng: 71.4,
      alt: 300,
      spd: 12,
      azm: 45,
      areaLabel: 'North',
      activityLabel: null,
      roadType: null,
      confidence: null,
      classificationSource: 'rules',
      insights: 'Error processing: offline',
      processedAt: NOW,
    });
  });

  it.each([
    ['density', 'SELECT lat, lng, spd AS weight FROM analytics.processed_gps_data ORDER BY id'],
    ['speed', 'SELECT lat, lng, spd AS weight FROM analytics.processed_gps_data WHERE spd > 0 ORDER BY id'],
    ['altitude', 'SELECT lat, lng, alt AS weight FROM analytics.processed_gps_data WHERE alt > 0 ORDER BY id'],
  ] as const)('builds the %s heatmap', async (kind, sql) => {
    const db = new FakeDb(() => ({ rows: [{ lat: 51.1, lng: 71.4, weight: 3.5 }] }));

    const cells = await new PgGpsPointRepository(db).heatmap(kind);

    expect(db.calls[0]?.text).toBe(sql);
    expect(cells).toEqual([[51.1, 71.4, 3.5]]);
  });
});

describe('PgTaxiTripRepository', () => {
  it('stores time of day as an explicit null', async () => {
    const db = new FakeDb();
    const saved = await new PgTaxiTripRepository(db).saveMany([taxiTrip()]);

    expect(saved).toBe(1);
    expect(db.calls[0]?.values).toEqual([
      600, 10, 3, 18, 2, 9, 12, 1, true, 'Medium', 'Medium', null, 0.65, null, 'rules',
      '"Error processing: timeout"', NOW,
    ]);
  });

  it('reports the position of a trip that failed to save', async () => {
    const db = new FakeDb((_text, _values, i) => {
      if (i === 0) throw new Error('connection reset');
      return { rows: [], rowCount: 1 };
    });

    const saved = await new PgTaxiTripRepository(db).saveMany([taxiTrip(), taxiTrip()]);

    expect(saved).toBe(1);
    expect(console.error).toHaveBeenCalledWith('[taxi-repo] failed to save trip #0', 'connection reset');
  });

  it('filters by trip category', async () => {
    const db = new FakeDb();
    await new PgTaxiTripRepository(db).list({ limit: 200, tripCategory: 'Long' });

    expect(db.calls[0]?.text).toBe(
      'SELECT * FROM analytics.processed_taxi_data WHERE trip_category = $1 ORDER BY id LIMIT $2',
    );
    expect(db.calls[0]?.values).toEqual(['Long', 200]);
  });

  it('converts numeric strings and structured insights when reading', async () => {
    const db = new FakeDb(() => ({
      rows: [
        {
          id: '3',
          trip_duration_sec: 600,
          trip_duration_min: '10.5',
          distance_traveled_km: 3,
          kph: 18,
          wait_time_cost: 2,
          distance_cost: 9,
          total_fare_new: '12.25',
          num_of_passengers: 2,
          surge_applied: false,
          trip_category: 'Medium',
          price_category: 'Premium',
          time_of_day: null,
          efficiency_score: 0.4,
          confidence: 0.8,
          classification_source: 'oracle',
          insights: { summary: 'late night' },
          processed_at: '2024-05-01T10:00:00.000Z',
        },
      ],
    }));

    const [trip] = await new PgTaxiTripRepository(db).listAll();

    expect(trip).toMatchObject({
      rowId: 3,
      tripDurationMin: 10.5,
      totalFare: 12.25,
      surgeApplied: false,
      priceCategory: 'Premium',
      timeOfDay: null,
      insights: { summary: 'late night' },
      processedAt: NOW,
    });
  });
});

describe('PgMetricsRepository', () => {
  const metrics: AggregateMetrics = {
    gps_points_count: { value: 3, kind: 'GPS', description: 'points' },
    avg_speed_mps: { value: 2, kind: 'GPS', description: 'speed' },
    avg_speed_kmh: { value: 7.2, kind: 'CALCULATED', description: 'speed kmh' },
    taxi_trips_count: { value: 0, kind: 'TAXI', description: 'trips' },
    avg_fare_usd: { value: 0, kind: 'TAXI', description: 'fare' },
    avg_fare_tenge: { value: 0, kind: 'CALCULATED', description: 'fare kzt' },
    avg_trip_duration_min: { value: 0, kind: 'TAXI', description: 'duration' },
    avg_distance_km: { value: 0, kind: 'TAXI', description: 'distance' },
    surge_percentage: { value: 0, kind: 'CALCULATED', description: 'surge' },
    price_per_km_tenge: { value: 0, kind: 'CALCULATED', description: 'per km' },
  };

  it('upserts every metric by name', async () => {
    const db = new FakeDb();
    const saved = await new PgMetricsRepository(db).saveAll(metrics);

    expect(saved).toBe(10);
    expect(db.calls).toHaveLength(10);
    expect(db.calls[0]?.text).toContain('ON CONFLICT (metric_name) DO UPDATE');
    expect(db.calls[0]?.values?.slice(0, 4)).toEqual(['gps_points_count', 3, 'GPS', 'points']);
  });

  it('reads stored metrics keyed by name', async () => {
    const db = new FakeDb(() => ({
      rows: [
        {
          metric_name: 'surge_percentage',
          metric_value: 12.5,
          metric_type: 'CALCULATED',
          description: 'surge',
          calculated_at: NOW,
        },
      ],
    }));

    expect(await new PgMetricsRepository(db).getAll()).toEqual({
      surge_percentage: { value: 12.5, kind: 'CALCULATED', description: 'surge', calculatedAt: NOW },
    });
  });
});

describe('applySchema', () => {
  it('runs the bundled DDL', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const db = new FakeDb();

    await applySchema(db);

    expect(db.calls).toHaveLength(1);
    expect(db.calls[0]?.text).toContain('CREATE TABLE IF NOT EXISTS analytics.processed_gps_data');
    expect(db.calls[0]?.text).toContain('CREATE TABLE IF NOT EXISTS analytics.metrics');
  });
});
