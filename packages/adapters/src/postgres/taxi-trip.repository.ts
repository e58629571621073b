import {
  PRICE_CATEGORIES,
  TRIP_CATEGORIES,
  type EnrichedTaxiTrip,
  type StoredTaxiTrip,
  type TaxiTripListFilters,
  type TaxiTripRepositoryPort,
  type TimeOfDay,
} from '@taxi-analytics/domain';
import { getPool, type Queryable } from './pool.js';
import {
  toDate,
  toInsight,
  toLabel,
  toNullableNumber,
  toNumber,
} from './row-mapping.js';

const TIMES_OF_DAY: readonly TimeOfDay[] = ['Morning', 'Afternoon', 'Evening', 'Night'];

export class PgTaxiTripRepository implements TaxiTripRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async saveMany(trips: readonly EnrichedTaxiTrip[]): Promise<number> {
    let saved = 0;
    for (const [i, t] of trips.entries()) {
      try {
        await this.db.query(
          `INSERT INTO analytics.processed_taxi_data
             (trip_duration_sec, trip_duration_min, distance_traveled_km, kph, wait_time_cost,
              distance_cost, total_fare_new, num_of_passengers, surge_applied, trip_category,
              price_category, time_of_day, efficiency_score, confidence, classification_source,
              insights, processed_at)
           VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17)`,
          [
            t.tripDurationSec,
            t.tripDurationMin,
            t.distanceKm,
            t.kph,
            t.waitTimeCost,
            t.distanceCost,
            t.totalFare,
            t.numPassengers,
            t.surgeApplied,
            t.tripCategory,
            t.priceCategory,
            t.timeOfDay,
            t.efficiencyScore,
            t.confidence,
            t.classificationSource,
            JSON.stringify(t.insights),
            t.processedAt,
          ],
        );
        saved += 1;
      } catch (err) {
        console.error(`[taxi-repo] failed to save trip #${i}`, err instanceof Error ? err.message : err);
      }
    }
    return saved;
  }

  async list(filters: TaxiTripListFilters): Promise<StoredTaxiTrip[]> {
    const params: unknown[] = [];
    let sql = 'SELECT * FROM analytics.processed_taxi_data';
    if (filters.tripCategory) {
      params.push(filters.tripCategory);
      sql += ` WHERE trip_category = $${params.length}`;
    }
    params.push(filters.limit);
    sql += ` ORDER BY id LIMIT $${params.length}`;
    const { rows } = await this.db.query(sql, params);
    return rows.map(mapTaxiRow);
  }

  async listAll(): Promise<StoredTaxiTrip[]> {
    const { rows } = await this.db.query('SELECT * FROM analytics.processed_taxi_data ORDER BY id');
    return rows.map(mapTaxiRow);
  }
}

function mapTaxiRow(row: Record<string, unknown>): StoredTaxiTrip {
  return {
    rowId: toNumber(row['id']),
    tripDurationSec: toNumber(row['trip_duration_sec']),
    tripDurationMin: toNumber(row['trip_duration_min']),
    distanceKm: toNumber(row['distance_traveled_km']),
    kph: toNumber(row['kph']),
    waitTimeCost: toNumber(row['wait_time_cost']),
    distanceCost: toNumber(row['distance_cost']),
    totalFare: toNumber(row['total_fare_new']),
    numPassengers: toNumber(row['num_of_passengers']),
    surgeApplied: row['surge_applied'] === true,
    tripCategory: toLabel(row['trip_category'], TRIP_CATEGORIES),
    priceCategory: toLabel(row['price_category'], PRICE_CATEGORIES),
    timeOfDay: toLabel(row['time_of_day'], TIMES_OF_DAY),
    efficiencyScore: toNullableNumber(row['efficiency_score']),
    confidence: toNullableNumber(row['confidence']),
    classificationSource: row['classification_source'] === 'rules' ? 'rules' : 'oracle',
    insights: toInsight(row['insights']),
    processedAt: toDate(row['processed_at']),
  };
}
