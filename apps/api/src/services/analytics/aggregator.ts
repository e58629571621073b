import type {
  AggregateMetrics,
  AnalyticsUseCasePort,
  GpsPointRepositoryPort,
  RawGpsPoint,
  RawTaxiTrip,
  TaxiTripRepositoryPort,
} from '@taxi-analytics/domain';

/** Fixed USD → KZT conversion rate. */
export const USD_TO_TENGE = 541;
export const MPS_TO_KMH = 3.6;

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

/** Every metric over an empty set is 0. */
export function summarizeCorpus(
  points: readonly RawGpsPoint[],
  trips: readonly RawTaxiTrip[],
): AggregateMetrics {
  const avgSpeedMps = mean(points.filter((p) => p.spd > 0).map((p) => p.spd));
  const avgFareUsd = mean(trips.map((t) => t.totalFare));
  const avgFareTenge = avgFareUsd * USD_TO_TENGE;
  const avgDistanceKm = mean(trips.map((t) => t.distanceKm));
  const surgeTrips = trips.filter((t) => t.surgeApplied).length;

  return {
    gps_points_count: {
      value: points.length,
      kind: 'GPS',
      description: 'Number of processed GPS points',
    },
    avg_speed_mps: {
      value: avgSpeedMps,
      kind: 'GPS',
      description: 'Average speed of moving GPS points, m/s',
    },
    avg_speed_kmh: {
      value: avgSpeedMps * MPS_TO_KMH,
      kind: 'CALCULATED',
      description: 'Average speed of moving GPS points, km/h',
    },
    taxi_trips_count: {
      value: trips.length,
      kind: 'TAXI',
      description: 'Number of processed taxi trips',
    },
    avg_fare_usd: {
      value: avgFareUsd,
      kind: 'TAXI',
      description: 'Average trip fare, USD',
    },
    avg_fare_tenge: {
      value: avgFareTenge,
      kind: 'CALCULATED',
      description: `Average trip fare, KZT (1 USD = ${USD_TO_TENGE} KZT)`,
    },
    avg_trip_duration_min: {
      value: mean(trips.map((t) => t.tripDurationMin)),
      kind: 'TAXI',
      description: 'Average trip duration, minutes',
    },
    avg_distance_km: {
      value: avgDistanceKm,
      kind: 'TAXI',
      description: 'Average trip distance, km',
    },
    surge_percentage: {
      value: ratio(surgeTrips, trips.length) * 100,
      kind: 'CALCULATED',
      description: 'Share of trips with surge pricing, %',
    },
    price_per_km_tenge: {
      value: ratio(avgFareTenge, avgDistanceKm),
      kind: 'CALCULATED',
      description: 'Average fare per average kilometre, KZT',
    },
  };
}

/** Recomputes all metrics from the persisted corpus on every call. */
export class Aggregator implements AnalyticsUseCasePort {
  constructor(
    private readonly gpsRepo: GpsPointRepositoryPort,
    private readonly taxiRepo: TaxiTripRepositoryPort,
  ) {}

  async computeAggregates(): Promise<AggregateMetrics> {
    const points = await this.gpsRepo.listAll();
    const trips = await this.taxiRepo.listAll();
    return summarizeCorpus(points, trips);
  }
}
