export type MetricKind = 'GPS' | 'TAXI' | 'CALCULATED';

export type MetricName =
  | 'gps_points_count'
  | 'avg_speed_mps'
  | 'avg_speed_kmh'
  | 'taxi_trips_count'
  | 'avg_fare_usd'
  | 'avg_fare_tenge'
  | 'avg_trip_duration_min'
  | 'avg_distance_km'
  | 'surge_percentage'
  | 'price_per_km_tenge';

export interface MetricValue {
  readonly value: number;
  readonly kind: MetricKind;
  readonly description: string;
}

/** Recomputed wholesale on every aggregation run. */
export type AggregateMetrics = Record<MetricName, MetricValue>;

export interface StoredMetric extends MetricValue {
  readonly calculatedAt: Date;
}
