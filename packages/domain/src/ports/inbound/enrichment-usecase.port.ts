// ---------------------------------------------------------------------------
// Enrichment & Analytics Use-Case Ports (inbound)
// ---------------------------------------------------------------------------

import type { EnrichedGpsPoint, RawGpsPoint } from '../../entities/gps-point.js';
import type { EnrichedTaxiTrip, RawTaxiTrip } from '../../entities/taxi-trip.js';
import type { AggregateMetrics } from '../../entities/analytics-metric.js';
import type { ProcessingStatus } from '../../entities/processing-status.js';

export interface EnrichmentUseCasePort {
  enrichGps(batch: readonly RawGpsPoint[]): Promise<EnrichedGpsPoint[]>;
  enrichTrips(batch: readonly RawTaxiTrip[]): Promise<EnrichedTaxiTrip[]>;
}

export interface AnalyticsUseCasePort {
  computeAggregates(): Promise<AggregateMetrics>;
}

export interface ProcessingUseCasePort {
  run(status: ProcessingStatus): Promise<void>;
}
