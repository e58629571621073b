import type { EnrichmentFields } from './enrichment.js';

export type TripCategory = 'Short' | 'Medium' | 'Long';

export type PriceCategory = 'Low' | 'Medium' | 'High' | 'Premium' | 'Unknown';

export type TimeOfDay = 'Morning' | 'Afternoon' | 'Evening' | 'Night';

export const TRIP_CATEGORIES: readonly TripCategory[] = ['Short', 'Medium', 'Long'];
export const PRICE_CATEGORIES: readonly PriceCategory[] = ['Low', 'Medium', 'High', 'Premium', 'Unknown'];

export interface RawTaxiTrip {
  readonly tripDurationSec: number;
  readonly tripDurationMin: number;
  readonly distanceKm: number;
  readonly kph: number;
  readonly waitTimeCost: number;
  readonly distanceCost: number;
  /** USD */
  readonly totalFare: number;
  readonly numPassengers: number;
  readonly surgeApplied: boolean;
}

export interface EnrichedTaxiTrip extends RawTaxiTrip, EnrichmentFields {
  readonly tripCategory: TripCategory | null;
  readonly priceCategory: PriceCategory | null;
  /** In [0, 1]. */
  readonly efficiencyScore: number | null;
  /** Part of the stored schema; nothing derives it yet. */
  readonly timeOfDay: TimeOfDay | null;
}

export interface StoredTaxiTrip extends EnrichedTaxiTrip {
  readonly rowId: number;
}
