import type { EnrichedTaxiTrip, StoredTaxiTrip, TripCategory } from '../../entities/taxi-trip.js';

export interface TaxiTripListFilters {
  limit: number;
  tripCategory?: TripCategory;
}

export interface TaxiTripRepositoryPort {
  /** Writes each trip independently; returns how many were stored. */
  saveMany(trips: readonly EnrichedTaxiTrip[]): Promise<number>;
  list(filters: TaxiTripListFilters): Promise<StoredTaxiTrip[]>;
  listAll(): Promise<StoredTaxiTrip[]>;
}
