import type { RawGpsPoint } from '../../entities/gps-point.js';
import type { RawTaxiTrip } from '../../entities/taxi-trip.js';

/** Reads the raw input in full; every call starts again from the beginning. */
export interface RecordSourcePort {
  loadGpsPoints(): Promise<RawGpsPoint[]>;
  loadTaxiTrips(): Promise<RawTaxiTrip[]>;
}
