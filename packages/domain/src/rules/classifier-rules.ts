import type { AreaLabel, ActivityLabel } from '../entities/gps-point.js';
import type { TripCategory, PriceCategory } from '../entities/taxi-trip.js';

// Latitude bands around the city centre. Exact boundary values belong to Center.
export const NORTH_LAT_THRESHOLD = 51.12;
export const SOUTH_LAT_THRESHOLD = 51.08;

export const HIGH_ACTIVITY_MPS = 10;
export const MEDIUM_ACTIVITY_MPS = 3;

export const SHORT_TRIP_MAX_MIN = 10;
export const MEDIUM_TRIP_MAX_MIN = 30;

export const UNKNOWN_ROAD_TYPE = 'Unknown';

export function classifyArea(lat: number): AreaLabel {
  if (lat > NORTH_LAT_THRESHOLD) return 'North';
  if (lat < SOUTH_LAT_THRESHOLD) return 'South';
  return 'Center';
}

export function classifyActivity(spdMps: number): ActivityLabel {
  if (spdMps > HIGH_ACTIVITY_MPS) return 'High';
  if (spdMps > MEDIUM_ACTIVITY_MPS) return 'Medium';
  return 'Low';
}

export function classifyTripLength(durationMin: number): TripCategory {
  if (durationMin < SHORT_TRIP_MAX_MIN) return 'Short';
  if (durationMin < MEDIUM_TRIP_MAX_MIN) return 'Medium';
  return 'Long';
}

/** Tiers by fare per kilometre; no distance means no rate. */
export function classifyPrice(fare: number, distanceKm: number): PriceCategory {
  if (!(distanceKm > 0)) return 'Unknown';
  const perKm = fare / distanceKm;
  if (perKm < 2) return 'Low';
  if (perKm < 5) return 'Medium';
  if (perKm < 10) return 'High';
  return 'Premium';
}

function unitInterval(x: number): number {
  if (Number.isNaN(x)) return 0;
  return Math.min(Math.max(x, 0), 1);
}

/**
 * Mean of a speed score (60 km/h saturates) and a duration score that is full
 * up to 15 minutes and reaches zero at 45. Both halves are held to [0, 1].
 */
export function calculateEfficiency(kph: number, durationMin: number): number {
  const speedScore = unitInterval(kph / 60);
  const durationScore = unitInterval(1 - (durationMin - 15) / 30);
  return (speedScore + durationScore) / 2;
}
