import type { EnrichmentFields } from './enrichment.js';

export type AreaLabel = 'North' | 'Center' | 'South';

export type ActivityLabel = 'High' | 'Medium' | 'Low';

export const AREA_LABELS: readonly AreaLabel[] = ['North', 'Center', 'South'];
export const ACTIVITY_LABELS: readonly ActivityLabel[] = ['High', 'Medium', 'Low'];

export interface RawGpsPoint {
  readonly id: string;
  readonly lat: number;
  readonly lng: number;
  readonly alt: number;
  /** metres per second */
  readonly spd: number;
  /** degrees */
  readonly azm: number;
}

export interface EnrichedGpsPoint extends RawGpsPoint, EnrichmentFields {
  readonly areaLabel: AreaLabel | null;
  readonly activityLabel: ActivityLabel | null;
  /** Highway / Street / Residential as reported by the oracle, `Unknown` under fallback. */
  readonly roadType: string | null;
}

/** A persisted enriched point; `rowId` is the database key. */
export interface StoredGpsPoint extends EnrichedGpsPoint {
  readonly rowId: number;
}

export type HeatmapKind = 'density' | 'speed' | 'altitude';

/** `[lat, lng, weight]` */
export type HeatmapCell = [number, number, number];
