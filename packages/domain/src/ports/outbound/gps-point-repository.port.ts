import type {
  AreaLabel,
  EnrichedGpsPoint,
  HeatmapCell,
  HeatmapKind,
  StoredGpsPoint,
} from '../../entities/gps-point.js';

export interface GpsPointListFilters {
  limit: number;
  area?: AreaLabel;
}

export interface GpsPointRepositoryPort {
  /** Writes each point independently; returns how many were stored. */
  saveMany(points: readonly EnrichedGpsPoint[]): Promise<number>;
  list(filters: GpsPointListFilters): Promise<StoredGpsPoint[]>;
  listAll(): Promise<StoredGpsPoint[]>;
  heatmap(kind: HeatmapKind): Promise<HeatmapCell[]>;
}
