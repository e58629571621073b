import {
  ACTIVITY_LABELS,
  AREA_LABELS,
  type EnrichedGpsPoint,
  type GpsPointListFilters,
  type GpsPointRepositoryPort,
  type HeatmapCell,
  type HeatmapKind,
  type StoredGpsPoint,
} from '@taxi-analytics/domain';
import { getPool, type Queryable } from './pool.js';
import {
  toDate,
  toInsight,
  toLabel,
  toNullableNumber,
  toNumber,
  toText,
} from './row-mapping.js';

const HEATMAP_SQL: Record<HeatmapKind, string> = {
  density: 'SELECT lat, lng, spd AS weight FROM analytics.processed_gps_data ORDER BY id',
  speed: 'SELECT lat, lng, spd AS weight FROM analytics.processed_gps_data WHERE spd > 0 ORDER BY id',
  altitude: 'SELECT lat, lng, alt AS weight FROM analytics.processed_gps_data WHERE alt > 0 ORDER BY id',
};

export class PgGpsPointRepository implements GpsPointRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async saveMany(points: readonly EnrichedGpsPoint[]): Promise<number> {
    let saved = 0;
    for (const p of points) {
      try {
        await this.db.query(
          `INSERT INTO analytics.processed_gps_data
             (original_id, lat, lng, alt, spd, azm, area_classification, activity_level,
              road_type, confidence, classification_source, insights, processed_at)
           VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13)`,
          [
            p.id,
            p.lat,
            p.lng,
            p.alt,
            p.spd,
            p.azm,
            p.areaLabel,
            p.activityLabel,
            p.roadType,
            p.confidence,
            p.classificationSource,
            JSON.stringify(p.insights),
            p.processedAt,
          ],
        );
        saved += 1;
      } catch (err) {
        console.error(`[gps-repo] failed to save point ${p.id}`, err instanceof Error ? err.message : err);
      }
    }
    return saved;
  }

  async list(filters: GpsPointListFilters): Promise<StoredGpsPoint[]> {
    const params: unknown[] = [];
    let sql = 'SELECT * FROM analytics.processed_gps_data';
    if (filters.area) {
      params.push(filters.area);
      sql += ` WHERE area_classification = $${params.length}`;
    }
    params.push(filters.limit);
    sql += ` ORDER BY id LIMIT $${params.length}`;
    const { rows } = await this.db.query(sql, params);
    return rows.map(mapGpsRow);
  }

  async listAll(): Promise<StoredGpsPoint[]> {
    const { rows } = await this.db.query('SELECT * FROM analytics.processed_gps_data ORDER BY id');
    return rows.map(mapGpsRow);
  }

  async heatmap(kind: HeatmapKind): Promise<HeatmapCell[]> {
    const { rows } = await this.db.query(HEATMAP_SQL[kind]);
    return rows.map((row): HeatmapCell => [toNumber(row['lat']), toNumber(row['lng']), toNumber(row['weight'])]);
  }
}

function mapGpsRow(row: Record<string, unknown>): StoredGpsPoint {
  return {
    rowId: toNumber(row['id']),
    id: toText(row['original_id']),
    lat: toNumber(row['lat']),
    lng: toNumber(row['lng']),
    alt: toNumber(row['alt']),
    spd: toNumber(row['spd']),
    azm: toNumber(row['azm']),
    areaLabel: toLabel(row['area_classification'], AREA_LABELS),
    activityLabel: toLabel(row['activity_level'], ACTIVITY_LABELS),
    roadType: row['road_type'] == null ? null : toText(row['road_type']),
    confidence: toNullableNumber(row['confidence']),
    classificationSource: row['classification_source'] === 'rules' ? 'rules' : 'oracle',
    insights: toInsight(row['insights']),
    processedAt: toDate(row['processed_at']),
  };
}
