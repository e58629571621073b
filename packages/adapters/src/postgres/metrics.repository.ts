import type {
  AggregateMetrics,
  MetricKind,
  MetricsRepositoryPort,
  StoredMetric,
} from '@taxi-analytics/domain';
import { getPool, type Queryable } from './pool.js';
import { toDate, toLabel, toNumber, toText } from './row-mapping.js';

const METRIC_KINDS: readonly MetricKind[] = ['GPS', 'TAXI', 'CALCULATED'];

export class PgMetricsRepository implements MetricsRepositoryPort {
  constructor(private readonly db: Queryable = getPool()) {}

  async saveAll(metrics: AggregateMetrics): Promise<number> {
    const calculatedAt = new Date();
    let saved = 0;
    for (const [name, metric] of Object.entries(metrics)) {
      try {
        await this.db.query(
          `INSERT INTO analytics.metrics (metric_name, metric_value, metric_type, description, calculated_at)
           VALUES ($1,$2,$3,$4,$5)
           ON CONFLICT (metric_name) DO UPDATE SET
             metric_value = EXCLUDED.metric_value,
             metric_type = EXCLUDED.metric_type,
             description = EXCLUDED.description,
             calculated_at = EXCLUDED.calculated_at`,
          [name, metric.value, metric.kind, metric.description, calculatedAt],
        );
        saved += 1;
      } catch (err) {
        console.error(`[metrics-repo] failed to save metric ${name}`, err instanceof Error ? err.message : err);
      }
    }
    return saved;
  }

  async getAll(): Promise<Record<string, StoredMetric>> {
    const { rows } = await this.db.query('SELECT * FROM analytics.metrics ORDER BY metric_name');
    const out: Record<string, StoredMetric> = {};
    for (const row of rows) {
      out[toText(row['metric_name'])] = {
        value: toNumber(row['metric_value']),
        kind: toLabel(row['metric_type'], METRIC_KINDS) ?? 'CALCULATED',
        description: toText(row['description']),
        calculatedAt: toDate(row['calculated_at']),
      };
    }
    return out;
  }
}
