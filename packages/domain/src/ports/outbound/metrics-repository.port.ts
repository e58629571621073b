import type { AggregateMetrics, StoredMetric } from '../../entities/analytics-metric.js';

export interface MetricsRepositoryPort {
  /** Replaces the stored value of every metric present in `metrics`. */
  saveAll(metrics: AggregateMetrics): Promise<number>;
  getAll(): Promise<Record<string, StoredMetric>>;
}
