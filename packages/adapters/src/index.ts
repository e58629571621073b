// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, applySchema } from './postgres/pool.js';
export type { DbQueryResult, Queryable } from './postgres/pool.js';
export { PgGpsPointRepository } from './postgres/gps-point.repository.js';
export { PgTaxiTripRepository } from './postgres/taxi-trip.repository.js';
export { PgMetricsRepository } from './postgres/metrics.repository.js';

// ─── CSV Record Source ────────────────────────────────────────────────────────
export {
  CsvRecordSource,
  InvalidRecordError,
  parseGpsCsv,
  parseTaxiCsv,
} from './csv/record-loader.js';
export type { CsvRecordSourceOptions } from './csv/record-loader.js';

// ─── AI Inference Adapters ────────────────────────────────────────────────────
export { OllamaAiInferenceAdapter } from './ollama/ollama-ai-inference.adapter.js';
export type { OllamaAdapterOptions } from './ollama/ollama-ai-inference.adapter.js';
export { LangChainAiInferenceAdapter } from './langchain/langchain-ai-inference.adapter.js';
