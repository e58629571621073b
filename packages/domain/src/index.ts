// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/enrichment.js';
export * from './entities/gps-point.js';
export * from './entities/taxi-trip.js';
export * from './entities/analytics-metric.js';
export * from './entities/processing-status.js';

// ─── Rules ────────────────────────────────────────────────────────────────────
export * from './rules/classifier-rules.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/enrichment-usecase.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/ai-inference.port.js';
export * from './ports/outbound/gps-point-repository.port.js';
export * from './ports/outbound/taxi-trip-repository.port.js';
export * from './ports/outbound/metrics-repository.port.js';
export * from './ports/outbound/record-source.port.js';
