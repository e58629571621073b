import { z } from 'zod';
import type {
  ActivityLabel,
  AreaLabel,
  Insight,
  PriceCategory,
  TripCategory,
} from '@taxi-analytics/domain';

/** Confidence attached to answers that came back as free text. */
export const FREE_TEXT_CONFIDENCE = 0.7;

export type OracleResponse = Record<string, unknown>;

const FENCED_JSON = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the oracle's reply as a JSON object. Anything else is kept verbatim
 * as the insight of a minimal wrapped result; this never throws.
 */
export function parseOracleResponse(text: string, now: Date): OracleResponse {
  const trimmed = text.trim();
  const body = FENCED_JSON.exec(trimmed)?.[1] ?? trimmed;
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) return parsed;
  } catch {
    // not JSON: wrapped below
  }
  return {
    insights: text,
    confidence: FREE_TEXT_CONFIDENCE,
    processed_at: now.toISOString(),
  };
}

function label<T extends string>(values: readonly [T, ...T[]]) {
  return z
    .preprocess(
      (v) => (typeof v === 'string' ? values.find((l) => l.toLowerCase() === v.trim().toLowerCase()) : v),
      z.enum(values),
    )
    .nullable()
    .catch(null);
}

const unitScore = z.coerce.number().min(0).max(1).nullable().catch(null);

const insight = z.union([z.string(), z.record(z.unknown())]).optional().catch(undefined);

const gpsFieldsSchema = z.object({
  area_classification: label<AreaLabel>(['North', 'Center', 'South']),
  activity_level: label<ActivityLabel>(['High', 'Medium', 'Low']),
  road_type: z.string().trim().min(1).nullable().catch(null),
  confidence: unitScore,
  insights: insight,
});

const tripFieldsSchema = z.object({
  trip_category: label<TripCategory>(['Short', 'Medium', 'Long']),
  price_category: label<PriceCategory>(['Low', 'Medium', 'High', 'Premium', 'Unknown']),
  efficiency_score: unitScore,
  confidence: unitScore,
  insights: insight,
});

export interface GpsClassification {
  areaLabel: AreaLabel | null;
  activityLabel: ActivityLabel | null;
  roadType: string | null;
  confidence: number | null;
  insights: Insight;
}

export interface TripClassification {
  tripCategory: TripCategory | null;
  priceCategory: PriceCategory | null;
  efficiencyScore: number | null;
  confidence: number | null;
  insights: Insight;
}

/** Fields the oracle left out or filled with an unknown label come back `null`. */
export function readGpsClassification(response: OracleResponse): GpsClassification {
  const f = gpsFieldsSchema.parse(response);
  return {
    areaLabel: f.area_classification,
    activityLabel: f.activity_level,
    roadType: f.road_type,
    confidence: f.confidence,
    insights: f.insights ?? response,
  };
}

export function readTripClassification(response: OracleResponse): TripClassification {
  const f = tripFieldsSchema.parse(response);
  return {
    tripCategory: f.trip_category,
    priceCategory: f.price_category,
    efficiencyScore: f.efficiency_score,
    confidence: f.confidence,
    insights: f.insights ?? response,
  };
}
