import {
  UNKNOWN_ROAD_TYPE,
  calculateEfficiency,
  classifyActivity,
  classifyArea,
  classifyPrice,
  classifyTripLength,
} from '@taxi-analytics/domain';
import type {
  AiCompletionResult,
  AiInferencePort,
  AiMessage,
  EnrichedGpsPoint,
  EnrichedTaxiTrip,
  EnrichmentUseCasePort,
  OracleOutcome,
  RawGpsPoint,
  RawTaxiTrip,
} from '@taxi-analytics/domain';
import { buildGpsMessages, buildTripMessages, gpsContext, tripContext } from './prompts.js';
import {
  parseOracleResponse,
  readGpsClassification,
  readTripClassification,
  type OracleResponse,
} from './oracle-response-parser.js';

const log = {
  info: (msg: string) => console.log(`[enrichment] ${msg}`),
  warn: (msg: string) => console.warn(`[enrichment] ${msg}`),
  error: (msg: string) => console.error(`[enrichment] ${msg}`),
};

export interface EnrichmentEngineOptions {
  /** Oracle calls per record before falling back to the rules. Default 1. */
  maxAttempts?: number;
  /** Per-call timeout; 0 (default) waits indefinitely. */
  timeoutMs?: number;
  now?: () => Date;
}

export class OracleTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`oracle did not answer within ${timeoutMs} ms`);
    this.name = 'OracleTimeoutError';
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Labels raw GPS points and taxi trips, one oracle request per record.
 *
 * A record whose oracle call fails (after `maxAttempts`) is labelled by the
 * deterministic classifier rules instead. Every input record yields exactly
 * one output record, in input order. Records are processed strictly one
 * after another and nothing is cached.
 */
export class EnrichmentEngine implements EnrichmentUseCasePort {
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly oracle: AiInferencePort,
    opts: EnrichmentEngineOptions = {},
  ) {
    this.maxAttempts = Math.max(1, Math.floor(opts.maxAttempts ?? 1));
    this.timeoutMs = Math.max(0, opts.timeoutMs ?? 0);
    this.now = opts.now ?? (() => new Date());
  }

  async enrichGps(batch: readonly RawGpsPoint[]): Promise<EnrichedGpsPoint[]> {
    const out: EnrichedGpsPoint[] = [];
    for (const [index, point] of batch.entries()) {
      out.push(await this.enrichGpsPoint(point, index));
    }
    return out;
  }

  async enrichTrips(batch: readonly RawTaxiTrip[]): Promise<EnrichedTaxiTrip[]> {
    const out: EnrichedTaxiTrip[] = [];
    for (const [index, trip] of batch.entries()) {
      out.push(await this.enrichTrip(trip, index));
    }
    return out;
  }

  private async enrichGpsPoint(point: RawGpsPoint, index: number): Promise<EnrichedGpsPoint> {
    const outcome = await this.consult(
      buildGpsMessages(point, gpsContext(index, point)),
      `GPS point ${point.id}`,
    );
    const processedAt = this.now();

    if (outcome.kind === 'fallback') {
      return {
        ...point,
        areaLabel: classifyArea(point.lat),
        activityLabel: classifyActivity(point.spd),
        roadType: UNKNOWN_ROAD_TYPE,
        insights: `Error processing: ${outcome.reason}`,
        confidence: null,
        classificationSource: 'rules',
        processedAt,
      };
    }

    return {
      ...readGpsClassification(outcome.result),
      ...point,
      classificationSource: 'oracle',
      processedAt,
    };
  }

  private async enrichTrip(trip: RawTaxiTrip, index: number): Promise<EnrichedTaxiTrip> {
    const outcome = await this.consult(
      buildTripMessages(trip, tripContext(index, trip)),
      `taxi trip ${index}`,
    );
    const processedAt = this.now();

    if (outcome.kind === 'fallback') {
      return {
        ...trip,
        tripCategory: classifyTripLength(trip.tripDurationMin),
        priceCategory: classifyPrice(trip.totalFare, trip.distanceKm),
        efficiencyScore: calculateEfficiency(trip.kph, trip.tripDurationMin),
        timeOfDay: null,
        insights: `Error processing: ${outcome.reason}`,
        confidence: null,
        classificationSource: 'rules',
        processedAt,
      };
    }

    return {
      ...readTripClassification(outcome.result),
      ...trip,
      timeOfDay: null,
      classificationSource: 'oracle',
      processedAt,
    };
  }

  /** Transport-level failures become a `fallback` outcome; nothing is rethrown. */
  private async consult(messages: AiMessage[], label: string): Promise<OracleOutcome<OracleResponse>> {
    let reason = 'oracle was not called';
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const completion = await this.complete(messages);
        return { kind: 'classified', result: parseOracleResponse(completion.content, this.now()) };
      } catch (err) {
        reason = errorMessage(err);
        log.warn(`${label}: oracle attempt ${attempt}/${this.maxAttempts} failed: ${reason}`);
      }
    }
    log.error(`${label}: falling back to rule-based classification`);
    return { kind: 'fallback', reason };
  }

  private async complete(messages: AiMessage[]): Promise<AiCompletionResult> {
    const request = (signal?: AbortSignal) => this.oracle.generateCompletion(messages, { signal });

    if (this.timeoutMs === 0) return request();

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new OracleTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([request(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
