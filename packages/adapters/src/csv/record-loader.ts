import { parse } from 'csv-parse/sync';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { RawGpsPoint, RawTaxiTrip, RecordSourcePort } from '@taxi-analytics/domain';

const TRUE_VALUES = new Set(['true', '1', 'yes', 't', 'y']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'f', 'n', '']);

const csvBoolean = z.string().transform((raw, ctx) => {
  const v = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(v)) return true;
  if (FALSE_VALUES.has(v)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a boolean: "${raw}"` });
  return z.NEVER;
});

const csvNumber = z.string().trim().min(1, 'empty value').pipe(z.coerce.number().finite());

const gpsRowSchema = z.object({
  randomized_id: z.string().optional(),
  lat: csvNumber,
  lng: csvNumber,
  alt: csvNumber,
  spd: csvNumber,
  azm: csvNumber,
});

const taxiRowSchema = z.object({
  trip_duration_sec: csvNumber.pipe(z.number().int()),
  trip_duration_min: csvNumber,
  distance_traveled_Km: csvNumber,
  KPH: csvNumber,
  wait_time_cost: csvNumber,
  distance_cost: csvNumber,
  total_fare_new: csvNumber,
  num_of_passengers: csvNumber.pipe(z.number().int()),
  surge_applied: csvBoolean,
});

export class InvalidRecordError extends Error {
  constructor(
    readonly source: string,
    /** 1-based data row, not counting the header */
    readonly row: number,
    readonly issues: string[],
  ) {
    super(`${source} row ${row} is invalid: ${issues.join('; ')}`);
    this.name = 'InvalidRecordError';
  }
}

function parseRows<S extends z.ZodTypeAny>(
  content: string,
  schema: S,
  source: string,
): z.infer<S>[] {
  const rows: unknown = parse(content, {
    bom: true,
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!Array.isArray(rows)) return [];

  return rows.map((row: unknown, i) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new InvalidRecordError(
        source,
        i + 1,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    return result.data;
  });
}

/** Rows without `randomized_id` are identified by their position in the file. */
export function parseGpsCsv(content: string, source = 'gps'): RawGpsPoint[] {
  return parseRows(content, gpsRowSchema, source).map((row, i) => ({
    id: row.randomized_id || String(i),
    lat: row.lat,
    lng: row.lng,
    alt: row.alt,
    spd: row.spd,
    azm: row.azm,
  }));
}

export function parseTaxiCsv(content: string, source = 'taxi'): RawTaxiTrip[] {
  return parseRows(content, taxiRowSchema, source).map((row) => ({
    tripDurationSec: row.trip_duration_sec,
    tripDurationMin: row.trip_duration_min,
    distanceKm: row.distance_traveled_Km,
    kph: row.KPH,
    waitTimeCost: row.wait_time_cost,
    distanceCost: row.distance_cost,
    totalFare: row.total_fare_new,
    numPassengers: row.num_of_passengers,
    surgeApplied: row.surge_applied,
  }));
}

export interface CsvRecordSourceOptions {
  gpsPath: string;
  taxiPath: string;
}

/** Reads both CSV files in full on every call. */
export class CsvRecordSource implements RecordSourcePort {
  constructor(private readonly opts: CsvRecordSourceOptions) {}

  async loadGpsPoints(): Promise<RawGpsPoint[]> {
    const content = await readFile(this.opts.gpsPath, 'utf8');
    return parseGpsCsv(content, this.opts.gpsPath);
  }

  async loadTaxiTrips(): Promise<RawTaxiTrip[]> {
    const content = await readFile(this.opts.taxiPath, 'utf8');
    return parseTaxiCsv(content, this.opts.taxiPath);
  }
}
