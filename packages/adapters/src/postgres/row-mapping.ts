import type { Insight } from '@taxi-analytics/domain';

export function toNumber(value: unknown): number {
  if (value == null) return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function toNullableNumber(value: unknown): number | null {
  if (value == null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toText(value: unknown): string {
  return value == null ? '' : String(value);
}

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  return new Date(toText(value));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSONB comes back parsed: a string stays free text, an object stays structured. */
export function toInsight(value: unknown): Insight {
  if (typeof value === 'string') return value;
  if (isRecord(value)) return value;
  return '';
}

/** Narrow a stored label to its union, or `null` when absent or unrecognised. */
export function toLabel<T extends string>(value: unknown, allowed: readonly T[]): T | null {
  return allowed.find((label) => label === value) ?? null;
}
