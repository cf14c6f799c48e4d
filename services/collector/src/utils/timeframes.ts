import type { TimePeriod } from '../types/domain.js';

export type Timeframe =
  | '1m' | '3m' | '5m' | '15m' | '30m'
  | '1h' | '2h' | '4h' | '6h' | '8h' | '12h'
  | '1d';

// Weekly and monthly bars open on venue-specific calendar boundaries, not on a
// fixed grid since epoch, so they are left out.
const TIMEFRAME_BY_MINUTES: ReadonlyMap<number, Timeframe> = new Map([
  [1, '1m'],
  [3, '3m'],
  [5, '5m'],
  [15, '15m'],
  [30, '30m'],
  [60, '1h'],
  [120, '2h'],
  [240, '4h'],
  [360, '6h'],
  [480, '8h'],
  [720, '12h'],
  [1440, '1d'],
]);

export type ResolvedPeriod = TimePeriod & { timeframe: Timeframe; durationMs: number };

export function timeframeForMinutes(minutes: number): Timeframe | null {
  return TIMEFRAME_BY_MINUTES.get(minutes) ?? null;
}

export function resolvePeriod(period: TimePeriod): ResolvedPeriod | null {
  const timeframe = timeframeForMinutes(period.minutes);
  if (!timeframe) return null;
  return { ...period, timeframe, durationMs: period.minutes * 60_000 };
}

export function ceilToPeriod(epochMs: number, durationMs: number): number {
  return Math.ceil(epochMs / durationMs) * durationMs;
}

export function isAligned(epochMs: number, durationMs: number): boolean {
  return epochMs % durationMs === 0;
}
