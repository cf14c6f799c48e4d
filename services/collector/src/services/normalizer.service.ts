import { MalformedRecordError } from '../errors.js';
import { logger } from '../logger.js';
import { isAligned } from '../utils/timeframes.js';
import type { Candle, RawBar, SeriesKey } from '../types/domain.js';

export type NormalizeContext = {
  series: SeriesKey;
  durationMs: number;
  fetchedAt: number;
};

export type NormalizeResult =
  | { ok: true; candle: Candle }
  | { ok: false; error: MalformedRecordError };

const PRICE_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

function reject(message: string): NormalizeResult {
  return { ok: false, error: new MalformedRecordError(message) };
}

function finite(v: number | undefined): v is number {
  return v !== undefined && Number.isFinite(v);
}

export function normalizeBar(raw: RawBar, ctx: NormalizeContext): NormalizeResult {
  const { openTime, open, high, low, close, volume } = raw;
  if (!finite(openTime)) {
    return reject(`openTime is not a finite number (${String(openTime)})`);
  }
  if (!finite(open) || !finite(high) || !finite(low) || !finite(close) || !finite(volume)) {
    const field = PRICE_FIELDS.find((f) => !finite(raw[f])) ?? 'open';
    return reject(`${field} is not a finite number at ${openTime} (${String(raw[field])})`);
  }
  if (!isAligned(openTime, ctx.durationMs)) {
    return reject(`openTime ${openTime} is not aligned to a ${ctx.durationMs}ms grid`);
  }
  if (high < Math.max(open, close)) {
    return reject(`high ${high} below max(open, close) at ${openTime}`);
  }
  if (low > Math.min(open, close)) {
    return reject(`low ${low} above min(open, close) at ${openTime}`);
  }
  if (volume < 0) {
    return reject(`negative volume ${volume} at ${openTime}`);
  }

  return {
    ok: true,
    candle: {
      ...ctx.series,
      openTime,
      closeTime: openTime + ctx.durationMs,
      open,
      high,
      low,
      close,
      volume,
      fetchedAt: ctx.fetchedAt,
    },
  };
}

export type NormalizedBatch = { candles: Candle[]; rejected: number };

/**
 * Validates a page of bars. Rejected bars are logged and counted; the valid ones come
 * back sorted by openTime, one per openTime (the last occurrence wins).
 */
export function normalizeBatch(raws: readonly RawBar[], ctx: NormalizeContext, label: string): NormalizedBatch {
  const byOpenTime = new Map<number, Candle>();
  let rejected = 0;
  for (const raw of raws) {
    const res = normalizeBar(raw, ctx);
    if (res.ok) {
      byOpenTime.set(res.candle.openTime, res.candle);
    } else {
      rejected++;
      logger.warn({ series: label, reason: res.error.message }, '[normalizer] rejected bar');
    }
  }
  const candles = [...byOpenTime.values()].sort((a, b) => a.openTime - b.openTime);
  return { candles, rejected };
}
