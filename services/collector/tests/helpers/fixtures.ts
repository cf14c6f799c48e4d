import type { CurrencyPair, ExchangeRecord, RawBar, TimePeriod } from '../../src/types/domain.js';
import { resolvePeriod, type ResolvedPeriod } from '../../src/utils/timeframes.js';

export const HOUR = 3_600_000;
export const T0 = Date.parse('2024-01-01T00:00:00Z');

export function exchange(id: number, code: string, over: Partial<ExchangeRecord> = {}): ExchangeRecord {
  return {
    id,
    code,
    name: code.toUpperCase(),
    environment: 'production',
    active: true,
    rateLimit: { requestsPerSecond: 1000, maxConcurrent: 4 },
    credentials: {},
    ...over,
  };
}

export function pair(id: number, base: string, quote: string, exchangeId: number | null = null): CurrencyPair {
  return { id, exchangeId, base, quote, symbol: `${base}/${quote}` };
}

export const PERIOD_1H: TimePeriod = { id: 5, name: '1h', minutes: 60 };
export const PERIOD_1W: TimePeriod = { id: 9, name: '1w', minutes: 10080 };

export function resolved(p: TimePeriod): ResolvedPeriod {
  const r = resolvePeriod(p);
  if (!r) throw new Error(`unsupported test period ${p.name}`);
  return r;
}

export function bar(openTime: number, o = 100, h = 110, l = 95, c = 105, v = 10): RawBar {
  return { openTime, open: o, high: h, low: l, close: c, volume: v };
}

/** Consecutive valid bars starting at `from`. */
export function bars(from: number, count: number, stepMs = HOUR): RawBar[] {
  return Array.from({ length: count }, (_, i) => bar(from + i * stepMs));
}
