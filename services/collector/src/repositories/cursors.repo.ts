import type { SeriesKey } from '../types/domain.js';

/** High-water mark per series: open time of the last candle the walker persisted. */
export interface CursorStore {
  get(series: SeriesKey): Promise<number | null>;
  set(series: SeriesKey, openTime: number): Promise<void>;
}

// the two ioredis commands the cursor store needs
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export function cursorKey(prefix: string, s: SeriesKey): string {
  return `${prefix}:${s.exchangeId}:${s.pairId}:${s.periodId}`;
}

export class MemoryCursorStore implements CursorStore {
  private readonly cursors = new Map<string, number>();

  async get(series: SeriesKey): Promise<number | null> {
    return this.cursors.get(cursorKey('mem', series)) ?? null;
  }

  async set(series: SeriesKey, openTime: number): Promise<void> {
    this.cursors.set(cursorKey('mem', series), openTime);
  }
}

export class RedisCursorStore implements CursorStore {
  constructor(
    private readonly redis: KeyValueClient,
    private readonly prefix: string
  ) {}

  async get(series: SeriesKey): Promise<number | null> {
    const raw = await this.redis.get(cursorKey(this.prefix, series));
    if (raw === null) return null;
    const n = Number(raw);
    return Number.isSafeInteger(n) ? n : null;
  }

  async set(series: SeriesKey, openTime: number): Promise<void> {
    await this.redis.set(cursorKey(this.prefix, series), String(openTime));
  }
}
