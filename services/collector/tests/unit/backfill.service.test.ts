import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCursorStore } from '../../src/repositories/cursors.repo.js';
import { BackfillWalker, type WalkUnit } from '../../src/services/backfill.service.js';
import type { RawBar } from '../../src/types/domain.js';
import { bar, bars, HOUR, pair, PERIOD_1H, resolved, T0 } from '../helpers/fixtures.js';
import { FakeAdapter } from '../helpers/fake-adapter.js';
import { MemoryCandleStore } from '../helpers/memory-store.js';

const series = { exchangeId: 1, pairId: 1, periodId: PERIOD_1H.id };
const unit: WalkUnit = {
  series,
  pair: pair(1, 'BTC', 'USDT'),
  period: resolved(PERIOD_1H),
  label: 'binance BTC/USDT 1h',
};
const FAR = Number.MAX_SAFE_INTEGER;

describe('backfill.service', () => {
  let store: MemoryCandleStore;
  let cursors: MemoryCursorStore;
  let history: RawBar[];
  let adapter: FakeAdapter;
  let now: number;

  function walker(pageSize = 4) {
    return new BackfillWalker({ store, cursors, historyStart: T0, pageSize, now: () => now });
  }

  beforeEach(() => {
    store = new MemoryCandleStore();
    cursors = new MemoryCursorStore();
    now = T0 + 10 * HOUR;
    history = bars(T0, 10); // T0 .. T0+9h
    adapter = new FakeAdapter(1, 'binance', () => history);
  });

  it('walks from the history start to the present page by page', async () => {
    const out = await walker(4).walk(unit, adapter, { deadline: FAR });

    expect(out).toMatchObject({ state: 'done', pages: 3, inserted: 10, rejected: 0, cursor: T0 + 9 * HOUR });
    expect(adapter.calls.map((c) => c.since)).toEqual([T0, T0 + 4 * HOUR, T0 + 8 * HOUR]);
    expect(store.rows(series)).toHaveLength(10);
    expect(await cursors.get(series)).toBe(T0 + 9 * HOUR);
  });

  it('resumes after the stored high-water mark', async () => {
    await cursors.set(series, T0 + HOUR);

    const out = await walker(100).walk(unit, adapter, { deadline: FAR });

    expect(adapter.calls[0]?.since).toBe(T0 + 2 * HOUR);
    expect(out.inserted).toBe(8);
    expect(store.rows(series)[0]?.openTime).toBe(T0 + 2 * HOUR);
  });

  it('falls back to the contiguous stored run when no cursor exists', async () => {
    const c = (t: number) => ({ ...series, openTime: t, closeTime: t + HOUR, open: 1, high: 1, low: 1, close: 1, volume: 1, fetchedAt: t + HOUR });
    // T0, T0+1h stored, gap at T0+2h, T0+9h stored by a current run
    store.seed([c(T0), c(T0 + HOUR), c(T0 + 9 * HOUR)]);

    await walker(100).walk(unit, adapter, { deadline: FAR });

    expect(adapter.calls[0]?.since).toBe(T0 + 2 * HOUR);
  });

  it('is done on an empty page and leaves the cursor alone', async () => {
    history = [];
    const out = await walker().walk(unit, adapter, { deadline: FAR });

    expect(out).toMatchObject({ state: 'done', pages: 1, inserted: 0, cursor: null });
    expect(await cursors.get(series)).toBeNull();
  });

  it('does not fetch when the high-water mark already reaches the present', async () => {
    await cursors.set(series, T0 + 9 * HOUR);
    const out = await walker().walk(unit, adapter, { deadline: FAR });

    expect(out.state).toBe('done');
    expect(adapter.calls).toHaveLength(0);
  });

  it('suspends between pages once the deadline has passed', async () => {
    let clock = now;
    const w = new BackfillWalker({ store, cursors, historyStart: T0, pageSize: 4, now: () => clock });
    adapter = new FakeAdapter(1, 'binance', () => {
      clock += 1000;
      return history;
    });

    const out = await w.walk(unit, adapter, { deadline: now + 500 });

    expect(out).toMatchObject({ state: 'suspended', pages: 1, inserted: 4, cursor: T0 + 3 * HOUR });
    expect(await cursors.get(series)).toBe(T0 + 3 * HOUR);
  });

  it('fails on an adapter error and keeps the last committed cursor', async () => {
    adapter.failAfterCalls = 1;
    const out = await walker(4).walk(unit, adapter, { deadline: FAR });

    expect(out.state).toBe('failed');
    expect(out.error).toBeInstanceOf(Error);
    expect(out.inserted).toBe(4);
    expect(await cursors.get(series)).toBe(T0 + 3 * HOUR);
  });

  it('fails when a full page has no valid candle', async () => {
    history = Array.from({ length: 4 }, (_, i) => bar(T0 + i * HOUR, 100, 90, 95, 105));
    const out = await walker(4).walk(unit, adapter, { deadline: FAR });

    expect(out.state).toBe('failed');
    expect(out.rejected).toBe(4);
    expect(out.error).toMatchObject({ code: 'MALFORMED_RECORD' });
  });

  it('skips invalid bars but still advances on the valid ones', async () => {
    history = [bar(T0), bar(T0 + HOUR, 100, 90, 95, 105), bar(T0 + 2 * HOUR)];
    const out = await walker(10).walk(unit, adapter, { deadline: FAR });

    expect(out).toMatchObject({ state: 'done', inserted: 2, rejected: 1, cursor: T0 + 2 * HOUR });
  });

  it('stamps a page with the time its request went out', async () => {
    // the 00:00 candle closes while the request is in flight
    let clock = T0 + HOUR - 100;
    const w = new BackfillWalker({ store, cursors, historyStart: T0, pageSize: 4, now: () => clock });
    adapter = new FakeAdapter(1, 'binance', () => {
      clock += 300;
      return [bar(T0, 100, 110, 95, 105, 3)];
    });

    const out = await w.walk(unit, adapter, { deadline: FAR });

    expect(out).toMatchObject({ state: 'done', inserted: 1, cursor: null });
    expect(store.rows(series)[0]).toMatchObject({ volume: 3, fetchedAt: T0 + HOUR - 100 });
    expect(await cursors.get(series)).toBeNull();
  });

  it('moves the cursor only through closed candles and fetches the open one again', async () => {
    now = T0 + HOUR + 60_000; // 01:01
    history = [bar(T0), bar(T0 + HOUR, 100, 110, 95, 105, 1)];

    const first = await walker(4).walk(unit, adapter, { deadline: FAR });

    expect(first).toMatchObject({ state: 'done', inserted: 2, cursor: T0 });
    expect(await cursors.get(series)).toBe(T0);

    now = T0 + 26 * HOUR;
    history = [bar(T0), bar(T0 + HOUR, 100, 110, 95, 105, 50), bar(T0 + 2 * HOUR)];

    const second = await walker(4).walk(unit, adapter, { deadline: FAR });

    expect(adapter.calls.map((c) => c.since)).toEqual([T0, T0 + HOUR]);
    expect(second).toMatchObject({ state: 'done', inserted: 1, updated: 1, cursor: T0 + 2 * HOUR });
    expect(store.rows(series)[1]).toMatchObject({ openTime: T0 + HOUR, volume: 50, fetchedAt: T0 + 26 * HOUR });
  });

  it('stops the stored-run fallback at a partial row', async () => {
    const c = (t: number, fetchedAt: number) => ({ ...series, openTime: t, closeTime: t + HOUR, open: 1, high: 1, low: 1, close: 1, volume: 1, fetchedAt });
    store.seed([c(T0, T0 + HOUR), c(T0 + HOUR, T0 + HOUR + 1), c(T0 + 2 * HOUR, T0 + 3 * HOUR)]);

    await walker(100).walk(unit, adapter, { deadline: FAR });

    expect(adapter.calls[0]?.since).toBe(T0 + HOUR);
  });

  it('fails on a persistence error without moving the cursor', async () => {
    store.failNext('insert');
    const out = await walker(4).walk(unit, adapter, { deadline: FAR });

    expect(out.state).toBe('failed');
    expect(out.error).toMatchObject({ code: 'PERSISTENCE_FAILURE' });
    expect(await cursors.get(series)).toBeNull();
    expect(store.rows(series)).toEqual([]);
  });
});
