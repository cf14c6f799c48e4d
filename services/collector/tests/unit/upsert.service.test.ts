import { describe, it, expect, beforeEach } from 'vitest';
import { PersistenceFailureError } from '../../src/errors.js';
import { isFinal, resolveConflict, upsertCandles } from '../../src/services/upsert.service.js';
import type { Candle } from '../../src/types/domain.js';
import { HOUR, T0 } from '../helpers/fixtures.js';
import { MemoryCandleStore } from '../helpers/memory-store.js';

const series = { exchangeId: 1, pairId: 2, periodId: 5 };

function candle(openTime: number, fetchedAt: number, over: Partial<Candle> = {}): Candle {
  return {
    ...series,
    openTime,
    closeTime: openTime + HOUR,
    open: 100,
    high: 110,
    low: 95,
    close: 105,
    volume: 10,
    fetchedAt,
    ...over,
  };
}

describe('upsert.service', () => {
  let store: MemoryCandleStore;

  beforeEach(() => {
    store = new MemoryCandleStore();
  });

  it('treats a candle fetched at or after its close as final', () => {
    expect(isFinal(candle(T0, T0 + HOUR))).toBe(true);
    expect(isFinal(candle(T0, T0 + HOUR - 1))).toBe(false);
  });

  it('resolves conflicts: insert, keep final, overwrite newer partial', () => {
    const partial = candle(T0, T0 + 10_000);
    expect(resolveConflict(undefined, partial)).toBe('insert');
    expect(resolveConflict(candle(T0, T0 + HOUR), candle(T0, T0 + 2 * HOUR, { close: 1 }))).toBe('keep');
    expect(resolveConflict(partial, candle(T0, T0 + 20_000))).toBe('update');
    expect(resolveConflict(partial, candle(T0, T0 + 10_000))).toBe('keep');
    expect(resolveConflict(partial, candle(T0, T0 + 5_000))).toBe('keep');
  });

  it('inserts a fresh batch and is idempotent on replay', async () => {
    const batch = [candle(T0, T0 + 2 * HOUR), candle(T0 + HOUR, T0 + 2 * HOUR)];

    expect(await upsertCandles(store, batch)).toEqual({ inserted: 2, updated: 0, unchanged: 0 });
    const before = store.rows(series);

    expect(await upsertCandles(store, batch)).toEqual({ inserted: 0, updated: 0, unchanged: 2 });
    expect(store.rows(series)).toEqual(before);
  });

  it('never modifies a final candle', async () => {
    await upsertCandles(store, [candle(T0, T0 + HOUR)]);
    const res = await upsertCandles(store, [candle(T0, T0 + 3 * HOUR, { close: 99, low: 90 })]);

    expect(res).toEqual({ inserted: 0, updated: 0, unchanged: 1 });
    expect(store.rows(series)[0]).toMatchObject({ close: 105, low: 95, fetchedAt: T0 + HOUR });
  });

  it('overwrites a partial candle with a newer fetch', async () => {
    await upsertCandles(store, [candle(T0, T0 + 60_000, { close: 101, high: 101 })]);
    const res = await upsertCandles(store, [candle(T0, T0 + HOUR, { close: 105 })]);

    expect(res).toEqual({ inserted: 0, updated: 1, unchanged: 0 });
    expect(store.rows(series)).toEqual([candle(T0, T0 + HOUR)]);
  });

  it('replaces a partial row another writer inserted after the lookup with a newer fetch', async () => {
    store.raceNextInsert([candle(T0, T0 + 1_000, { volume: 3 })]);

    const res = await upsertCandles(store, [candle(T0, T0 + HOUR), candle(T0 + HOUR, T0 + 2 * HOUR)]);

    expect(res).toEqual({ inserted: 1, updated: 1, unchanged: 0 });
    expect(store.rows(series)).toEqual([candle(T0, T0 + HOUR), candle(T0 + HOUR, T0 + 2 * HOUR)]);
  });

  it('keeps a final row another writer inserted after the lookup', async () => {
    store.raceNextInsert([candle(T0, T0 + HOUR, { volume: 7 })]);

    const res = await upsertCandles(store, [candle(T0, T0 + 2 * HOUR)]);

    expect(res).toEqual({ inserted: 0, updated: 0, unchanged: 1 });
    expect(store.rows(series)[0]?.volume).toBe(7);
  });

  it('collapses duplicate open times within a batch to the freshest fetch', async () => {
    const res = await upsertCandles(store, [
      candle(T0, T0 + 2_000, { close: 104 }),
      candle(T0, T0 + 1_000, { close: 102 }),
    ]);
    expect(res).toEqual({ inserted: 1, updated: 0, unchanged: 0 });
    expect(store.rows(series)[0]?.close).toBe(104);
  });

  it('makes no store call for an empty batch', async () => {
    expect(await upsertCandles(store, [])).toEqual({ inserted: 0, updated: 0, unchanged: 0 });
    expect(store.transactions).toBe(0);
  });

  it('rejects a batch spanning several series before touching the store', async () => {
    await expect(
      upsertCandles(store, [candle(T0, T0 + HOUR), candle(T0, T0 + HOUR, { pairId: 3 })])
    ).rejects.toThrow('upsert batch spans several series (first is 1:2:5)');
    expect(store.transactions).toBe(0);
  });

  it('rolls back the whole batch on a write failure', async () => {
    store.failNext('insert');
    const err = await upsertCandles(store, [candle(T0, T0 + HOUR), candle(T0 + HOUR, T0 + 2 * HOUR)]).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(PersistenceFailureError);
    expect(err).toMatchObject({ code: 'PERSISTENCE_FAILURE', message: 'upsert 1:2:5 failed: db down' });
    expect(store.rows(series)).toEqual([]);
  });
});
