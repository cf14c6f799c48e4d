import { PersistenceFailureError } from '../errors.js';
import type { CandleStore } from '../repositories/store.js';
import type { Candle, SeriesKey } from '../types/domain.js';

export type UpsertResult = { inserted: number; updated: number; unchanged: number };

export type ConflictAction = 'insert' | 'update' | 'keep';

/** A candle fetched at or after its close can no longer change. */
export function isFinal(c: Pick<Candle, 'closeTime' | 'fetchedAt'>): boolean {
  return c.fetchedAt >= c.closeTime;
}

export function resolveConflict(existing: Candle | undefined, incoming: Candle): ConflictAction {
  if (!existing) return 'insert';
  if (isFinal(existing)) return 'keep';
  return incoming.fetchedAt > existing.fetchedAt ? 'update' : 'keep';
}

export function seriesOf(c: SeriesKey): SeriesKey {
  return { exchangeId: c.exchangeId, pairId: c.pairId, periodId: c.periodId };
}

export function seriesLabel(s: SeriesKey): string {
  return `${s.exchangeId}:${s.pairId}:${s.periodId}`;
}

function sameSeries(a: SeriesKey, b: SeriesKey): boolean {
  return a.exchangeId === b.exchangeId && a.pairId === b.pairId && a.periodId === b.periodId;
}

/**
 * Writes one series' candles in a single transaction.
 *
 * Missing keys are inserted; existing rows follow `resolveConflict`. A key another writer
 * inserted after the lookup is read again, now locked, and resolved like any existing row.
 * Applying the same batch twice changes nothing the second time. Any store failure rolls
 * the batch back and surfaces as PersistenceFailureError.
 */
export async function upsertCandles(store: CandleStore, batch: readonly Candle[]): Promise<UpsertResult> {
  const first = batch[0];
  if (!first) return { inserted: 0, updated: 0, unchanged: 0 };
  const series = seriesOf(first);
  if (!batch.every((c) => sameSeries(c, series))) {
    throw new Error(`upsert batch spans several series (first is ${seriesLabel(series)})`);
  }

  // one row per openTime: the freshest fetch wins
  const incoming = new Map<number, Candle>();
  for (const c of batch) {
    const prev = incoming.get(c.openTime);
    if (!prev || c.fetchedAt >= prev.fetchedAt) incoming.set(c.openTime, c);
  }

  try {
    return await store.withSeriesTransaction(series, async (tx) => {
      const existing = new Map<number, Candle>();
      for (const row of await tx.findExisting([...incoming.keys()])) existing.set(row.openTime, row);

      const toInsert: Candle[] = [];
      const toUpdate: Candle[] = [];
      let unchanged = 0;
      for (const c of incoming.values()) {
        switch (resolveConflict(existing.get(c.openTime), c)) {
          case 'insert':
            toInsert.push(c);
            break;
          case 'update':
            toUpdate.push(c);
            break;
          case 'keep':
            unchanged++;
            break;
        }
      }

      const written = new Set(toInsert.length ? await tx.insert(toInsert) : []);
      const lost = toInsert.filter((c) => !written.has(c.openTime));
      if (lost.length) {
        const raced = new Map<number, Candle>();
        for (const row of await tx.findExisting(lost.map((c) => c.openTime))) raced.set(row.openTime, row);
        for (const c of lost) {
          if (resolveConflict(raced.get(c.openTime), c) === 'update') toUpdate.push(c);
          else unchanged++;
        }
      }

      const updated = toUpdate.length ? await tx.update(toUpdate) : 0;
      unchanged += toUpdate.length - updated;
      return { inserted: written.size, updated, unchanged };
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PersistenceFailureError(`upsert ${seriesLabel(series)} failed: ${message}`, { cause: err });
  }
}
