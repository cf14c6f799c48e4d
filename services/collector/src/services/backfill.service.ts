import { MalformedRecordError } from '../errors.js';
import { logger } from '../logger.js';
import type { ExchangeAdapter } from '../exchanges/adapter.js';
import type { CursorStore } from '../repositories/cursors.repo.js';
import type { CandleStore } from '../repositories/store.js';
import { ceilToPeriod, type ResolvedPeriod } from '../utils/timeframes.js';
import type { CurrencyPair, RawBar, SeriesKey } from '../types/domain.js';
import { normalizeBatch } from './normalizer.service.js';
import { isFinal, upsertCandles } from './upsert.service.js';

export type WalkState = 'start' | 'fetching' | 'storing' | 'done' | 'failed' | 'suspended';

export type WalkUnit = {
  series: SeriesKey;
  pair: CurrencyPair;
  period: ResolvedPeriod;
  label: string;
};

export type WalkOutcome = {
  state: Extract<WalkState, 'done' | 'failed' | 'suspended'>;
  pages: number;
  inserted: number;
  updated: number;
  unchanged: number;
  rejected: number;
  cursor: number | null; // openTime of the last persisted final candle
  error?: unknown;
};

export type BackfillDeps = {
  store: CandleStore;
  cursors: CursorStore;
  historyStart: number;
  pageSize: number;
  now: () => number;
};

function isTerminal(s: WalkState): s is WalkOutcome['state'] {
  return s === 'done' || s === 'failed' || s === 'suspended';
}

/**
 * Walks one series forward from its high-water mark up to the present, a page at a time.
 *
 *   start -> fetching -> (storing -> fetching)* -> done | failed | suspended
 *
 * The cursor only moves after a page is committed, and only through final candles: a failed
 * or suspended walk resumes after the last closed candle it stored, and a candle still open
 * when its page was requested is fetched again on the next run.
 */
export class BackfillWalker {
  constructor(private readonly deps: BackfillDeps) {}

  async walk(unit: WalkUnit, adapter: ExchangeAdapter, opts: { deadline: number }): Promise<WalkOutcome> {
    const { store, cursors, now } = this.deps;
    const durationMs = unit.period.durationMs;
    const out: WalkOutcome = { state: 'done', pages: 0, inserted: 0, updated: 0, unchanged: 0, rejected: 0, cursor: null };

    let state: WalkState = 'start';
    let since = 0;
    let requested = 0;
    let fetchedAt = 0;
    let page: RawBar[] = [];

    try {
      for (;;) {
        if (isTerminal(state)) {
          out.state = state;
          break;
        }
        switch (state) {
          case 'start': {
            const from = ceilToPeriod(this.deps.historyStart, durationMs);
            const hwm = (await cursors.get(unit.series)) ?? (await store.latestStoredOpenTime(unit.series, from, durationMs));
            out.cursor = hwm;
            since = hwm === null ? from : Math.max(from, hwm + durationMs);
            logger.debug({ series: unit.label, hwm, since }, '[backfill] start');
            state = 'fetching';
            break;
          }

          case 'fetching': {
            if (since >= now()) {
              state = 'done';
              break;
            }
            if (now() >= opts.deadline) {
              state = 'suspended';
              break;
            }
            requested = Math.min(this.deps.pageSize, adapter.maxPageSize);
            fetchedAt = now();
            page = await adapter.fetchCandles(unit.pair, unit.period, since, requested);
            out.pages++;
            // nothing there yet; retried from the same cursor next run
            state = page.length ? 'storing' : 'done';
            break;
          }

          case 'storing': {
            const { candles, rejected } = normalizeBatch(
              page,
              { series: unit.series, durationMs, fetchedAt },
              unit.label
            );
            out.rejected += rejected;

            const last = candles[candles.length - 1];
            if (!last) {
              if (page.length >= requested) {
                throw new MalformedRecordError(`${unit.label}: full page from ${since} had no valid candle`);
              }
              state = 'done';
              break;
            }
            if (last.openTime < since) {
              throw new MalformedRecordError(`${unit.label}: page from ${since} ended at ${last.openTime}`);
            }

            const res = await upsertCandles(store, candles);
            out.inserted += res.inserted;
            out.updated += res.updated;
            out.unchanged += res.unchanged;

            // candles are sorted, so the open ones form the tail of the page
            const open = candles.findIndex((c) => !isFinal(c));
            const lastFinal = open === -1 ? last : candles[open - 1];
            if (lastFinal) {
              await cursors.set(unit.series, lastFinal.openTime);
              out.cursor = lastFinal.openTime;
            }
            if (open !== -1) {
              state = 'done'; // reached the live candle
              break;
            }
            since = last.openTime + durationMs;
            state = page.length < requested ? 'done' : 'fetching';
            break;
          }
        }
      }
    } catch (err) {
      out.state = 'failed';
      out.error = err;
    }

    logger.info(
      {
        series: unit.label,
        state: out.state,
        pages: out.pages,
        inserted: out.inserted,
        updated: out.updated,
        rejected: out.rejected,
        cursor: out.cursor,
      },
      '[backfill] walk finished'
    );
    return out;
  }
}
