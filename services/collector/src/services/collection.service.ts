import Bottleneck from 'bottleneck';
import { toErrorInfo, type ErrorInfo } from '../errors.js';
import { logger } from '../logger.js';
import { candlesWritten, unitsTotal } from '../metrics/metrics.js';
import type { ExchangeAdapter } from '../exchanges/adapter.js';
import type { CandleStore } from '../repositories/store.js';
import { resolvePeriod, type ResolvedPeriod } from '../utils/timeframes.js';
import type { CurrencyPair, ExchangeRecord, SeriesKey } from '../types/domain.js';
import type { BackfillWalker } from './backfill.service.js';
import { normalizeBatch } from './normalizer.service.js';
import { upsertCandles } from './upsert.service.js';

export type RunMode = 'current' | 'historical';

export type UnitStatus = 'ok' | 'failed' | 'skipped' | 'partial';

export type UnitResult = {
  exchange: string;
  pair: string;   // "*" when the whole exchange failed before its units were known
  period: string;
  status: UnitStatus;
  inserted: number;
  updated: number;
  unchanged: number;
  rejected: number;
  error?: ErrorInfo;
};

export type RunTotals = Record<UnitStatus, number> & {
  units: number;
  inserted: number;
  updated: number;
  unchanged: number;
  rejected: number;
};

export type RunSummary = {
  mode: RunMode;
  startedAt: number;
  finishedAt: number;
  partial: boolean; // budget ran out before every unit completed
  totals: RunTotals;
  units: UnitResult[];
};

export type CollectionOptions = {
  currentCandleCount: number;
  globalConcurrency: number;
  perExchangeConcurrency: number;
  currentBudgetMs: number;
  historicalBudgetMs: number;
};

export interface AdapterSource {
  get(exchange: ExchangeRecord): ExchangeAdapter;
}

export type CollectionDeps = {
  store: CandleStore;
  adapters: AdapterSource;
  walker: BackfillWalker;
  options: CollectionOptions;
  now?: () => number;
};

type Unit = {
  exchange: ExchangeRecord;
  pair: CurrencyPair;
  period: ResolvedPeriod;
  series: SeriesKey;
  label: string;
};

function emptyResult(exchange: string, pair: string, period: string, status: UnitStatus, err?: unknown): UnitResult {
  const r: UnitResult = { exchange, pair, period, status, inserted: 0, updated: 0, unchanged: 0, rejected: 0 };
  if (err !== undefined) r.error = toErrorInfo(err);
  return r;
}

export function summarize(units: readonly UnitResult[]): RunTotals {
  const totals: RunTotals = {
    units: units.length, ok: 0, failed: 0, skipped: 0, partial: 0,
    inserted: 0, updated: 0, unchanged: 0, rejected: 0,
  };
  for (const u of units) {
    totals[u.status]++;
    totals.inserted += u.inserted;
    totals.updated += u.updated;
    totals.unchanged += u.unchanged;
    totals.rejected += u.rejected;
  }
  return totals;
}

/**
 * Fans a run out over every active exchange x pair x period.
 *
 * A unit waits for a slot on its exchange's pool, then for a global slot. Units that
 * have not started when the run's budget expires are reported as skipped. No unit
 * failure escapes; only failing to list exchanges or periods fails the run.
 */
export class CollectionService {
  private readonly now: () => number;

  constructor(private readonly deps: CollectionDeps) {
    this.now = deps.now ?? Date.now;
  }

  runCurrent(): Promise<RunSummary> {
    return this.run('current');
  }

  runHistorical(): Promise<RunSummary> {
    return this.run('historical');
  }

  private async run(mode: RunMode): Promise<RunSummary> {
    const { store, options } = this.deps;
    const startedAt = this.now();
    const budgetMs = mode === 'current' ? options.currentBudgetMs : options.historicalBudgetMs;
    const deadline = startedAt + budgetMs;

    const [exchanges, rawPeriods] = await Promise.all([store.listActiveExchanges(), store.listActivePeriods()]);
    const periods: ResolvedPeriod[] = [];
    for (const p of rawPeriods) {
      const resolved = resolvePeriod(p);
      if (resolved) periods.push(resolved);
      else logger.warn({ period: p.name, minutes: p.minutes }, '[collection] unsupported period skipped');
    }

    logger.info({ mode, exchanges: exchanges.length, periods: periods.length, budgetMs }, '[collection] run started');

    const global = new Bottleneck({ maxConcurrent: options.globalConcurrency });
    const perExchange = await Promise.all(
      exchanges.map((ex) => this.collectExchange(mode, ex, periods, global, deadline))
    );
    const units = perExchange.flat();

    const totals = summarize(units);
    const summary: RunSummary = {
      mode,
      startedAt,
      finishedAt: this.now(),
      partial: totals.skipped > 0 || totals.partial > 0,
      totals,
      units,
    };
    logger.info(
      { mode, ms: summary.finishedAt - startedAt, ...totals },
      '[collection] run finished'
    );
    return summary;
  }

  private async collectExchange(
    mode: RunMode,
    exchange: ExchangeRecord,
    periods: readonly ResolvedPeriod[],
    global: Bottleneck,
    deadline: number
  ): Promise<UnitResult[]> {
    let pairs: CurrencyPair[];
    try {
      pairs = await this.deps.store.listActivePairs(exchange.id);
    } catch (err) {
      logger.error({ exchange: exchange.code, err }, '[collection] listing pairs failed');
      return [this.record(mode, emptyResult(exchange.code, '*', '*', 'failed', err))];
    }

    const units: Unit[] = pairs.flatMap((pair) =>
      periods.map((period) => ({
        exchange,
        pair,
        period,
        series: { exchangeId: exchange.id, pairId: pair.id, periodId: period.id },
        label: `${exchange.code} ${pair.symbol} ${period.timeframe}`,
      }))
    );
    if (!units.length) return [];

    let adapter: ExchangeAdapter;
    try {
      adapter = this.deps.adapters.get(exchange);
    } catch (err) {
      logger.error({ exchange: exchange.code, err }, '[collection] adapter unavailable');
      return units.map((u) => this.record(mode, emptyResult(exchange.code, u.pair.symbol, u.period.name, 'failed', err)));
    }

    const pool = new Bottleneck({
      maxConcurrent: Math.max(1, Math.min(this.deps.options.perExchangeConcurrency, adapter.rateLimitBudget.maxConcurrent)),
    });
    return Promise.all(
      units.map((u) => pool.schedule(() => global.schedule(() => this.runUnit(mode, u, adapter, deadline))))
    );
  }

  private async runUnit(mode: RunMode, unit: Unit, adapter: ExchangeAdapter, deadline: number): Promise<UnitResult> {
    const base = emptyResult(unit.exchange.code, unit.pair.symbol, unit.period.name, 'ok');
    if (this.now() >= deadline) {
      return this.record(mode, { ...base, status: 'skipped' });
    }

    if (mode === 'historical') {
      const out = await this.deps.walker.walk(unit, adapter, { deadline });
      const result: UnitResult = {
        ...base,
        status: out.state === 'done' ? 'ok' : out.state === 'suspended' ? 'partial' : 'failed',
        inserted: out.inserted,
        updated: out.updated,
        unchanged: out.unchanged,
        rejected: out.rejected,
      };
      if (out.state === 'failed') result.error = toErrorInfo(out.error);
      return this.record(mode, result);
    }

    try {
      // stamped before the request: a bar that closes mid-request is still a partial snapshot
      const fetchedAt = this.now();
      const raws = await adapter.fetchCandles(unit.pair, unit.period, undefined, this.deps.options.currentCandleCount);
      const { candles, rejected } = normalizeBatch(
        raws,
        { series: unit.series, durationMs: unit.period.durationMs, fetchedAt },
        unit.label
      );
      const res = await upsertCandles(this.deps.store, candles);
      return this.record(mode, { ...base, ...res, rejected });
    } catch (err) {
      logger.warn({ series: unit.label, err }, '[collection] unit failed');
      return this.record(mode, { ...base, status: 'failed', error: toErrorInfo(err) });
    }
  }

  private record(mode: RunMode, r: UnitResult): UnitResult {
    unitsTotal.inc({ mode, status: r.status });
    if (r.inserted) candlesWritten.inc({ mode, result: 'inserted' }, r.inserted);
    if (r.updated) candlesWritten.inc({ mode, result: 'updated' }, r.updated);
    if (r.rejected) candlesWritten.inc({ mode, result: 'rejected' }, r.rejected);
    return r;
  }
}
