import type { Pool, PoolClient } from 'pg';
import { SQL } from '../db/sql.js';
import { dbHealth, withTransaction } from '../db/pool.js';
import type { CandleStore, SeriesTransaction } from './store.js';
import type {
  Candle,
  CollectionStats,
  CurrencyPair,
  ExchangeRecord,
  SeriesKey,
  TimePeriod,
} from '../types/domain.js';

type ExchangeRow = {
  id: number;
  code: string;
  name: string;
  environment: string;
  active: boolean;
  rateLimitRps: number | null;
  rateLimitConcurrency: number | null;
  apiKey: string | null;
  apiSecret: string | null;
  apiPassphrase: string | null;
};

type PairRow = { id: number; exchangeId: number | null; base: string; quote: string };

type TotalsRow = { totalCandles: number; totalExchanges: number; totalPairs: number; totalPeriods: number };

type LatestRow = { exchange: string; lastUpdate: Date | null };

function toExchange(r: ExchangeRow): ExchangeRecord {
  return {
    id: r.id,
    code: r.code,
    name: r.name,
    environment: r.environment === 'sandbox' ? 'sandbox' : 'production',
    active: r.active,
    rateLimit:
      r.rateLimitRps !== null && r.rateLimitConcurrency !== null
        ? { requestsPerSecond: r.rateLimitRps, maxConcurrent: r.rateLimitConcurrency }
        : null,
    credentials: {
      apiKey: r.apiKey ?? undefined,
      secret: r.apiSecret ?? undefined,
      passphrase: r.apiPassphrase ?? undefined,
    },
  };
}

class PgSeriesTransaction implements SeriesTransaction {
  constructor(private readonly c: PoolClient, private readonly s: SeriesKey) {}

  private key(): [number, number, number] {
    return [this.s.exchangeId, this.s.pairId, this.s.periodId];
  }

  async findExisting(openTimes: readonly number[]): Promise<Candle[]> {
    if (!openTimes.length) return [];
    const { rows } = await this.c.query<Candle>(SQL.candles.selectForUpdate, [...this.key(), openTimes]);
    return rows;
  }

  async insert(rows: readonly Candle[]): Promise<number[]> {
    if (!rows.length) return [];
    const res = await this.c.query<{ openTime: number }>(SQL.candles.insertBatch, [
      ...this.key(),
      rows.map(r => r.openTime),
      rows.map(r => r.closeTime),
      rows.map(r => r.open),
      rows.map(r => r.high),
      rows.map(r => r.low),
      rows.map(r => r.close),
      rows.map(r => r.volume),
      rows.map(r => r.fetchedAt),
    ]);
    return res.rows.map(r => r.openTime);
  }

  async update(rows: readonly Candle[]): Promise<number> {
    if (!rows.length) return 0;
    const res = await this.c.query(SQL.candles.updateBatch, [
      ...this.key(),
      rows.map(r => r.openTime),
      rows.map(r => r.open),
      rows.map(r => r.high),
      rows.map(r => r.low),
      rows.map(r => r.close),
      rows.map(r => r.volume),
      rows.map(r => r.fetchedAt),
    ]);
    return res.rowCount ?? 0;
  }
}

export class PgCandleStore implements CandleStore {
  constructor(private readonly db: Pool) {}

  withSeriesTransaction<T>(series: SeriesKey, fn: (tx: SeriesTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.db, (c) => fn(new PgSeriesTransaction(c, series)));
  }

  async latestStoredOpenTime(series: SeriesKey, from: number, durationMs: number): Promise<number | null> {
    const { rows } = await this.db.query<{ openTime: number | null }>(SQL.candles.contiguousRunEnd, [
      series.exchangeId,
      series.pairId,
      series.periodId,
      from,
      durationMs,
    ]);
    return rows[0]?.openTime ?? null;
  }

  async listActiveExchanges(): Promise<ExchangeRecord[]> {
    const { rows } = await this.db.query<ExchangeRow>(SQL.refs.activeExchanges);
    return rows.map(toExchange);
  }

  async listActivePairs(exchangeId: number): Promise<CurrencyPair[]> {
    const { rows } = await this.db.query<PairRow>(SQL.refs.activePairs, [exchangeId]);
    return rows.map(r => ({ ...r, symbol: `${r.base}/${r.quote}` }));
  }

  async listActivePeriods(): Promise<TimePeriod[]> {
    const { rows } = await this.db.query<TimePeriod>(SQL.refs.activePeriods);
    return rows;
  }

  async getCollectionStats(): Promise<CollectionStats> {
    const [totals, latest] = await Promise.all([
      this.db.query<TotalsRow>(SQL.stats.totals),
      this.db.query<LatestRow>(SQL.stats.latestPerExchange),
    ]);
    const t = totals.rows[0] ?? { totalCandles: 0, totalExchanges: 0, totalPairs: 0, totalPeriods: 0 };
    return {
      ...t,
      latestUpdatePerExchange: latest.rows.map(r => ({
        exchange: r.exchange,
        lastUpdate: r.lastUpdate ? r.lastUpdate.toISOString() : null,
      })),
    };
  }

  ping(): Promise<boolean> {
    return dbHealth(this.db);
  }
}
