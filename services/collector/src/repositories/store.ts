import type {
  Candle,
  CollectionStats,
  CurrencyPair,
  ExchangeRecord,
  SeriesKey,
  TimePeriod,
} from '../types/domain.js';

/** Row operations available inside one series transaction. */
export interface SeriesTransaction {
  /** Stored candles of the series at the given open times, locked until commit. */
  findExisting(openTimes: readonly number[]): Promise<Candle[]>;
  /** Inserts the rows whose key is still free; returns the open times actually written. */
  insert(rows: readonly Candle[]): Promise<number[]>;
  update(rows: readonly Candle[]): Promise<number>;
}

export interface CandleStore {
  /** Runs `fn` in one transaction scoped to a series; a throw rolls everything back. */
  withSeriesTransaction<T>(series: SeriesKey, fn: (tx: SeriesTransaction) => Promise<T>): Promise<T>;
  /**
   * Open time of the last candle in the contiguous run of final candles starting at
   * `from`, or null when the series has no final candle stored at `from`.
   */
  latestStoredOpenTime(series: SeriesKey, from: number, durationMs: number): Promise<number | null>;
  listActiveExchanges(): Promise<ExchangeRecord[]>;
  listActivePairs(exchangeId: number): Promise<CurrencyPair[]>;
  listActivePeriods(): Promise<TimePeriod[]>;
  getCollectionStats(): Promise<CollectionStats>;
  ping(): Promise<boolean>;
}
