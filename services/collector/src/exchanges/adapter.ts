import Bottleneck from 'bottleneck';
import * as ccxt from 'ccxt';
import {
  CollectorError,
  FatalAdapterError,
  RateLimitedError,
  TransientNetworkError,
} from '../errors.js';
import { adapterRequests } from '../metrics/metrics.js';
import { withBackoff, type RetryPolicy } from '../utils/retry.js';
import type { ResolvedPeriod } from '../utils/timeframes.js';
import type { CurrencyPair, RateLimitBudget, RawBar } from '../types/domain.js';

/** What the orchestrator and the walker know about a venue. */
export interface ExchangeAdapter {
  readonly exchangeId: number;
  readonly exchangeCode: string;
  readonly rateLimitBudget: RateLimitBudget;
  readonly maxPageSize: number;
  /**
   * Bars for one pair/period, oldest first. Without `since` the venue returns its most
   * recent bars. `limit` is clamped to `maxPageSize`.
   */
  fetchCandles(pair: CurrencyPair, period: ResolvedPeriod, since?: number, limit?: number): Promise<RawBar[]>;
}

// The slice of a ccxt exchange the adapter calls.
export interface MarketDataClient {
  readonly id: string;
  fetchOHLCV(
    symbol: string,
    timeframe?: string,
    since?: number,
    limit?: number
  ): Promise<ReadonlyArray<ReadonlyArray<number | undefined>>>;
}

export type CcxtAdapterOptions = {
  exchangeId: number;
  exchangeCode: string;
  client: MarketDataClient;
  budget: RateLimitBudget;
  maxPageSize: number;
  retry: RetryPolicy;
};

export function classifyError(err: unknown, label: string): CollectorError {
  if (err instanceof CollectorError) return err;
  const message = err instanceof Error ? `${label}: ${err.message}` : `${label}: ${String(err)}`;
  // RateLimitExceeded and DDoSProtection are NetworkError subclasses, test them first
  if (err instanceof ccxt.RateLimitExceeded || err instanceof ccxt.DDoSProtection) {
    return new RateLimitedError(message, { cause: err });
  }
  if (
    err instanceof ccxt.RequestTimeout ||
    err instanceof ccxt.ExchangeNotAvailable ||
    err instanceof ccxt.NetworkError
  ) {
    return new TransientNetworkError(message, { cause: err });
  }
  return new FatalAdapterError(message, { cause: err });
}

export function toRawBar(row: ReadonlyArray<number | undefined>): RawBar {
  return {
    openTime: row[0],
    open: row[1],
    high: row[2],
    low: row[3],
    close: row[4],
    volume: row[5],
  };
}

export class CcxtExchangeAdapter implements ExchangeAdapter {
  readonly exchangeId: number;
  readonly exchangeCode: string;
  readonly rateLimitBudget: RateLimitBudget;
  readonly maxPageSize: number;

  private readonly client: MarketDataClient;
  private readonly retry: RetryPolicy;
  private readonly limiter: Bottleneck;

  constructor(opts: CcxtAdapterOptions) {
    this.exchangeId = opts.exchangeId;
    this.exchangeCode = opts.exchangeCode;
    this.rateLimitBudget = opts.budget;
    this.maxPageSize = opts.maxPageSize;
    this.client = opts.client;
    this.retry = opts.retry;
    this.limiter = new Bottleneck({
      minTime: Math.ceil(1000 / opts.budget.requestsPerSecond),
      maxConcurrent: opts.budget.maxConcurrent,
    });
  }

  async fetchCandles(pair: CurrencyPair, period: ResolvedPeriod, since?: number, limit?: number): Promise<RawBar[]> {
    const capped = limit === undefined ? undefined : Math.max(1, Math.min(limit, this.maxPageSize));
    const label = `${this.exchangeCode} ${pair.symbol} ${period.timeframe}`;

    const rows = await withBackoff(
      () => this.limiter.schedule(() => this.request(pair.symbol, period.timeframe, since, capped, label)),
      this.retry,
      label
    );
    return rows.map(toRawBar);
  }

  private async request(
    symbol: string,
    timeframe: string,
    since: number | undefined,
    limit: number | undefined,
    label: string
  ): Promise<ReadonlyArray<ReadonlyArray<number | undefined>>> {
    try {
      const rows = await this.client.fetchOHLCV(symbol, timeframe, since, limit);
      adapterRequests.inc({ exchange: this.exchangeCode, outcome: 'ok' });
      return rows;
    } catch (err) {
      const classified = classifyError(err, label);
      adapterRequests.inc({ exchange: this.exchangeCode, outcome: classified.code });
      throw classified;
    }
  }
}
