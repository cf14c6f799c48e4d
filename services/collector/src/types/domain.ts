export type Environment = 'production' | 'sandbox';

export type RateLimitBudget = { requestsPerSecond: number; maxConcurrent: number };

// credentials stay opaque to the engine; they are handed to the venue client as-is
export type ExchangeCredentials = { apiKey?: string; secret?: string; passphrase?: string };

export type ExchangeRecord = {
  id: number;
  code: string;
  name: string;
  environment: Environment;
  active: boolean;
  rateLimit: RateLimitBudget | null;
  credentials: ExchangeCredentials;
};

export type CurrencyPair = {
  id: number;
  exchangeId: number | null; // null = tracked on every exchange
  base: string;
  quote: string;
  symbol: string;            // "BASE/QUOTE"
};

export type TimePeriod = { id: number; name: string; minutes: number };

export type SeriesKey = { exchangeId: number; pairId: number; periodId: number };

/** Venue bar mapped onto candle field names, not yet validated. */
export type RawBar = {
  openTime: number | undefined;
  open: number | undefined;
  high: number | undefined;
  low: number | undefined;
  close: number | undefined;
  volume: number | undefined;
};

export type Candle = SeriesKey & {
  openTime: number;  // epoch ms, aligned to the period grid
  closeTime: number; // openTime + period duration
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  fetchedAt: number; // epoch ms, when the request went out
};

export type ExchangeLastUpdate = { exchange: string; lastUpdate: string | null };

export type CollectionStats = {
  totalCandles: number;
  totalExchanges: number;
  totalPairs: number;
  totalPeriods: number;
  latestUpdatePerExchange: ExchangeLastUpdate[];
};
