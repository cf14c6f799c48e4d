import * as ccxt from 'ccxt';
import { FatalAdapterError } from '../errors.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { ExchangeRecord, RateLimitBudget } from '../types/domain.js';
import { CcxtExchangeAdapter, type ExchangeAdapter, type MarketDataClient } from './adapter.js';

export interface VenueClient extends MarketDataClient {
  setSandboxMode(enabled: boolean): void;
}

type ClientOptions = {
  apiKey?: string;
  secret?: string;
  password?: string;
  enableRateLimit: boolean;
};

type VenueProfile = {
  create: (opts: ClientOptions) => VenueClient;
  maxPageSize: number;
  budget: RateLimitBudget;
  sandbox?: boolean; // forces sandbox mode regardless of the record's environment
};

const VENUES: Readonly<Record<string, VenueProfile>> = {
  binance: {
    create: (opts) => new ccxt.binance(opts),
    maxPageSize: 1000,
    budget: { requestsPerSecond: 10, maxConcurrent: 4 },
  },
  binance_testnet: {
    create: (opts) => new ccxt.binance(opts),
    maxPageSize: 1000,
    budget: { requestsPerSecond: 5, maxConcurrent: 2 },
    sandbox: true,
  },
  okx: {
    create: (opts) => new ccxt.okx(opts),
    maxPageSize: 300,
    budget: { requestsPerSecond: 8, maxConcurrent: 2 },
  },
  bybit: {
    create: (opts) => new ccxt.bybit(opts),
    maxPageSize: 1000,
    budget: { requestsPerSecond: 10, maxConcurrent: 4 },
  },
  gate: {
    create: (opts) => new ccxt.gate(opts),
    maxPageSize: 1000,
    budget: { requestsPerSecond: 10, maxConcurrent: 4 },
  },
};

export function supportedVenues(): string[] {
  return Object.keys(VENUES);
}

export function createCcxtAdapter(exchange: ExchangeRecord, retry: RetryPolicy): ExchangeAdapter {
  const profile = Object.hasOwn(VENUES, exchange.code) ? VENUES[exchange.code] : undefined;
  if (!profile) {
    throw new FatalAdapterError(`unsupported exchange code "${exchange.code}"`);
  }

  // the adapter throttles through its own limiter
  const client = profile.create({
    apiKey: exchange.credentials.apiKey,
    secret: exchange.credentials.secret,
    password: exchange.credentials.passphrase,
    enableRateLimit: false,
  });
  if (profile.sandbox || exchange.environment === 'sandbox') client.setSandboxMode(true);

  return new CcxtExchangeAdapter({
    exchangeId: exchange.id,
    exchangeCode: exchange.code,
    client,
    budget: exchange.rateLimit ?? profile.budget,
    maxPageSize: profile.maxPageSize,
    retry,
  });
}
