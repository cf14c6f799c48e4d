import type { ExchangeRecord } from '../types/domain.js';
import type { ExchangeAdapter } from './adapter.js';

export type AdapterFactory = (exchange: ExchangeRecord) => ExchangeAdapter;

/** One adapter (and so one rate limiter) per exchange for the life of the process. */
export class AdapterRegistry {
  private readonly cache = new Map<number, ExchangeAdapter>();

  constructor(private readonly factory: AdapterFactory) {}

  get(exchange: ExchangeRecord): ExchangeAdapter {
    const hit = this.cache.get(exchange.id);
    if (hit) return hit;
    const adapter = this.factory(exchange);
    this.cache.set(exchange.id, adapter);
    return adapter;
  }
}
