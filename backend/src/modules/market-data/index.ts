/**
 * MARKET DATA MODULE
 *
 * CoinGecko daily closes → TTL cache → Mongo close store (fallback)
 * → aligned price table for the portfolio engine.
 */

import type { Env } from '../../config/env.js';
import { isMongoConnected } from '../../db/mongoose.js';
import { CoinGeckoClient } from './coingecko.client.js';
import { MarketDataService } from './market_data.service.js';
import { InMemoryPriceStore, MongoPriceStore } from './storage/price_store.js';

export * from './market_data.contract.js';
export { CoinGeckoClient, toDailyCloses } from './coingecko.client.js';
export { MarketDataService } from './market_data.service.js';
export { TtlCache, buildCacheKey } from './price_cache.js';
export { InMemoryPriceStore, MongoPriceStore } from './storage/price_store.js';
export { marketDataRoutes } from './market_data.routes.js';

export function createMarketDataService(env: Env): MarketDataService {
  return new MarketDataService({
    source: new CoinGeckoClient({
      baseUrl: env.COINGECKO_BASE_URL,
      apiKey: env.COINGECKO_API_KEY,
    }),
    store: isMongoConnected() ? new MongoPriceStore() : new InMemoryPriceStore(),
    ttlMs: env.PRICE_CACHE_TTL_SEC * 1000,
  });
}
