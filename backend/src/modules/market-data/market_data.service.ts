/**
 * MARKET DATA SERVICE
 *
 * fetchAlignedSeries(assets, lookbackDays):
 *   1. serve from cache while the TTL holds
 *   2. fetch every asset in parallel from the live source
 *   3. persist closes to the store; fall back to stored closes per asset
 *      when the live fetch fails (DEGRADED)
 *   4. align onto common dates (at least 2 rows)
 */

import type { AssetId, AssetPriceSeries, PricePoint } from '../portfolio-engine/contracts/portfolio.contract.js';
import { alignPrices } from '../portfolio-engine/services/price_aligner.service.js';
import { subtractDays, toIsoDate } from '../portfolio-engine/utils/dates.js';
import type {
  AlignedSeriesResult,
  MarketDataResult,
  PriceSource,
  PriceStore,
} from './market_data.contract.js';
import { TtlCache, buildCacheKey } from './price_cache.js';

export interface MarketDataServiceDeps {
  source: PriceSource;
  store: PriceStore;
  ttlMs: number;
  cache?: TtlCache<AlignedSeriesResult>;
  now?: () => number;
}

export class MarketDataService {
  private readonly cache: TtlCache<AlignedSeriesResult>;
  private readonly now: () => number;

  constructor(private readonly deps: MarketDataServiceDeps) {
    this.now = deps.now ?? Date.now;
    this.cache = deps.cache ?? new TtlCache<AlignedSeriesResult>(this.now);
  }

  async fetchAlignedSeries(
    assets: readonly AssetId[],
    lookbackDays: number
  ): Promise<MarketDataResult<AlignedSeriesResult>> {
    if (assets.length === 0) {
      return { ok: false, error: { code: 'INSUFFICIENT_DATA', message: 'No assets requested' } };
    }

    const key = buildCacheKey(assets, lookbackDays);
    const cached = this.cache.get(key);
    if (cached) {
      return {
        ok: true,
        value: {
          table: cached.table,
          quality: {
            ...cached.quality,
            mode: 'CACHED',
            ttlSec: Math.floor(this.cache.remainingMs(key) / 1000),
          },
        },
      };
    }

    const to = toIsoDate(this.now());
    const from = subtractDays(to, lookbackDays);

    const settled = await Promise.allSettled(
      assets.map(asset => this.deps.source.fetchDailyCloses(asset, lookbackDays))
    );

    const series: AssetPriceSeries[] = [];
    const fallback: AssetId[] = [];
    const missing: AssetId[] = [];

    for (let i = 0; i < assets.length; i++) {
      const asset = assets[i];
      const outcome = settled[i];

      if (outcome.status === 'fulfilled' && outcome.value.length > 0) {
        await this.persist(asset, outcome.value);
        series.push({ asset, points: outcome.value });
        continue;
      }

      const reason = outcome.status === 'rejected' ? String(outcome.reason) : 'empty response';
      console.warn(`[MarketData] Live fetch failed for ${asset} (${reason}), trying store`);

      const stored = await this.loadStored(asset, from, to);
      if (stored.length > 0) {
        fallback.push(asset);
        series.push({ asset, points: stored });
      } else {
        missing.push(asset);
      }
    }

    if (missing.length > 0) {
      return {
        ok: false,
        error: {
          code: 'UPSTREAM_UNAVAILABLE',
          message: `No price data available for: ${missing.join(', ')}`,
          details: { missing },
        },
      };
    }

    const aligned = alignPrices(series, { minRows: 2 });
    if (!aligned.ok) return aligned;

    const result: AlignedSeriesResult = {
      table: aligned.value,
      quality: {
        mode: fallback.length > 0 ? 'DEGRADED' : 'LIVE',
        fallback,
        fetchedAt: new Date(this.now()).toISOString(),
      },
    };

    // Degraded results are not cached so the next call retries upstream
    if (result.quality.mode === 'LIVE') {
      this.cache.set(key, result, this.deps.ttlMs);
    }

    console.log(
      `[MarketData] Aligned ${assets.join(',')} over ${lookbackDays}d: ${aligned.value.dates.length} rows (${result.quality.mode})`
    );

    return { ok: true, value: result };
  }

  invalidate(pattern?: string): number {
    return this.cache.invalidate(pattern);
  }

  cacheStats(): { entries: number; keys: string[] } {
    return this.cache.stats();
  }

  private async persist(asset: AssetId, points: PricePoint[]): Promise<void> {
    try {
      await this.deps.store.saveCloses(asset, points, this.deps.source.name);
    } catch (e) {
      console.warn(`[MarketData] Failed to store closes for ${asset}:`, (e as Error).message);
    }
  }

  private async loadStored(asset: AssetId, from: string, to: string): Promise<PricePoint[]> {
    try {
      return await this.deps.store.loadCloses(asset, from, to);
    } catch (e) {
      console.warn(`[MarketData] Failed to load stored closes for ${asset}:`, (e as Error).message);
      return [];
    }
  }
}
