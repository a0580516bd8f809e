/**
 * CoinGecko Client
 * Source: CoinGecko public API (demo key optional)
 *
 * Endpoint: {base}/coins/{id}/market_chart?vs_currency=usd&days=N
 */

import { z } from 'zod';
import type { PricePoint } from '../portfolio-engine/contracts/portfolio.contract.js';
import { toIsoDate } from '../portfolio-engine/utils/dates.js';
import {
  DAILY_INTERVAL_THRESHOLD_DAYS,
  FETCH_TIMEOUT_MS,
  PriceSource,
  SUPPORTED_ASSETS,
  isSupportedSymbol,
} from './market_data.contract.js';

const MarketChartSchema = z.object({
  prices: z.array(z.tuple([z.number(), z.number()])),
});

export interface CoinGeckoClientConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Keep the last price of each UTC day
 */
export function toDailyCloses(prices: ReadonlyArray<readonly [number, number]>): PricePoint[] {
  const byDay = new Map<string, number>();

  for (const [ts, price] of [...prices].sort((a, b) => a[0] - b[0])) {
    if (!Number.isFinite(ts) || !Number.isFinite(price)) continue;
    byDay.set(toIsoDate(ts), price);
  }

  return Array.from(byDay.entries()).map(([date, close]) => ({ date, close }));
}

export class CoinGeckoClient implements PriceSource {
  readonly name = 'COINGECKO';

  constructor(private readonly config: CoinGeckoClientConfig) {}

  async fetchDailyCloses(asset: string, lookbackDays: number): Promise<PricePoint[]> {
    if (!isSupportedSymbol(asset)) {
      throw new Error(`Unsupported asset: ${asset}`);
    }

    const params = new URLSearchParams({
      vs_currency: 'usd',
      days: String(lookbackDays),
    });
    if (lookbackDays > DAILY_INTERVAL_THRESHOLD_DAYS) {
      params.set('interval', 'daily');
    }

    const url = `${this.config.baseUrl}/coins/${SUPPORTED_ASSETS[asset]}/market_chart?${params.toString()}`;
    const headers: Record<string, string> = { accept: 'application/json' };
    if (this.config.apiKey) {
      headers['x-cg-demo-api-key'] = this.config.apiKey;
    }

    const resp = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(this.config.timeoutMs ?? FETCH_TIMEOUT_MS),
    });

    if (!resp.ok) {
      throw new Error(`CoinGecko ${resp.status} for ${asset}: ${resp.statusText}`);
    }

    const parsed = MarketChartSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new Error(`CoinGecko returned no usable 'prices' for ${asset}`);
    }

    return toDailyCloses(parsed.data.prices);
  }
}
