/**
 * MARKET DATA — Contract
 *
 * Daily closes per asset from CoinGecko, aligned for the portfolio engine.
 */

import type { AlignedPriceTable, AssetId, PricePoint } from '../portfolio-engine/contracts/portfolio.contract.js';
import type { EngineErrorCode } from '../portfolio-engine/contracts/engine_result.contract.js';

// ═══════════════════════════════════════════════════════════════
// SUPPORTED ASSETS (display symbol → CoinGecko id)
// ═══════════════════════════════════════════════════════════════

export const SUPPORTED_ASSETS = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  SOL: 'solana',
  BNB: 'binancecoin',
  XRP: 'ripple',
  ADA: 'cardano',
  DOGE: 'dogecoin',
  AVAX: 'avalanche-2',
} as const;

export type SupportedSymbol = keyof typeof SUPPORTED_ASSETS;

export function isSupportedSymbol(value: string): value is SupportedSymbol {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_ASSETS, value);
}

export const LOOKBACK_DAYS_OPTIONS = [90, 180, 365, 730] as const;

/** CoinGecko switches to daily granularity above this */
export const DAILY_INTERVAL_THRESHOLD_DAYS = 90;

export const FETCH_TIMEOUT_MS = 10_000;

// ═══════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════

export interface PriceSource {
  readonly name: string;
  fetchDailyCloses(asset: AssetId, lookbackDays: number): Promise<PricePoint[]>;
}

export interface PriceStore {
  saveCloses(asset: AssetId, points: readonly PricePoint[], source: string): Promise<number>;
  loadCloses(asset: AssetId, from: string, to: string): Promise<PricePoint[]>;
}

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export type DataMode = 'LIVE' | 'CACHED' | 'DEGRADED';

export interface DataQuality {
  mode: DataMode;
  /** Assets served from the store because the live fetch failed */
  fallback: AssetId[];
  fetchedAt: string;
  ttlSec?: number;
}

export interface AlignedSeriesResult {
  table: AlignedPriceTable;
  quality: DataQuality;
}

// ═══════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════

export type MarketDataErrorCode = EngineErrorCode | 'UPSTREAM_UNAVAILABLE';

export interface MarketDataError {
  code: MarketDataErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type MarketDataResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MarketDataError };
