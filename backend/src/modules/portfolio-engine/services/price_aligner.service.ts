/**
 * PRICE ALIGNER
 *
 * Intersects per-asset close series onto one common date index.
 * Intersection only: a date missing for any asset is dropped for all,
 * nothing is forward-filled.
 */

import type {
  AlignedPriceTable,
  AssetPriceSeries,
} from '../contracts/portfolio.contract.js';
import { EngineResult, failure, success } from '../contracts/engine_result.contract.js';
import { parseDateMs } from '../utils/dates.js';

export interface AlignOptions {
  /** Minimum aligned rows required (default 1) */
  minRows?: number;
}

export class PriceAlignerService {

  /**
   * Align N series (caller order is kept as the asset order)
   */
  align(series: readonly AssetPriceSeries[], options: AlignOptions = {}): EngineResult<AlignedPriceTable> {
    const minRows = Math.max(1, options.minRows ?? 1);

    if (series.length === 0) {
      return failure('INSUFFICIENT_DATA', 'No price series supplied');
    }

    const seen = new Set<string>();
    for (const s of series) {
      if (seen.has(s.asset)) {
        return failure('INVALID_SERIES', `Duplicate asset: ${s.asset}`, { asset: s.asset });
      }
      seen.add(s.asset);

      if (!s.points || s.points.length === 0) {
        return failure('INSUFFICIENT_DATA', `Empty price series for ${s.asset}`, { asset: s.asset });
      }

      const checked = this.checkSeries(s);
      if (!checked.ok) return checked;
    }

    // Keyed by instant so '2024-01-01' and '2024-01-01T00:00:00Z' meet;
    // output keeps the first series' spelling
    const maps = series.map(s => new Map(s.points.map(p => [parseDateMs(p.date), p.close])));
    const [first, ...rest] = series;

    const dates: string[] = [];
    const prices: number[][] = [];

    for (const point of first.points) {
      const ms = parseDateMs(point.date);
      const row: number[] = [point.close];
      let complete = true;

      for (let i = 0; i < rest.length; i++) {
        const close = maps[i + 1].get(ms);
        if (close === undefined) {
          complete = false;
          break;
        }
        row.push(close);
      }

      if (complete) {
        dates.push(point.date);
        prices.push(row);
      }
    }

    if (dates.length === 0) {
      return failure('INSUFFICIENT_DATA', 'No common dates across assets', {
        assets: series.map(s => s.asset),
      });
    }

    if (dates.length < minRows) {
      return failure(
        'INSUFFICIENT_DATA',
        `Only ${dates.length} common date(s), need at least ${minRows}`,
        { rows: dates.length, minRows }
      );
    }

    return success({
      assets: series.map(s => s.asset),
      dates,
      prices,
    });
  }

  private checkSeries(s: AssetPriceSeries): EngineResult<true> {
    let prevMs = -Infinity;

    for (const p of s.points) {
      const ms = parseDateMs(p.date);
      if (ms === null) {
        return failure('INVALID_SERIES', `Unparseable date '${p.date}' in ${s.asset}`, {
          asset: s.asset,
          date: p.date,
        });
      }
      if (ms <= prevMs) {
        return failure('INVALID_SERIES', `Dates not strictly increasing in ${s.asset} at ${p.date}`, {
          asset: s.asset,
          date: p.date,
        });
      }
      prevMs = ms;

      if (!Number.isFinite(p.close) || p.close <= 0) {
        return failure('INVALID_PRICE', `Non-positive price for ${s.asset} at ${p.date}`, {
          asset: s.asset,
          date: p.date,
          price: p.close,
        });
      }
    }

    return success(true);
  }
}

// Singleton
let instance: PriceAlignerService | null = null;

export function getPriceAlignerService(): PriceAlignerService {
  if (!instance) {
    instance = new PriceAlignerService();
  }
  return instance;
}

export function alignPrices(
  series: readonly AssetPriceSeries[],
  options?: AlignOptions
): EngineResult<AlignedPriceTable> {
  return getPriceAlignerService().align(series, options);
}
