/**
 * RETURN CALCULATOR
 *
 * Daily log-returns from an aligned price table, plus the one place
 * where raw input (prices or returns) is resolved into a price table.
 */

import type {
  AlignedPriceTable,
  RawInput,
  ReturnTable,
} from '../contracts/portfolio.contract.js';
import { INITIAL_CAPITAL } from '../contracts/portfolio.contract.js';
import type { LatestPrice } from '../contracts/analysis.contract.js';
import { EngineResult, failure, success } from '../contracts/engine_result.contract.js';
import { alignPrices, AlignOptions } from './price_aligner.service.js';
import { checkTableShape } from './table_guard.js';

export class ReturnsService {

  /**
   * r_i(t) = ln(P_i(t) / P_i(t-1)); M rows in, M-1 rows out
   */
  computeLogReturns(table: AlignedPriceTable): EngineResult<ReturnTable> {
    const shape = checkTableShape(table);
    if (!shape.ok) return shape;

    const m = table.dates.length;
    if (m < 2) {
      return failure('INSUFFICIENT_HISTORY', `Need at least 2 aligned timestamps, got ${m}`, { rows: m });
    }

    const n = table.assets.length;
    const returns: number[][] = [];

    for (let t = 1; t < m; t++) {
      const prev = table.prices[t - 1];
      const cur = table.prices[t];
      const row = new Array<number>(n);

      for (let i = 0; i < n; i++) {
        if (!(prev[i] > 0) || !(cur[i] > 0)) {
          const badAt = prev[i] > 0 ? t : t - 1;
          return failure('INVALID_PRICE', `Non-positive price for ${table.assets[i]} at ${table.dates[badAt]}`, {
            asset: table.assets[i],
            date: table.dates[badAt],
          });
        }
        row[i] = Math.log(cur[i] / prev[i]);
      }

      returns.push(row);
    }

    return success({
      assets: table.assets,
      dates: table.dates.slice(1),
      returns,
    });
  }

  /**
   * Each asset normalized to 1.0 at the first date
   */
  cumulativeAssetValues(table: AlignedPriceTable): number[][] {
    if (table.prices.length === 0) return [];
    const base = table.prices[0];
    return table.prices.map(row => row.map((p, i) => p / base[i]));
  }

  /**
   * Last close per asset and its % change against the row before.
   * Empty below two rows.
   */
  latestPrices(table: AlignedPriceTable): LatestPrice[] {
    const m = table.prices.length;
    if (m < 2) return [];

    const last = table.prices[m - 1];
    const prev = table.prices[m - 2];

    return table.assets.map((asset, i) => ({
      asset,
      date: table.dates[m - 1],
      close: last[i],
      previousClose: prev[i],
      changePct: ((last[i] - prev[i]) / prev[i]) * 100,
    }));
  }

  /**
   * Resolve boundary input into a price table.
   * Returns are rebuilt into synthetic prices starting at 1.0 on baseDate.
   */
  resolveRawInput(raw: RawInput, options: AlignOptions = {}): EngineResult<AlignedPriceTable> {
    if (raw.kind === 'prices') {
      return alignPrices(raw.series, options);
    }

    const n = raw.assets.length;
    if (n === 0) {
      return failure('INSUFFICIENT_DATA', 'No assets supplied');
    }
    if (raw.dates.length !== raw.returns.length) {
      return failure('DIMENSION_MISMATCH', `Got ${raw.dates.length} dates for ${raw.returns.length} return rows`, {
        dates: raw.dates.length,
        rows: raw.returns.length,
      });
    }

    const level = new Array<number>(n).fill(INITIAL_CAPITAL);
    const series = raw.assets.map(asset => ({
      asset,
      points: [{ date: raw.baseDate, close: INITIAL_CAPITAL }],
    }));

    for (let k = 0; k < raw.returns.length; k++) {
      const row = raw.returns[k];
      if (row.length !== n) {
        return failure('DIMENSION_MISMATCH', `Return row ${k} has ${row.length} values, expected ${n}`, {
          row: k,
          width: row.length,
          expected: n,
        });
      }

      for (let i = 0; i < n; i++) {
        if (!Number.isFinite(row[i])) {
          return failure('INVALID_SERIES', `Non-finite return for ${raw.assets[i]} at ${raw.dates[k]}`, {
            asset: raw.assets[i],
            date: raw.dates[k],
          });
        }
        level[i] *= Math.exp(row[i]);
        series[i].points.push({ date: raw.dates[k], close: level[i] });
      }
    }

    return alignPrices(series, options);
  }
}

// Singleton
let instance: ReturnsService | null = null;

export function getReturnsService(): ReturnsService {
  if (!instance) {
    instance = new ReturnsService();
  }
  return instance;
}

export function computeLogReturns(table: AlignedPriceTable): EngineResult<ReturnTable> {
  return getReturnsService().computeLogReturns(table);
}
