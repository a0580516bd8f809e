/**
 * RISK / RETURN STATISTICS ENGINE
 *
 * From an aligned price table and a weight vector:
 *   return     = Σ w_i · mean(r_i) · 365
 *   volatility = sqrt(wᵀ Σ w),  Σ = cov(r) · 365
 *   sharpe     = (return - rf) / volatility   (0 when volatility is exactly 0)
 *   drawdown   = on exp(cumsum(Σ w_i r_i)), leading 1.0 at t0
 *
 * Deterministic: no randomness, no shared state.
 */

import type {
  AlignedPriceTable,
  AssetId,
  AssetStats,
  CorrelationMatrix,
  MetricsResult,
  WeightVector,
} from '../contracts/portfolio.contract.js';
import { ANNUALIZATION_FACTOR, INITIAL_CAPITAL } from '../contracts/portfolio.contract.js';
import { EngineResult, success } from '../contracts/engine_result.contract.js';
import { checkDimensions, validateWeights } from './allocation_validator.service.js';
import { computeLogReturns } from './returns.service.js';

// ═══════════════════════════════════════════════════════════════
// STATISTICAL HELPERS
// ═══════════════════════════════════════════════════════════════

function mean(arr: readonly number[]): number {
  if (arr.length === 0) return 0;
  return arr.reduce((a, b) => a + b, 0) / arr.length;
}

function column(rows: readonly (readonly number[])[], i: number): number[] {
  return rows.map(r => r[i]);
}

/**
 * Sample covariance matrix (n-1 denominator).
 * A single observation carries no dispersion: all zeros.
 */
export function covarianceMatrix(rows: readonly (readonly number[])[]): number[][] {
  const n = rows.length;
  const k = n > 0 ? rows[0].length : 0;
  const cov: number[][] = Array.from({ length: k }, () => new Array<number>(k).fill(0));
  if (n < 2) return cov;

  const means = Array.from({ length: k }, (_, i) => mean(column(rows, i)));

  for (let i = 0; i < k; i++) {
    for (let j = i; j < k; j++) {
      let s = 0;
      for (let t = 0; t < n; t++) {
        s += (rows[t][i] - means[i]) * (rows[t][j] - means[j]);
      }
      const c = s / (n - 1);
      cov[i][j] = c;
      cov[j][i] = c;
    }
  }

  return cov;
}

/**
 * Pearson correlation. null when either side has zero variance.
 */
export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number | null {
  const n = Math.min(x.length, y.length);
  if (n < 2) return null;

  let sumX = 0, sumY = 0;
  for (let i = 0; i < n; i++) { sumX += x[i]; sumY += y[i]; }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let cov = 0, varX = 0, varY = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    cov += dx * dy;
    varX += dx * dx;
    varY += dy * dy;
  }

  if (varX === 0 || varY === 0) return null;

  const corr = cov / Math.sqrt(varX * varY);
  return Math.max(-1, Math.min(1, corr));
}

/**
 * Most negative (value - runningMax) / runningMax. 0 for a non-decreasing series.
 */
export function maxDrawdown(values: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;

  for (const v of values) {
    if (v > peak) peak = v;
    const dd = (v - peak) / peak;
    if (dd < worst) worst = dd;
  }

  return worst;
}

function quadraticForm(w: WeightVector, m: readonly (readonly number[])[]): number {
  let q = 0;
  for (let i = 0; i < w.length; i++) {
    for (let j = 0; j < w.length; j++) {
      q += w[i] * m[i][j] * w[j];
    }
  }
  return q;
}

function sharpe(annualReturn: number, annualVol: number, riskFreeRate: number): number {
  if (annualVol === 0) return 0;
  return (annualReturn - riskFreeRate) / annualVol;
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class RiskMetricsService {

  computeMetrics(
    table: AlignedPriceTable,
    weights: WeightVector,
    riskFreeRateAnnual = 0
  ): EngineResult<MetricsResult> {
    const valid = validateWeights(weights);
    if (!valid.ok) return valid;

    const dims = checkDimensions(weights, table.assets.length);
    if (!dims.ok) return dims;

    const ret = computeLogReturns(table);
    if (!ret.ok) return ret;

    const rows = ret.value.returns;
    const n = table.assets.length;

    // Per-asset annualized log return
    const assetAnnualReturn = Array.from({ length: n }, (_, i) => mean(column(rows, i)) * ANNUALIZATION_FACTOR);

    const cov = covarianceMatrix(rows).map(r => r.map(c => c * ANNUALIZATION_FACTOR));

    const portfolioReturn = weights.reduce((acc, w, i) => acc + w * assetAnnualReturn[i], 0);
    const portfolioVol = Math.sqrt(Math.max(0, quadraticForm(weights, cov)));

    // Portfolio log-return path → normalized cumulative value
    const curve: number[] = [INITIAL_CAPITAL];
    let cum = 0;
    for (const row of rows) {
      cum += weights.reduce((acc, w, i) => acc + w * row[i], 0);
      curve.push(INITIAL_CAPITAL * Math.exp(cum));
    }

    const assetStats: AssetStats[] = table.assets.map((asset, i) => {
      const vol = Math.sqrt(Math.max(0, cov[i][i]));
      return {
        asset,
        annualizedReturnPct: assetAnnualReturn[i] * 100,
        annualizedVolatilityPct: vol * 100,
        sharpeRatio: sharpe(assetAnnualReturn[i], vol, riskFreeRateAnnual),
        maxDrawdown: maxDrawdown(column(table.prices, i)),
      };
    });

    return success({
      annualizedReturnPct: portfolioReturn * 100,
      annualizedVolatilityPct: portfolioVol * 100,
      sharpeRatio: sharpe(portfolioReturn, portfolioVol, riskFreeRateAnnual),
      correlation: this.correlationMatrix(table.assets, rows),
      maxDrawdown: maxDrawdown(curve),
      riskFreeRate: riskFreeRateAnnual,
      observations: rows.length,
      assetStats,
    });
  }

  /**
   * Pearson matrix on daily log returns.
   * Diagonal fixed at 1; each pair computed once and mirrored.
   */
  correlationMatrix(assets: readonly AssetId[], rows: readonly (readonly number[])[]): CorrelationMatrix {
    const n = assets.length;
    const matrix: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    const undefinedPairs: [AssetId, AssetId][] = [];
    const cols = Array.from({ length: n }, (_, i) => column(rows, i));

    for (let i = 0; i < n; i++) {
      matrix[i][i] = 1;
      for (let j = i + 1; j < n; j++) {
        const c = pearsonCorrelation(cols[i], cols[j]);
        if (c === null) {
          undefinedPairs.push([assets[i], assets[j]]);
        }
        matrix[i][j] = c ?? 0;
        matrix[j][i] = c ?? 0;
      }
    }

    return { assets, matrix, undefinedPairs };
  }
}

// Singleton
let instance: RiskMetricsService | null = null;

export function getRiskMetricsService(): RiskMetricsService {
  if (!instance) {
    instance = new RiskMetricsService();
  }
  return instance;
}

export function computeMetrics(
  table: AlignedPriceTable,
  weights: WeightVector,
  riskFreeRateAnnual = 0
): EngineResult<MetricsResult> {
  return getRiskMetricsService().computeMetrics(table, weights, riskFreeRateAnnual);
}
