import { describe, it, expect } from 'vitest';
import {
  computeMetrics,
  covarianceMatrix,
  maxDrawdown,
  pearsonCorrelation,
} from '../services/risk_metrics.service.js';
import { simulate } from '../services/rebalancing_simulator.service.js';
import { dailyDates, tableOf } from './fixtures.js';

function sampleStd(xs: number[]): number {
  const m = xs.reduce((a, b) => a + b, 0) / xs.length;
  return Math.sqrt(xs.reduce((acc, x) => acc + (x - m) * (x - m), 0) / (xs.length - 1));
}

describe('Risk/Return Statistics Engine', () => {

  describe('helpers', () => {

    it('maxDrawdown returns the deepest peak-to-trough fall', () => {
      expect(maxDrawdown([100, 120, 90, 150, 135])).toBe(-0.25);
      expect(maxDrawdown([1, 2, 3])).toBe(0);
      expect(maxDrawdown([])).toBe(0);
    });

    it('covarianceMatrix uses the n-1 denominator', () => {
      expect(covarianceMatrix([[1, 2], [3, 6]])).toEqual([[2, 4], [4, 8]]);
    });

    it('covarianceMatrix of a single observation is all zeros', () => {
      expect(covarianceMatrix([[0.1, 0.2]])).toEqual([[0, 0], [0, 0]]);
    });

    it('pearsonCorrelation is null when a side has zero variance', () => {
      expect(pearsonCorrelation([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
      expect(pearsonCorrelation([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 12);
      expect(pearsonCorrelation([1, 2, 3], [5, 5, 5])).toBeNull();
    });
  });

  describe('computeMetrics', () => {

    it('annualizes a single-asset portfolio with 365 days', () => {
      const prices = [100, 110, 99, 108.9];
      const table = tableOf(dailyDates('2024-01-01', 4), { BTC: prices });
      const r = [Math.log(110 / 100), Math.log(99 / 110), Math.log(108.9 / 99)];
      const annualReturn = (r.reduce((a, b) => a + b, 0) / 3) * 365;
      const annualVol = sampleStd(r) * Math.sqrt(365);

      const result = computeMetrics(table, [1], 0.02);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.annualizedReturnPct).toBeCloseTo(annualReturn * 100, 9);
      expect(result.value.annualizedVolatilityPct).toBeCloseTo(annualVol * 100, 9);
      expect(result.value.sharpeRatio).toBeCloseTo((annualReturn - 0.02) / annualVol, 9);
      expect(result.value.maxDrawdown).toBeCloseTo(-0.1, 12);
      expect(result.value.observations).toBe(3);
      expect(result.value.riskFreeRate).toBe(0.02);
    });

    it('combines asset returns linearly and volatility through covariance', () => {
      const table = tableOf(dailyDates('2024-01-01', 4), {
        BTC: [100, 110, 99, 108.9],
        ETH: [50, 52, 51, 55],
      });
      const rb = [Math.log(110 / 100), Math.log(99 / 110), Math.log(108.9 / 99)];
      const re = [Math.log(52 / 50), Math.log(51 / 52), Math.log(55 / 51)];
      const w = [0.6, 0.4];
      const mean = (xs: number[]) => xs.reduce((a, b) => a + b, 0) / xs.length;
      const cov = (x: number[], y: number[]) =>
        x.reduce((acc, xi, i) => acc + (xi - mean(x)) * (y[i] - mean(y)), 0) / (x.length - 1);

      const expectedReturn = (w[0] * mean(rb) + w[1] * mean(re)) * 365;
      const expectedVar = 365 * (
        w[0] * w[0] * cov(rb, rb) + 2 * w[0] * w[1] * cov(rb, re) + w[1] * w[1] * cov(re, re)
      );

      const result = computeMetrics(table, w);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.annualizedReturnPct).toBeCloseTo(expectedReturn * 100, 9);
      expect(result.value.annualizedVolatilityPct).toBeCloseTo(Math.sqrt(expectedVar) * 100, 9);
      expect(result.value.assetStats.map(s => s.asset)).toEqual(['BTC', 'ETH']);
      expect(result.value.assetStats[1].annualizedReturnPct).toBeCloseTo(mean(re) * 365 * 100, 9);
    });

    it('produces a symmetric correlation matrix with an exact unit diagonal', () => {
      const table = tableOf(dailyDates('2024-01-01', 6), {
        BTC: [100, 103, 101, 107, 104, 110],
        ETH: [50, 49, 52, 53, 51, 54],
        SOL: [20, 22, 21, 20, 23, 22],
      });

      const result = computeMetrics(table, [0.4, 0.3, 0.3]);
      if (!result.ok) throw new Error(result.error.message);
      const { matrix, undefinedPairs } = result.value.correlation;

      for (let i = 0; i < 3; i++) {
        expect(matrix[i][i]).toBe(1);
        for (let j = 0; j < 3; j++) {
          expect(matrix[i][j]).toBe(matrix[j][i]);
          expect(Math.abs(matrix[i][j])).toBeLessThanOrEqual(1);
        }
      }
      expect(undefinedPairs).toEqual([]);
    });

    it('reports perfectly opposed assets as -1', () => {
      const table = tableOf(dailyDates('2024-01-01', 4), {
        UP: [100, 200, 100, 200],
        DOWN: [100, 50, 100, 50],
      });

      const result = computeMetrics(table, [0.5, 0.5]);
      if (!result.ok) throw new Error(result.error.message);

      expect(result.value.correlation.matrix[0][1]).toBeCloseTo(-1, 12);
    });

    it('treats two timestamps as one return with no measurable dispersion', () => {
      const table = tableOf(['2024-01-01', '2024-01-02'], { BTC: [100, 110] });

      const result = computeMetrics(table, [1]);
      if (!result.ok) throw new Error(result.error.message);

      expect(result.value.annualizedVolatilityPct).toBe(0);
      expect(result.value.sharpeRatio).toBe(0);
      expect(result.value.annualizedReturnPct).toBeCloseTo(Math.log(1.1) * 365 * 100, 9);
    });

    it('agrees with the simulated value path for a single asset', () => {
      const table = tableOf(dailyDates('2024-01-01', 5), { BTC: [100, 120, 80, 90, 130] });

      const metrics = computeMetrics(table, [1]);
      const sim = simulate(table, [1], 'none');
      if (!metrics.ok || !sim.ok) throw new Error('unexpected failure');

      expect(metrics.value.maxDrawdown).toBeCloseTo(sim.value.summary.maxDrawdown, 12);
      expect(metrics.value.maxDrawdown).toBeCloseTo(-1 / 3, 12);
    });

    it('differs from the simulated drawdown once several assets drift apart', () => {
      const table = tableOf(dailyDates('2024-01-01', 3), {
        UP: [100, 200, 100],
        DOWN: [100, 50, 100],
      });

      const metrics = computeMetrics(table, [0.5, 0.5]);
      const sim = simulate(table, [0.5, 0.5], 'none');
      if (!metrics.ok || !sim.ok) throw new Error('unexpected failure');

      // log returns cancel each step; held units do not
      expect(metrics.value.maxDrawdown).toBeCloseTo(0, 12);
      expect(sim.value.summary.maxDrawdown).toBeCloseTo(-0.2, 12);
    });

    it('signals INVALID_SERIES for an unparseable date', () => {
      const result = computeMetrics({ assets: ['BTC'], dates: ['2024-01-01', 'later'], prices: [[1], [2]] }, [1]);
      expect(!result.ok && result.error.code).toBe('INVALID_SERIES');
    });

    it('checks weights before anything else', () => {
      const table = tableOf(['2024-01-01'], { BTC: [100] });
      const result = computeMetrics(table, [0.5, 0.6]);
      expect(!result.ok && result.error.code).toBe('INVALID_WEIGHTS');
    });

    it('signals DIMENSION_MISMATCH', () => {
      const table = tableOf(dailyDates('2024-01-01', 3), { BTC: [1, 2, 3], ETH: [1, 2, 3] });
      const result = computeMetrics(table, [1]);
      expect(!result.ok && result.error.code).toBe('DIMENSION_MISMATCH');
    });

    it('signals INSUFFICIENT_HISTORY for a single timestamp', () => {
      const table = tableOf(['2024-01-01'], { BTC: [100], ETH: [50] });
      const result = computeMetrics(table, [0.5, 0.5]);
      expect(!result.ok && result.error.code).toBe('INSUFFICIENT_HISTORY');
    });

    it('signals INVALID_PRICE instead of defaulting to zero', () => {
      const table = tableOf(dailyDates('2024-01-01', 3), { BTC: [100, 0, 120] });
      const result = computeMetrics(table, [1]);
      expect(!result.ok && result.error.code).toBe('INVALID_PRICE');
    });

    it('is bit-identical across repeated calls', () => {
      const table = tableOf(dailyDates('2024-01-01', 6), {
        BTC: [100, 103, 101, 107, 104, 110],
        ETH: [50, 49, 52, 53, 51, 54],
      });

      const first = computeMetrics(table, [0.7, 0.3], 0.01);
      const second = computeMetrics(table, [0.7, 0.3], 0.01);

      expect(second).toStrictEqual(first);
      if (!first.ok || !second.ok) throw new Error('unexpected failure');
      expect(Object.is(first.value.sharpeRatio, second.value.sharpeRatio)).toBe(true);
      expect(Object.is(first.value.annualizedVolatilityPct, second.value.annualizedVolatilityPct)).toBe(true);
    });
  });
});
