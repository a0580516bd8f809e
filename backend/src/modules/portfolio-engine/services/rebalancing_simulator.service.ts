/**
 * REBALANCING SIMULATOR
 *
 * Walks the aligned table once, carrying per-asset unit holdings.
 *
 *   t0        q_i = w_i / P_i(t0)                 value = 1.0
 *   drift     q carried                           value = Σ q_i · P_i(t)
 *   boundary  value from carried q, then          q_i = value · w_i / P_i(t)
 *
 * Rebalancing is frictionless: value is unchanged across a reset.
 */

import type {
  AlignedPriceTable,
  QuantityState,
  RebalancingFrequency,
  SimulationOptions,
  SimulationResult,
  WeightVector,
} from '../contracts/portfolio.contract.js';
import { INITIAL_CAPITAL } from '../contracts/portfolio.contract.js';
import { EngineResult, failure, success } from '../contracts/engine_result.contract.js';
import { checkDimensions, validateWeights } from './allocation_validator.service.js';
import { rebalanceBoundaries } from './rebalance_schedule.js';
import { checkTableShape } from './table_guard.js';
import { maxDrawdown } from './risk_metrics.service.js';

export class RebalancingSimulatorService {

  simulate(
    table: AlignedPriceTable,
    weights: WeightVector,
    frequency: RebalancingFrequency,
    options: SimulationOptions = {}
  ): EngineResult<SimulationResult> {
    const boundaryRule = options.boundaryRule ?? 'calendar';

    const valid = validateWeights(weights);
    if (!valid.ok) return valid;

    const dims = checkDimensions(weights, table.assets.length);
    if (!dims.ok) return dims;

    const shape = checkTableShape(table);
    if (!shape.ok) return shape;

    const m = table.dates.length;
    if (m < 1) {
      return failure('INSUFFICIENT_HISTORY', 'Price table has no timestamps', { rows: m });
    }

    const priceCheck = this.checkPrices(table);
    if (!priceCheck.ok) return priceCheck;

    const n = table.assets.length;
    const boundaries = rebalanceBoundaries(table.dates, frequency, boundaryRule);

    // Current holdings, updated in place; snapshots go to the output
    const q = new Float64Array(n);
    const p0 = table.prices[0];
    for (let i = 0; i < n; i++) {
      q[i] = (INITIAL_CAPITAL * weights[i]) / p0[i];
    }

    const values: number[] = [INITIAL_CAPITAL];
    const quantities: QuantityState[] = [Array.from(q)];
    const rebalanceDates: string[] = [];

    for (let t = 1; t < m; t++) {
      const prices = table.prices[t];

      let value = 0;
      for (let i = 0; i < n; i++) value += q[i] * prices[i];

      if (boundaries[t]) {
        for (let i = 0; i < n; i++) {
          q[i] = (value * weights[i]) / prices[i];
        }
        rebalanceDates.push(table.dates[t]);
      }

      values.push(value);
      quantities.push(Array.from(q));
    }

    const finalValue = values[values.length - 1];

    return success({
      assets: table.assets,
      dates: table.dates,
      frequency,
      boundaryRule,
      values,
      quantities,
      rebalanceDates,
      summary: {
        finalValue,
        totalReturnPct: (finalValue / INITIAL_CAPITAL - 1) * 100,
        maxDrawdown: maxDrawdown(values),
        rebalanceCount: rebalanceDates.length,
      },
    });
  }

  /**
   * Dollar weight of each asset at each date
   */
  impliedWeights(result: SimulationResult, table: AlignedPriceTable): number[][] {
    return result.quantities.map((q, t) =>
      q.map((units, i) => (units * table.prices[t][i]) / result.values[t])
    );
  }

  private checkPrices(table: AlignedPriceTable): EngineResult<true> {
    for (let t = 0; t < table.prices.length; t++) {
      const row = table.prices[t];
      for (let i = 0; i < row.length; i++) {
        if (!Number.isFinite(row[i]) || row[i] <= 0) {
          return failure('INVALID_PRICE', `Non-positive price for ${table.assets[i]} at ${table.dates[t]}`, {
            asset: table.assets[i],
            date: table.dates[t],
            price: row[i],
          });
        }
      }
    }
    return success(true);
  }
}

// Singleton
let instance: RebalancingSimulatorService | null = null;

export function getRebalancingSimulatorService(): RebalancingSimulatorService {
  if (!instance) {
    instance = new RebalancingSimulatorService();
  }
  return instance;
}

export function simulate(
  table: AlignedPriceTable,
  weights: WeightVector,
  frequency: RebalancingFrequency,
  options?: SimulationOptions
): EngineResult<SimulationResult> {
  return getRebalancingSimulatorService().simulate(table, weights, frequency, options);
}
