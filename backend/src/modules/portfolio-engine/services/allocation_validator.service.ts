/**
 * ALLOCATION VALIDATOR
 *
 * Weights must each lie in [0,1] and sum to 100% ± 0.01pp.
 * Never corrects the vector; the caller decides what to do with the
 * reported sum (equalWeights is offered for that).
 */

import type { WeightVector } from '../contracts/portfolio.contract.js';
import { WEIGHT_SUM_TOLERANCE_PCT } from '../contracts/portfolio.contract.js';
import { EngineResult, failure, success } from '../contracts/engine_result.contract.js';

export function validateWeights(weights: WeightVector): EngineResult<WeightVector> {
  if (weights.length === 0) {
    return failure('INVALID_WEIGHTS', 'Weight vector is empty', { sum: 0, sumPct: 0 });
  }

  const sum = weights.reduce((a, b) => a + b, 0);
  const sumPct = sum * 100;

  for (let i = 0; i < weights.length; i++) {
    const w = weights[i];
    if (!Number.isFinite(w) || w < 0 || w > 1) {
      return failure('INVALID_WEIGHTS', `Weight at index ${i} is outside [0, 1]: ${w}`, {
        index: i,
        weight: w,
        sum,
        sumPct,
      });
    }
  }

  if (sumPct < 100 - WEIGHT_SUM_TOLERANCE_PCT || sumPct > 100 + WEIGHT_SUM_TOLERANCE_PCT) {
    return failure('INVALID_WEIGHTS', `The sum of weights must equal 100%. Current sum: ${sumPct.toFixed(2)}%`, {
      sum,
      sumPct,
    });
  }

  return success(weights);
}

export function checkDimensions(weights: WeightVector, assetCount: number): EngineResult<true> {
  if (weights.length !== assetCount) {
    return failure('DIMENSION_MISMATCH', `Got ${weights.length} weights for ${assetCount} assets`, {
      weights: weights.length,
      assets: assetCount,
    });
  }
  return success(true);
}

export function equalWeights(n: number): number[] {
  if (n <= 0) return [];
  return new Array<number>(n).fill(1 / n);
}
