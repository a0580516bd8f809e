/**
 * PORTFOLIO ANALYSIS — Contract
 *
 * Request/response shapes for the metrics + simulation bundle.
 */

import type {
  AssetId,
  BoundaryRule,
  MetricsResult,
  RebalancingFrequency,
  SimulationResult,
  WeightVector,
} from './portfolio.contract.js';

export interface AnalysisParams {
  weights: WeightVector;
  frequency: RebalancingFrequency;
  boundaryRule?: BoundaryRule;
  riskFreeRate?: number;
}

export interface AnalysisRequest extends AnalysisParams {
  assets: readonly AssetId[];
  lookbackDays: number;
}

/** Last aligned close and its move against the previous aligned close */
export interface LatestPrice {
  asset: AssetId;
  date: string;
  close: number;
  previousClose: number;
  changePct: number;
}

export interface PortfolioAnalysis {
  assets: readonly AssetId[];
  period: {
    from: string;
    to: string;
    observations: number;
  };
  weights: WeightVector;
  metrics: MetricsResult;
  simulation: SimulationResult;
  /** Each asset normalized to 1.0 at the first date, same index as simulation */
  assetCurves: number[][];
  latestPrices: LatestPrice[];
}
