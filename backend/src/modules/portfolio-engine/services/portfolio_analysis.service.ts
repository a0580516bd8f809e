/**
 * PORTFOLIO ANALYSIS ORCHESTRATOR
 *
 * Weights are checked before any fetch; metrics and simulation then run
 * independently over the same aligned table.
 */

import type { AnalysisParams, AnalysisRequest, PortfolioAnalysis } from '../contracts/analysis.contract.js';
import type { AlignedPriceTable } from '../contracts/portfolio.contract.js';
import { EngineResult, success } from '../contracts/engine_result.contract.js';
import type { DataQuality, MarketDataResult } from '../../market-data/market_data.contract.js';
import type { MarketDataService } from '../../market-data/market_data.service.js';
import { checkDimensions, validateWeights } from './allocation_validator.service.js';
import { getReturnsService } from './returns.service.js';
import { computeMetrics } from './risk_metrics.service.js';
import { simulate } from './rebalancing_simulator.service.js';

export interface FetchedAnalysis {
  analysis: PortfolioAnalysis;
  quality: DataQuality;
}

/**
 * Pure path: caller-supplied table, no cache, no I/O
 */
export function analyzeTable(
  table: AlignedPriceTable,
  params: AnalysisParams
): EngineResult<PortfolioAnalysis> {
  const metrics = computeMetrics(table, params.weights, params.riskFreeRate ?? 0);
  if (!metrics.ok) return metrics;

  const simulation = simulate(table, params.weights, params.frequency, {
    boundaryRule: params.boundaryRule,
  });
  if (!simulation.ok) return simulation;

  return success({
    assets: table.assets,
    period: {
      from: table.dates[0],
      to: table.dates[table.dates.length - 1],
      observations: table.dates.length,
    },
    weights: params.weights,
    metrics: metrics.value,
    simulation: simulation.value,
    assetCurves: getReturnsService().cumulativeAssetValues(table),
    latestPrices: getReturnsService().latestPrices(table),
  });
}

export class PortfolioAnalysisService {

  constructor(private readonly marketData: MarketDataService) {}

  async analyze(req: AnalysisRequest): Promise<MarketDataResult<FetchedAnalysis>> {
    const valid = validateWeights(req.weights);
    if (!valid.ok) return valid;

    const dims = checkDimensions(req.weights, req.assets.length);
    if (!dims.ok) return dims;

    const fetched = await this.marketData.fetchAlignedSeries(req.assets, req.lookbackDays);
    if (!fetched.ok) return fetched;

    const result = analyzeTable(fetched.value.table, req);
    if (!result.ok) return result;

    console.log(
      `[Portfolio] Analyzed ${req.assets.join(',')} ${req.frequency}: ` +
      `return=${result.value.metrics.annualizedReturnPct.toFixed(2)}% ` +
      `vol=${result.value.metrics.annualizedVolatilityPct.toFixed(2)}% ` +
      `rebalances=${result.value.simulation.summary.rebalanceCount}`
    );

    return { ok: true, value: { analysis: result.value, quality: fetched.value.quality } };
  }
}
