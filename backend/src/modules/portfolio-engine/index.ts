/**
 * PORTFOLIO ENGINE MODULE
 *
 * Price alignment, log-returns, allocation checks, risk/return metrics
 * and the rebalancing simulator. Synchronous and I/O-free except for
 * the analysis orchestrator (market data) and report writer (fs).
 */

// Contracts
export * from './contracts/engine_result.contract.js';
export * from './contracts/portfolio.contract.js';
export * from './contracts/analysis.contract.js';

// Services
export { alignPrices, getPriceAlignerService } from './services/price_aligner.service.js';
export { computeLogReturns, getReturnsService } from './services/returns.service.js';
export { validateWeights, checkDimensions, equalWeights } from './services/allocation_validator.service.js';
export {
  computeMetrics,
  getRiskMetricsService,
  maxDrawdown,
  pearsonCorrelation,
  covarianceMatrix,
} from './services/risk_metrics.service.js';
export { rebalanceBoundaries } from './services/rebalance_schedule.js';
export { simulate, getRebalancingSimulatorService } from './services/rebalancing_simulator.service.js';
export { analyzeTable, PortfolioAnalysisService } from './services/portfolio_analysis.service.js';
export { buildPortfolioReport, writePortfolioReport } from './services/portfolio_report.service.js';

// Routes
export { portfolioRoutes } from './routes/portfolio.routes.js';
