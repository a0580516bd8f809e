/**
 * PORTFOLIO ENGINE — Core Contract
 *
 * Types shared by the aligner, return calculator, statistics engine
 * and rebalancing simulator. All values are treated as immutable.
 */

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

/** Crypto trades 24/7: annualize with calendar days */
export const ANNUALIZATION_FACTOR = 365;

/** Allowed deviation of the weight sum, in percentage points */
export const WEIGHT_SUM_TOLERANCE_PCT = 0.01;

/** Post-rebalance allocation check tolerance */
export const REBALANCE_WEIGHT_TOLERANCE = 1e-6;

export const INITIAL_CAPITAL = 1.0;

// ═══════════════════════════════════════════════════════════════
// PRICES
// ═══════════════════════════════════════════════════════════════

export type AssetId = string;

export interface PricePoint {
  date: string;   // ISO-8601, YYYY-MM-DD or full timestamp
  close: number;
}

export interface AssetPriceSeries {
  asset: AssetId;
  points: readonly PricePoint[];
}

/**
 * prices[t][i] is the close of assets[i] at dates[t].
 * Every cell is present; at least one row.
 */
export interface AlignedPriceTable {
  readonly assets: readonly AssetId[];
  readonly dates: readonly string[];
  readonly prices: readonly (readonly number[])[];
}

/**
 * returns[k][i] = ln(P_i(k+1) / P_i(k)); dates[k] is the later date of the pair.
 */
export interface ReturnTable {
  readonly assets: readonly AssetId[];
  readonly dates: readonly string[];
  readonly returns: readonly (readonly number[])[];
}

/**
 * Input as received at the boundary. Resolved once into an AlignedPriceTable.
 */
export type RawInput =
  | { kind: 'prices'; series: readonly AssetPriceSeries[] }
  | {
      kind: 'returns';
      assets: readonly AssetId[];
      baseDate: string;
      dates: readonly string[];
      returns: readonly (readonly number[])[];
    };

// ═══════════════════════════════════════════════════════════════
// ALLOCATION & SCHEDULE
// ═══════════════════════════════════════════════════════════════

export type WeightVector = readonly number[];

export type RebalancingFrequency = 'none' | 'daily' | 'weekly' | 'monthly';

export const REBALANCING_FREQUENCIES: readonly RebalancingFrequency[] = [
  'none', 'daily', 'weekly', 'monthly',
];

/**
 * calendar — first timestamp of a new UTC day / ISO week / calendar month
 * stride   — fixed 1 / 7 / 30 day strides counted from the first timestamp
 */
export type BoundaryRule = 'calendar' | 'stride';

export const BOUNDARY_RULES: readonly BoundaryRule[] = ['calendar', 'stride'];

export const STRIDE_DAYS: Record<Exclude<RebalancingFrequency, 'none'>, number> = {
  daily: 1,
  weekly: 7,
  monthly: 30,
};

export type QuantityState = readonly number[];

// ═══════════════════════════════════════════════════════════════
// SIMULATION OUTPUT
// ═══════════════════════════════════════════════════════════════

export interface SimulationSummary {
  finalValue: number;
  totalReturnPct: number;
  maxDrawdown: number;
  rebalanceCount: number;
}

export interface SimulationResult {
  assets: readonly AssetId[];
  dates: readonly string[];
  frequency: RebalancingFrequency;
  boundaryRule: BoundaryRule;
  values: readonly number[];
  quantities: readonly QuantityState[];
  rebalanceDates: readonly string[];
  summary: SimulationSummary;
}

export interface SimulationOptions {
  boundaryRule?: BoundaryRule;
}

// ═══════════════════════════════════════════════════════════════
// METRICS OUTPUT
// ═══════════════════════════════════════════════════════════════

export interface CorrelationMatrix {
  assets: readonly AssetId[];
  matrix: readonly (readonly number[])[];
  /** Pairs where one side has zero variance; reported as 0 in matrix */
  undefinedPairs: readonly [AssetId, AssetId][];
}

export interface AssetStats {
  asset: AssetId;
  annualizedReturnPct: number;
  annualizedVolatilityPct: number;
  sharpeRatio: number;
  maxDrawdown: number;
}

export interface MetricsResult {
  annualizedReturnPct: number;
  annualizedVolatilityPct: number;
  sharpeRatio: number;
  correlation: CorrelationMatrix;
  /**
   * Fraction, <= 0. Taken on exp(cumsum(w·r)), a constant-weight log-return
   * path. Equals simulation.summary.maxDrawdown only for a single asset.
   */
  maxDrawdown: number;
  riskFreeRate: number;
  observations: number;
  assetStats: readonly AssetStats[];
}
