/**
 * Request schemas for the portfolio API (zod).
 * Weight range and sum are left to the engine so its INVALID_WEIGHTS
 * error (with the actual sum) reaches the caller.
 */

import { z } from 'zod';
import { isSupportedSymbol } from '../../market-data/market_data.contract.js';

const PricePointSchema = z.object({
  date: z.string().min(1),
  close: z.number(),
});

export const RawInputSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('prices'),
    series: z.array(z.object({
      asset: z.string().min(1),
      points: z.array(PricePointSchema),
    })).min(1),
  }),
  z.object({
    kind: z.literal('returns'),
    assets: z.array(z.string().min(1)).min(1),
    baseDate: z.string().min(1),
    dates: z.array(z.string().min(1)),
    returns: z.array(z.array(z.number())),
  }),
]);

export const FrequencySchema = z.enum(['none', 'daily', 'weekly', 'monthly']);
export const BoundaryRuleSchema = z.enum(['calendar', 'stride']);

const WeightsSchema = z.array(z.number());
const RiskFreeRateSchema = z.number().min(0).max(1);

const SymbolSchema = z.string().refine(isSupportedSymbol, { message: 'Unsupported asset' });

export const ValidateWeightsBodySchema = z.object({
  weights: WeightsSchema,
});

export const MetricsBodySchema = z.object({
  input: RawInputSchema,
  weights: WeightsSchema,
  riskFreeRate: RiskFreeRateSchema.optional(),
});

export const SimulateBodySchema = z.object({
  input: RawInputSchema,
  weights: WeightsSchema,
  frequency: FrequencySchema,
  boundaryRule: BoundaryRuleSchema.optional(),
});

export const AnalyzeBodySchema = z.object({
  assets: z.array(SymbolSchema).min(1),
  lookbackDays: z.number().int().min(2).max(3650).default(365),
  weights: WeightsSchema,
  frequency: FrequencySchema.default('weekly'),
  boundaryRule: BoundaryRuleSchema.optional(),
  riskFreeRate: RiskFreeRateSchema.optional(),
});

const csv = (s: string) => s.split(',').map(v => v.trim()).filter(v => v.length > 0);

export const ReportQuerySchema = z.object({
  assets: z.string().default('BTC,ETH,SOL').transform(csv).pipe(z.array(SymbolSchema).min(1)),
  weights: z.string().default('0.4,0.3,0.3').transform(s => csv(s).map(Number)),
  days: z.coerce.number().int().min(2).max(3650).default(365),
  frequency: FrequencySchema.default('weekly'),
  boundaryRule: BoundaryRuleSchema.optional(),
  riskFreeRate: z.coerce.number().min(0).max(1).optional(),
});
