/**
 * Portfolio Engine — API Routes
 *
 * Endpoints:
 *   GET  /api/portfolio/v1/schema            — Assets, frequencies, error codes
 *   POST /api/portfolio/v1/validate-weights  — Allocation check
 *   POST /api/portfolio/v1/metrics           — Risk/return stats on supplied data
 *   POST /api/portfolio/v1/simulate          — Rebalancing simulation on supplied data
 *   POST /api/portfolio/v1/analyze           — Fetch + metrics + simulation
 *   GET  /api/portfolio/v1/report            — Plain-text report
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ZodTypeAny, output } from 'zod';
import { AppError, fromEngineError } from '../../../common/errors.js';
import { LOOKBACK_DAYS_OPTIONS, SUPPORTED_ASSETS } from '../../market-data/market_data.contract.js';
import { ENGINE_ERROR_CODES } from '../contracts/engine_result.contract.js';
import {
  ANNUALIZATION_FACTOR,
  BOUNDARY_RULES,
  REBALANCING_FREQUENCIES,
  WEIGHT_SUM_TOLERANCE_PCT,
} from '../contracts/portfolio.contract.js';
import { equalWeights, validateWeights } from '../services/allocation_validator.service.js';
import { PortfolioAnalysisService } from '../services/portfolio_analysis.service.js';
import { buildPortfolioReport } from '../services/portfolio_report.service.js';
import { getReturnsService } from '../services/returns.service.js';
import { computeMetrics } from '../services/risk_metrics.service.js';
import { simulate } from '../services/rebalancing_simulator.service.js';
import {
  AnalyzeBodySchema,
  MetricsBodySchema,
  ReportQuerySchema,
  SimulateBodySchema,
  ValidateWeightsBodySchema,
} from './portfolio.schemas.js';

export interface PortfolioRoutesOptions {
  analysis: PortfolioAnalysisService;
  defaultRiskFreeRate: number;
}

function parse<S extends ZodTypeAny>(schema: S, input: unknown): output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '), 400);
  }
  return parsed.data;
}

export async function portfolioRoutes(fastify: FastifyInstance, opts: PortfolioRoutesOptions): Promise<void> {
  const { analysis, defaultRiskFreeRate } = opts;
  const returnsService = getReturnsService();

  // ─────────────────────────────────────────────────────────
  // GET /api/portfolio/v1/schema
  // ─────────────────────────────────────────────────────────

  fastify.get('/api/portfolio/v1/schema', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      assets: SUPPORTED_ASSETS,
      lookbackDays: [...LOOKBACK_DAYS_OPTIONS],
      frequencies: [...REBALANCING_FREQUENCIES],
      boundaryRules: [...BOUNDARY_RULES],
      errorCodes: [...ENGINE_ERROR_CODES, 'UPSTREAM_UNAVAILABLE'],
      constants: {
        annualizationFactor: ANNUALIZATION_FACTOR,
        weightSumTolerancePct: WEIGHT_SUM_TOLERANCE_PCT,
        defaultRiskFreeRate,
      },
    });
  });

  // ─────────────────────────────────────────────────────────
  // POST /api/portfolio/v1/validate-weights
  // ─────────────────────────────────────────────────────────

  fastify.post('/api/portfolio/v1/validate-weights', async (request: FastifyRequest, reply: FastifyReply) => {
    const { weights } = parse(ValidateWeightsBodySchema, request.body);
    const result = validateWeights(weights);

    if (result.ok) {
      return reply.send({ ok: true, weights });
    }

    return reply.send({
      ok: false,
      error: result.error.code,
      message: result.error.message,
      details: result.error.details,
      suggestion: equalWeights(weights.length),
    });
  });

  // ─────────────────────────────────────────────────────────
  // POST /api/portfolio/v1/metrics
  // ─────────────────────────────────────────────────────────

  fastify.post('/api/portfolio/v1/metrics', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parse(MetricsBodySchema, request.body);

    const table = returnsService.resolveRawInput(body.input);
    if (!table.ok) throw fromEngineError(table.error);

    const metrics = computeMetrics(table.value, body.weights, body.riskFreeRate ?? defaultRiskFreeRate);
    if (!metrics.ok) throw fromEngineError(metrics.error);

    return reply.send({ ok: true, metrics: metrics.value });
  });

  // ─────────────────────────────────────────────────────────
  // POST /api/portfolio/v1/simulate
  // ─────────────────────────────────────────────────────────

  fastify.post('/api/portfolio/v1/simulate', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parse(SimulateBodySchema, request.body);

    const table = returnsService.resolveRawInput(body.input);
    if (!table.ok) throw fromEngineError(table.error);

    const sim = simulate(table.value, body.weights, body.frequency, { boundaryRule: body.boundaryRule });
    if (!sim.ok) throw fromEngineError(sim.error);

    return reply.send({ ok: true, simulation: sim.value });
  });

  // ─────────────────────────────────────────────────────────
  // POST /api/portfolio/v1/analyze
  // ─────────────────────────────────────────────────────────

  fastify.post('/api/portfolio/v1/analyze', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parse(AnalyzeBodySchema, request.body);

    const result = await analysis.analyze({
      ...body,
      riskFreeRate: body.riskFreeRate ?? defaultRiskFreeRate,
    });
    if (!result.ok) throw fromEngineError(result.error);

    return reply.send({
      ok: true,
      ...result.value.analysis,
      dataQuality: result.value.quality,
    });
  });

  // ─────────────────────────────────────────────────────────
  // GET /api/portfolio/v1/report
  // ─────────────────────────────────────────────────────────

  fastify.get('/api/portfolio/v1/report', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parse(ReportQuerySchema, request.query);

    const result = await analysis.analyze({
      assets: query.assets,
      lookbackDays: query.days,
      weights: query.weights,
      frequency: query.frequency,
      boundaryRule: query.boundaryRule,
      riskFreeRate: query.riskFreeRate ?? defaultRiskFreeRate,
    });
    if (!result.ok) throw fromEngineError(result.error);

    return reply
      .type('text/plain; charset=utf-8')
      .send(buildPortfolioReport(result.value.analysis, new Date()));
  });

  console.log('[Portfolio] Routes registered at /api/portfolio/v1/*');
}
