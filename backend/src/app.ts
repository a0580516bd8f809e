import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Env } from './config/env.js';
import { AppError } from './common/errors.js';
import type { MarketDataService } from './modules/market-data/market_data.service.js';
import { marketDataRoutes } from './modules/market-data/market_data.routes.js';
import { PortfolioAnalysisService } from './modules/portfolio-engine/services/portfolio_analysis.service.js';
import { portfolioRoutes } from './modules/portfolio-engine/routes/portfolio.routes.js';

export interface AppDeps {
  env: Env;
  marketData: MarketDataService;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const { env, marketData } = deps;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        details: err.details,
      });
    }

    app.log.error(err);

    // Fastify validation / parse errors
    if (err.validation || err.statusCode === 400) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
  }));

  app.register(marketDataRoutes, { marketData });
  app.register(portfolioRoutes, {
    analysis: new PortfolioAnalysisService(marketData),
    defaultRiskFreeRate: env.DEFAULT_RISK_FREE_RATE,
  });

  return app;
}
