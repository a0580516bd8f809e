import { type Env, loadEnv } from '../src/config/env.js';
import { connectMongo, disconnectMongo } from '../src/db/mongoose.js';
import { createMarketDataService } from '../src/modules/market-data/index.js';
import {
  PortfolioAnalysisService,
  buildPortfolioReport,
  writePortfolioReport,
} from '../src/modules/portfolio-engine/index.js';

async function main() {
  const env = loadEnv();
  if (env.MONGO_URI) await connectMongo(env.MONGO_URI);

  try {
    await generate(env);
  } finally {
    await disconnectMongo();
  }
}

async function generate(env: Env) {
  console.log('Generating portfolio report...');
  const service = new PortfolioAnalysisService(createMarketDataService(env));

  const result = await service.analyze({
    assets: ['BTC', 'ETH', 'SOL'],
    lookbackDays: 365,
    weights: [0.4, 0.3, 0.3],
    frequency: 'weekly',
    riskFreeRate: env.DEFAULT_RISK_FREE_RATE,
  });

  if (!result.ok) {
    throw new Error(`${result.error.code}: ${result.error.message}`);
  }

  const now = new Date();
  const file = writePortfolioReport(env.REPORT_DIR, buildPortfolioReport(result.value.analysis, now), now);
  console.log('Report saved to', file);
}

main().catch(e => {
  console.error('Error:', e);
  process.exit(1);
});
