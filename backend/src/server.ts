import { buildApp } from './app.js';
import { loadEnv } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { createMarketDataService } from './modules/market-data/index.js';

async function main(): Promise<void> {
  const env = loadEnv();

  if (env.MONGO_URI) {
    await connectMongo(env.MONGO_URI);
  } else {
    console.warn('[BOOT] MONGO_URI not set, closes kept in memory only');
  }

  const app = buildApp({ env, marketData: createMarketDataService(env) });

  const shutdown = async (signal: string) => {
    app.log.info(`${signal} received, shutting down`);
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(e => {
        console.error('[BOOT] Shutdown failed:', e);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch(e => {
  console.error('[BOOT] Fatal:', e);
  process.exit(1);
});
