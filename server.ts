import { env } from './src/config/env.js';
import { requireDatabaseUrl } from './src/config/loadEnv.js';
import { createPool } from './src/db/pool.js';
import { buildApp } from './src/app.js';
import { LargeObjectStore } from './src/largeObjects/store.js';

if (env.nodeEnv === 'production' && !env.apiAdminToken) {
  throw new Error('API_ADMIN_TOKEN is required in production');
}

const pool = createPool(requireDatabaseUrl(env));
pool.on('error', (error) => {
  console.warn('[db] idle client error', error);
});

const store = new LargeObjectStore(pool, env.largeObjects);
const server = await buildApp({
  store,
  apiAdminToken: env.apiAdminToken,
  logger: env.nodeEnv === 'development',
  production: env.nodeEnv === 'production',
});

const stop = async () => {
  await server.close();
  await pool.end();
};

const shutdown = (signal: NodeJS.Signals) => {
  stop().then(
    () => process.exit(0),
    (error: unknown) => {
      console.warn(`[server] shutdown after ${signal} failed`, error);
      process.exit(1);
    },
  );
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

await server.listen({ port: env.port, host: env.host });
console.log(`Large object API listening on ${env.port}`);
