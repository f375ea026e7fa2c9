import path from 'node:path';
import { createApp } from './app.js';
import { loadDataSources } from './config/datasources.js';
import { env } from './config/env.js';
import { ConnectionManager } from './core/pool-manager.js';
import { ValidatorRegistry } from './modules/validation/validator-registry.js';

const dataSources = loadDataSources(path.resolve(env.DATASOURCES_FILE));
const connections = new ConnectionManager();
const registry = new ValidatorRegistry(dataSources, connections, {
  cacheTtlSeconds: env.SCHEMA_CACHE_TTL,
  statementTimeoutMs: env.PROBE_TIMEOUT_MS
});

const app = createApp({
  registry,
  corsOrigin: env.CORS_ORIGIN,
  rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, maxRequests: env.RATE_LIMIT_MAX_REQUESTS }
});

const server = app.listen(Number(env.PORT), () => {
  console.log(`🚀 Server running in ${env.NODE_ENV} mode on port ${env.PORT} (${dataSources.size} data sources)`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down`);
  server.close();
  registry.close();
  await connections.closeAll();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}
