import { applySchema, closePool, getPool } from '@taxi-analytics/adapters';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { createAppDeps } from './container.js';

async function main() {
  const config = loadConfig();

  // Verify DB connection and create tables
  await getPool().query('SELECT 1');
  console.log('[server] database connected');
  await applySchema();

  const deps = createAppDeps(config);
  if (!deps.aiConfigured) {
    console.warn(`[server] AI provider "${config.ai.provider}" has no credentials; processing is disabled`);
  }

  const app = buildApp(deps);
  const httpServer = app.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
