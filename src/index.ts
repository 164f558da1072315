/**
 * Application Entry Point
 *
 * Startup:
 * 1. Load and validate configuration (every problem reported at once)
 * 2. Ensure the clients table exists (failure is logged, not fatal)
 * 3. Wire Pluggy client + store into the connect flow
 * 4. Start the Express server
 *
 * Shutdown (SIGTERM/SIGINT): wait for in-flight requests, close the pool, exit.
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { ConfigurationError, loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { ConnectFlow } from './connect/flow.js';
import { PluggyClient } from './pluggy/client.js';
import { PgClientStore } from './store/client-store.js';
import { closeServer, createApp } from './web/server.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('[startup] Configuration incomplete:');
      for (const issue of error.issues) {
        console.error(`[startup]   ${issue.key} (${issue.problem}): ${issue.detail}`);
      }
      console.error('[startup] Copy .env.example to .env and fill in the required values.');
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();
  console.log('[startup] Financefly Connector starting...');
  console.log('[startup] Environment:', config.appEnv);
  console.log('[startup] Pluggy API:', config.pluggy.baseUrl);
  console.log('[startup] Database:', { host: config.database.host, port: config.database.port, sslMode: config.database.sslMode });

  const store = new PgClientStore(config.database);
  try {
    await store.ensureSchema();
  } catch (error) {
    // Keep serving: saves will report the store as unavailable until the DB is back.
    console.error('[startup] Database not ready:', error instanceof Error ? error.message : error);
  }

  const flow = new ConnectFlow({
    tokens: new PluggyClient(config.pluggy),
    store,
  });

  const app = createApp({
    flow,
    sessionSecret: config.server.sessionSecret,
    secureCookies: !config.isDev,
  });

  const server = app.listen(config.server.port, () => {
    console.log(`[startup] Server listening on port ${config.server.port}`);
  });

  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down...`);

    await closeServer(server);
    console.log('[shutdown] HTTP server closed');

    await store.close();
    console.log('[shutdown] Database pool closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[shutdown] Error during shutdown:', err instanceof Error ? err.message : err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
