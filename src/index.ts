/**
 * NetLens - Main Entry Point
 *
 * Boots the assistant gateway:
 *   1. Load and validate configuration
 *   2. Build provider clients, cache, assistant and routes
 *   3. Start the HTTP server
 *   4. Handle graceful shutdown
 */

import { ConfigError, createLogger, loadConfig } from '@netlens/core';
import { describeError } from '@netlens/fallback';
import { createApp } from './app.js';
import { GatewayServer } from './gateway/server.js';

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  // ---- 1. Load config ----

  const { config, validation } = loadConfig();
  const log = createLogger('netlens', config.logging.level);

  for (const warn of validation.warnings) {
    log.warn({ path: warn.path }, `Config warning: ${warn.message}`);
  }

  // ---- 2. Build components ----

  const app = createApp(config, log);
  if (app.clients.length === 0) {
    log.warn('No provider has an API key; answers will come from local guidance only');
  } else {
    log.info(
      { providers: app.clients.map((c) => `${c.name}:${c.model}`) },
      'Provider chain ready',
    );
  }

  // ---- 3. Start server ----

  const server = new GatewayServer({
    routes: app.routes,
    host: config.gateway.host,
    port: config.gateway.port,
    logger: log.child({ component: 'gateway' }),
  });
  await server.start();

  // ---- 4. Graceful shutdown ----

  let shutdownInProgress = false;

  async function shutdown(signal: string): Promise<void> {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    log.info({ signal }, 'Shutting down');

    try {
      await server.stop();
      process.exit(0);
    } catch (err) {
      log.error({ error: describeError(err) }, 'Error during shutdown');
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((err: unknown) => {
  const log = createLogger('netlens');
  if (err instanceof ConfigError) {
    log.fatal({ errors: err.errors }, err.message);
  } else {
    log.fatal({ error: describeError(err) }, 'Fatal error during startup');
  }
  process.exit(1);
});
