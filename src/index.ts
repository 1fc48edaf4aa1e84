#!/usr/bin/env node
import { buildApp, closeGracefully } from './app.js';
import { loadConfig } from './config.js';
import { createRelayContext } from './context.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { publishTokenEnvironment } from './services/token.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.prettyLogs });
  const ctx = createRelayContext(config, logger, { publish: publishTokenEnvironment });
  const app = await buildApp(ctx);
  const shutdown = new AbortController();

  if (config.oauth.mockMode) {
    logger.warn('Running in MOCK MODE - requests carry a placeholder token');
  }

  // Every start fetches a fresh token; failure is retried on the first request
  try {
    await ctx.tokenManager.refresh('startup');
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Failed to get OAuth token (will retry when needed)');
  }
  ctx.tokenManager.startBackgroundRefresh(config.refreshIntervalSeconds * 1000, shutdown.signal);

  try {
    await app.listen({
      port: config.port,
      host: config.host,
    });

    console.log(`
🔄 LLM OAuth relay is running!

  Proxy:     http://${config.host}:${config.port}
  Upstream:  ${ctx.proxy.upstreamUrl}
  Status:    http://${config.host}:${config.port}/api/state
  Log file:  ${ctx.transcript.filePath}
  Refresh:   every ${config.refreshIntervalSeconds}s

  Press Ctrl+C to stop
    `);
  } catch (err) {
    app.log.error(err);
    shutdown.abort();
    process.exit(1);
  }

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach((signal) => {
    process.once(signal, () => {
      app.log.info(`Received ${signal}, closing server gracefully...`);
      closeGracefully(app, ctx, shutdown).then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error(err, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  });
}

main().catch((err) => {
  console.error('Failed to start relay:', err);
  process.exit(1);
});
