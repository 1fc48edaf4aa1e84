import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { RelayContext } from './context.js';
import { RelayError } from './errors.js';
import { loggingMiddleware, responseLogger } from './middleware/logging.js';
import { adminRoutes } from './routes/admin.js';
import { healthRoutes } from './routes/health.js';
import { proxyRoutes } from './routes/proxy.js';

export async function buildApp(ctx: RelayContext): Promise<FastifyInstance> {
  const app = Fastify({
    loggerInstance: ctx.logger,
    bodyLimit: ctx.config.maxPayloadSize,
  });

  // Completion bodies are forwarded byte-for-byte, so keep them raw
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (request, body, done) => {
    done(null, body);
  });

  // array entries are matched literally, so a wildcard has to be passed on its own
  const { corsOrigins } = ctx.config;
  await app.register(cors, {
    origin: corsOrigins.includes('*') ? '*' : corsOrigins,
  });

  app.addHook('onRequest', loggingMiddleware);
  app.addHook('onResponse', responseLogger);

  await healthRoutes(app, ctx);
  await adminRoutes(app, ctx);
  await proxyRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    request.log.error(error);

    if (error instanceof RelayError) {
      reply.code(error.statusCode).type('text/plain; charset=utf-8').send(error.message);
      return;
    }

    // raised by Fastify before a route ran (body limit, malformed request)
    if (error.statusCode && error.statusCode < 500) {
      ctx.requestLogger.append('error', 'Rejected request', error.message);
      reply.code(error.statusCode).type('text/plain; charset=utf-8').send(error.message);
      return;
    }

    ctx.requestLogger.append('error', 'Request failed', error.message);
    reply.code(500).type('text/plain; charset=utf-8').send('An unexpected error occurred');
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send({
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
}

/**
 * Stop the refresh timer, stop accepting connections and give in-flight
 * requests `graceMs` to finish before their sockets are closed.
 */
export async function closeGracefully(
  app: FastifyInstance,
  ctx: RelayContext,
  shutdown: AbortController,
  graceMs = ctx.config.shutdownGraceMs,
): Promise<void> {
  shutdown.abort();
  ctx.tokenManager.stopBackgroundRefresh();

  const forceClose = setTimeout(() => {
    app.log.warn({ graceMs }, 'Grace period elapsed, closing remaining connections');
    app.server.closeAllConnections();
  }, graceMs);

  try {
    await app.close();
  } finally {
    clearTimeout(forceClose);
  }
  await ctx.transcript.flush();
}
