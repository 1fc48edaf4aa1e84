import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { RelayContext } from '../context.js';

export async function healthRoutes(app: FastifyInstance, ctx: RelayContext): Promise<void> {
  // Liveness probe - is the server running?
  app.get('/healthz', async (request: FastifyRequest, reply: FastifyReply) => {
    reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Readiness probe - can requests be forwarded right now?
  app.get('/readyz', async (request: FastifyRequest, reply: FastifyReply) => {
    const token = ctx.tokenManager.getStatus();

    if (token.state === 'not_initialized' || token.state === 'expired') {
      reply.code(503).send({
        status: 'not_ready',
        reason: token.lastError ?? `OAuth token is ${token.state.replace('_', ' ')}`,
        timestamp: new Date().toISOString(),
      });
      return;
    }

    reply.send({
      status: 'ready',
      timestamp: new Date().toISOString(),
    });
  });
}
