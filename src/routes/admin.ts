import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { RelayContext } from '../context.js';
import { AuthFailure, errorMessage } from '../errors.js';

export async function adminRoutes(app: FastifyInstance, ctx: RelayContext): Promise<void> {
  // Dashboard snapshot: token state, counters, recent requests and events
  app.get('/api/state', async (request: FastifyRequest, reply: FastifyReply) => {
    reply.send(ctx.status.snapshot());
  });

  // Fetch a new token now instead of waiting for the next background cycle
  app.post('/api/token/refresh', async (request: FastifyRequest, reply: FastifyReply) => {
    request.log.info('Manual token refresh requested');

    try {
      await ctx.tokenManager.refresh('manual');
    } catch (error) {
      const statusCode = error instanceof AuthFailure ? error.statusCode : 500;
      reply.code(statusCode).type('text/plain; charset=utf-8').send(
        `Failed to refresh token: ${errorMessage(error)}`,
      );
      return;
    }

    const token = ctx.tokenManager.getStatus();
    reply.send({
      message: 'Token refreshed successfully',
      oauth_token_status: token.state,
      token_refresh_count: token.refreshCount,
      last_token_refresh: token.lastRefreshAt?.toISOString() ?? null,
      token_expires_at: token.expiresAt?.toISOString() ?? null,
    });
  });
}
