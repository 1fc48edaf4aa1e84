import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { RelayContext } from '../context.js';

export async function proxyRoutes(app: FastifyInstance, ctx: RelayContext): Promise<void> {
  // The path is ignored: every POST is treated as a chat completion
  for (const path of ['/', '/*']) {
    app.post(path, async (request: FastifyRequest, reply: FastifyReply) => {
      await ctx.proxy.proxyRequest(request, reply);
    });
  }
}
