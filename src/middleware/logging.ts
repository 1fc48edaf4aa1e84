import type { FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';

declare module 'fastify' {
  interface FastifyRequest {
    requestId?: string;
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

// Polled by probes and the dashboard every few seconds
const QUIET_ROUTES = new Set(['/healthz', '/readyz', '/api/state']);

function logLevel(request: FastifyRequest): 'debug' | 'info' {
  return QUIET_ROUTES.has(request.routeOptions.url ?? '') ? 'debug' : 'info';
}

export async function loggingMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const incomingId = request.headers[REQUEST_ID_HEADER];
  request.requestId = typeof incomingId === 'string' && incomingId.length > 0 ? incomingId : randomUUID();

  reply.header(REQUEST_ID_HEADER, request.requestId);

  request.log[logLevel(request)]({
    requestId: request.requestId,
    method: request.method,
    url: request.url,
    remoteAddress: request.ip,
  }, 'Incoming request');
}

export async function responseLogger(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  request.log[logLevel(request)]({
    requestId: request.requestId,
    statusCode: reply.statusCode,
    durationMs: Math.round(reply.elapsedTime),
  }, 'Request completed');
}
