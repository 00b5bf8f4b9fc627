import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import type { HandlerStatus } from '../registry/capabilityTypes.js';
import type { SessionService } from '../session/SessionService.js';
import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { replyWithError } from './errorReply.js';

export interface SystemRoutesOptions {
  registry: CapabilityRegistry;
  sessions: SessionService;
  transport: ToolTransportClient;
}

export type ServiceHealth = 'healthy' | 'degraded' | 'unhealthy';

/**
 * healthy: every handler is healthy. unhealthy: none can take work.
 * Anything in between is degraded.
 */
export function overallHealth(statuses: HandlerStatus[]): ServiceHealth {
  if (statuses.length === 0 || statuses.every((status) => status === 'unreachable' || status === 'degraded')) {
    return 'unhealthy';
  }
  return statuses.every((status) => status === 'healthy') ? 'healthy' : 'degraded';
}

interface SessionParams {
  id: string;
}

export async function systemRoutes(fastify: FastifyInstance, options: SystemRoutesOptions) {
  const { registry, sessions, transport } = options;

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const cards = registry.list();
    return reply.send({
      status: overallHealth(cards.map((card) => card.status)),
      handlers: Object.fromEntries(cards.map((card) => [card.name, card.status])),
      endpoints: transport.endpoints(),
      timestamp: new Date().toISOString(),
    });
  });

  fastify.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    const handlers = registry.list().map((card) => ({ name: card.name, status: card.status, ...card.metrics }));
    const totals = handlers.reduce(
      (sum, handler) => ({
        requestsProcessed: sum.requestsProcessed + handler.requestsProcessed,
        successfulRequests: sum.successfulRequests + handler.successfulRequests,
        failedRequests: sum.failedRequests + handler.failedRequests,
      }),
      { requestsProcessed: 0, successfulRequests: 0, failedRequests: 0 }
    );
    return reply.send({ handlers, totals, timestamp: new Date().toISOString() });
  });

  fastify.get<{ Params: SessionParams }>(
    '/sessions/:id',
    async (request: FastifyRequest<{ Params: SessionParams }>, reply: FastifyReply) => {
      try {
        return reply.send(await sessions.view(request.params.id));
      } catch (error) {
        return replyWithError(request, reply, error);
      }
    }
  );
}
