import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppError } from '../errors/index.js';
import { requestSignal } from '../http/requestSignal.js';
import type { CapabilityRegistry } from '../registry/CapabilityRegistry.js';
import type { MessageRouter } from '../router/MessageRouter.js';
import { replyWithError } from './errorReply.js';

/**
 * The parameters handlers read, typed as `TaskParameters` declares them.
 * Other keys pass through untouched.
 */
export const taskParametersSchema = z
  .object({
    query: z.string().optional(),
    productId: z.string().min(1).optional(),
    productRef: z.string().optional(),
    productIds: z.array(z.string().min(1)).optional(),
    quantity: z.number().int().positive().optional(),
    shippingMethod: z.string().optional(),
    category: z.string().optional(),
    minPrice: z.number().nonnegative().optional(),
    maxPrice: z.number().nonnegative().optional(),
  })
  .catchall(z.unknown());

export const sendRequestSchema = z.object({
  agent_name: z.string().min(1),
  task: z.object({
    message: z.string().optional(),
    session_id: z.string().min(1).max(128).optional(),
    intent: z.string().optional(),
    parameters: taskParametersSchema.optional(),
  }),
});

export const broadcastRequestSchema = z.object({
  message: z.object({
    type: z.string().min(1),
    payload: z.record(z.string(), z.unknown()).optional(),
  }),
  exclude: z.array(z.string()).default([]),
});

export interface AgentRoutesOptions {
  router: MessageRouter;
  registry: CapabilityRegistry;
}

interface AgentParams {
  name: string;
}

/**
 * Capability cards, direct dispatch and broadcast.
 */
export async function agentRoutes(fastify: FastifyInstance, options: AgentRoutesOptions) {
  const { router, registry } = options;

  fastify.get('/agents', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send(registry.list());
  });

  fastify.get<{ Params: AgentParams }>(
    '/agents/:name/status',
    async (request: FastifyRequest<{ Params: AgentParams }>, reply: FastifyReply) => {
      const card = registry.get(request.params.name);
      if (!card) {
        return replyWithError(request, reply, AppError.notFound('Handler', request.params.name));
      }
      return reply.send(card);
    }
  );

  fastify.post<{ Body: unknown }>('/send', async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const { signal, dispose } = requestSignal(request, reply);
    try {
      const body = sendRequestSchema.parse(request.body);
      if (!registry.get(body.agent_name)) {
        throw AppError.notFound('Handler', body.agent_name);
      }
      const result = await router.send(
        body.agent_name,
        {
          message: body.task.message,
          sessionId: body.task.session_id,
          intent: body.task.intent,
          parameters: body.task.parameters,
        },
        { signal }
      );
      return reply.send(result);
    } catch (error) {
      return replyWithError(request, reply, error);
    } finally {
      dispose();
    }
  });

  fastify.post<{ Body: unknown }>('/broadcast', async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const { signal, dispose } = requestSignal(request, reply);
    try {
      const body = broadcastRequestSchema.parse(request.body);
      const results = await registry.broadcast(body.message, body.exclude, signal);
      return reply.send({ message: body.message.type, results });
    } catch (error) {
      return replyWithError(request, reply, error);
    } finally {
      dispose();
    }
  });
}
