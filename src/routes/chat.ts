import { randomUUID } from 'node:crypto';
import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { config } from '../config.js';
import { AppError } from '../errors/index.js';
import { requestSignal } from '../http/requestSignal.js';
import type { MessageRouter } from '../router/MessageRouter.js';
import { replyWithError } from './errorReply.js';

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  session_id: z.string().min(1).max(128).optional(),
});

export type ChatRequestBody = z.infer<typeof chatRequestSchema>;

export interface ChatRouteOptions {
  router: MessageRouter;
}

const WORD_OR_SYMBOL = /[\p{L}\p{N}]+|[^\s\p{L}\p{N}]/gu;

/**
 * Approximate token cost of a shopper message: one per punctuation mark and
 * one per started group of four letters or digits in each word.
 */
export function messageTokens(text: string): number {
  let tokens = 0;
  for (const piece of text.match(WORD_OR_SYMBOL) ?? []) {
    tokens += Math.ceil([...piece].length / 4);
  }
  return tokens;
}

/**
 * Reject a message the classifier should not be asked to read. Characters
 * are counted as code points, so an emoji counts once.
 */
export function checkMessageSize(message: string, limits: { maxChars: number; maxTokensEst: number }): void {
  const chars = [...message].length;
  if (chars > limits.maxChars) {
    throw AppError.messageTooLong('characters', limits.maxChars, chars);
  }
  const tokens = messageTokens(message);
  if (tokens > limits.maxTokensEst) {
    throw AppError.messageTooLong('tokens', limits.maxTokensEst, tokens);
  }
}

/**
 * POST /chat: classify the shopper's message, run it and reply with the
 * rendered response next to the full aggregate.
 */
export async function chatRoutes(fastify: FastifyInstance, options: ChatRouteOptions) {
  fastify.post<{ Body: unknown }>('/chat', async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const { signal, dispose } = requestSignal(request, reply);
    try {
      const body = chatRequestSchema.parse(request.body);
      checkMessageSize(body.message, {
        maxChars: config.limits.maxMessageChars,
        maxTokensEst: config.limits.maxMessageTokensEst,
      });

      const sessionId = body.session_id ?? randomUUID();
      const answer = await options.router.handleMessage(body.message, sessionId, { signal });

      return reply.status(200).send({
        response: answer.response,
        session_id: answer.sessionId,
        intent: answer.intent,
        result: answer.result,
      });
    } catch (error) {
      return replyWithError(request, reply, error);
    } finally {
      dispose();
    }
  });
}
