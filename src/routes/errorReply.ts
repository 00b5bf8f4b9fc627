import type { FastifyReply, FastifyRequest } from 'fastify';
import { config } from '../config.js';
import { mapError, sanitizeForLogging } from '../errors/index.js';
import { appErrorToEnvelope } from '../http/errorEnvelope.js';

/**
 * Log a route failure and answer with the error envelope. Validation
 * problems are the caller's fault and only logged at warn.
 */
export function replyWithError(request: FastifyRequest, reply: FastifyReply, error: unknown): FastifyReply {
  const appError = mapError(error);

  const logPayload: Record<string, unknown> = {
    msg: 'Request error',
    category: appError.category,
    code: appError.code,
    requestId: request.id,
    httpStatus: appError.httpStatus,
  };
  if (config.debug && appError.details) {
    logPayload.details = sanitizeForLogging(appError.details);
  }

  if (appError.category === 'VALIDATION') {
    request.log.warn(logPayload);
  } else {
    request.log.error(logPayload);
  }

  return reply.status(appError.httpStatus).send({ error: appErrorToEnvelope(appError, request.id, config.debug) });
}
