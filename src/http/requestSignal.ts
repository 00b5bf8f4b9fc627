import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * AbortSignal that fires when the client goes away before the reply is sent.
 * Call `dispose` once the handler is done.
 *
 * Listens on the response: the request stream closes as soon as its body has
 * been read, which says nothing about the client.
 */
export function requestSignal(_request: FastifyRequest, reply: FastifyReply): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const onClose = () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  };
  reply.raw.once('close', onClose);
  return {
    signal: controller.signal,
    dispose: () => reply.raw.off('close', onClose),
  };
}
