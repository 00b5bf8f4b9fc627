import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { requestSignal } from '../http/requestSignal.js';
import { errorResponse, TransportErrorCode } from './jsonRpc.js';
import type { ToolServer } from './ToolServer.js';

export interface ToolRoutesOptions {
  servers: Map<string, ToolServer>;
}

interface ToolRouteParams {
  endpointId: string;
}

/**
 * Publishes every in-process ToolServer over HTTP at POST /mcp/:endpointId.
 * Protocol errors are answered in the JSON-RPC body with status 200; only an
 * unknown endpoint id gets a 404.
 */
export async function toolRoutes(fastify: FastifyInstance, options: ToolRoutesOptions) {
  fastify.post<{ Params: ToolRouteParams; Body: unknown }>(
    '/mcp/:endpointId',
    async (request: FastifyRequest<{ Params: ToolRouteParams; Body: unknown }>, reply: FastifyReply) => {
      const server = options.servers.get(request.params.endpointId);
      if (!server) {
        return reply
          .status(404)
          .send(errorResponse(undefined, TransportErrorCode.NotFound, `Unknown tool endpoint '${request.params.endpointId}'`));
      }

      const { signal, dispose } = requestSignal(request, reply);
      try {
        const response = await server.handle(request.body, signal);
        return reply.status(200).send(response);
      } finally {
        dispose();
      }
    }
  );
}
