import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { z } from 'zod';
import { AppError } from '../errors/AppError.js';
import { withTimeout } from '../http/timeout.js';
import {
  jsonRpcResponseSchema,
  promptGetResultSchema,
  promptTemplateSchema,
  PROTOCOL_VERSION,
  resourceDescriptorSchema,
  resourceReadResultSchema,
  toolCallResultSchema,
  toolDescriptorSchema,
  TRANSPORT_ERROR_NAMES,
  TransportErrorCode,
  type JsonRpcRequest,
  type PromptTemplate,
  type ResourceDescriptor,
  type ToolDescriptor,
} from './jsonRpc.js';
import type { ToolConnection } from './ToolConnection.js';

const logger = pino({ name: 'ToolTransportClient' });

export interface ToolTransportClientOptions {
  /** Deadline for one request/response exchange with an endpoint. */
  requestTimeoutMs: number;
  clientName?: string;
}

export interface EndpointCatalog {
  tools: ToolDescriptor[];
  resources: ResourceDescriptor[];
  prompts: PromptTemplate[];
}

const toolsListSchema = z.object({ tools: z.array(toolDescriptorSchema) });
const resourcesListSchema = z.object({ resources: z.array(resourceDescriptorSchema) });
const promptsListSchema = z.object({ prompts: z.array(promptTemplateSchema) });
const initializeResultSchema = z.object({
  protocolVersion: z.string(),
  serverInfo: z.object({ name: z.string(), version: z.string() }),
});

/**
 * ToolTransportClient speaks the JSON-RPC discover/invoke protocol to every
 * registered endpoint.
 *
 * Each call is a single exchange: no session is kept and nothing is retried
 * here. Retrying transient failures is the router's decision. Every failure
 * is thrown as an AppError whose details carry the wire-level transport code.
 */
export class ToolTransportClient {
  private readonly connections = new Map<string, ToolConnection>();
  private readonly requestTimeoutMs: number;
  private readonly clientName: string;

  constructor(options: ToolTransportClientOptions) {
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.clientName = options.clientName ?? 'footprint-shopping-router';
  }

  addEndpoint(endpointId: string, connection: ToolConnection): this {
    this.connections.set(endpointId, connection);
    logger.info({ endpointId, connection: connection.describe() }, 'Tool endpoint registered');
    return this;
  }

  endpoints(): string[] {
    return [...this.connections.keys()];
  }

  hasEndpoint(endpointId: string): boolean {
    return this.connections.has(endpointId);
  }

  /**
   * Handshake with an endpoint. Resolves to the server name and version.
   */
  async initialize(endpointId: string, signal?: AbortSignal): Promise<{ name: string; version: string }> {
    const result = await this.request(
      endpointId,
      'initialize',
      {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: this.clientName, version: '1.0.0' },
      },
      initializeResultSchema,
      signal
    );
    return result.serverInfo;
  }

  /**
   * List the tools, resources and prompt templates an endpoint publishes.
   */
  async discover(endpointId: string, signal?: AbortSignal): Promise<EndpointCatalog> {
    const [tools, resources, prompts] = await Promise.all([
      this.request(endpointId, 'tools/list', {}, toolsListSchema, signal),
      this.request(endpointId, 'resources/list', {}, resourcesListSchema, signal),
      this.request(endpointId, 'prompts/list', {}, promptsListSchema, signal),
    ]);
    return { tools: tools.tools, resources: resources.resources, prompts: prompts.prompts };
  }

  /**
   * Call one tool and return its structured result.
   */
  async invoke(
    endpointId: string,
    toolName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const result = await this.request(
      endpointId,
      'tools/call',
      { name: toolName, arguments: args },
      toolCallResultSchema,
      signal
    );
    if (result.structuredContent !== undefined) {
      return result.structuredContent;
    }
    // Endpoints that only send text content: fall back to parsing it as JSON.
    const text = result.content.map((part) => part.text).join('');
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  async readResource(endpointId: string, uri: string, signal?: AbortSignal): Promise<string> {
    const result = await this.request(endpointId, 'resources/read', { uri }, resourceReadResultSchema, signal);
    return result.contents.map((content) => content.text).join('\n');
  }

  async renderPrompt(
    endpointId: string,
    name: string,
    args: Record<string, string>,
    signal?: AbortSignal
  ): Promise<string> {
    const result = await this.request(
      endpointId,
      'prompts/get',
      { name, arguments: args },
      promptGetResultSchema,
      signal
    );
    return result.messages.map((message) => message.content.text).join('\n');
  }

  private async request<T>(
    endpointId: string,
    method: string,
    params: Record<string, unknown>,
    resultSchema: z.ZodType<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const connection = this.connections.get(endpointId);
    if (!connection) {
      throw AppError.upstreamInvocation(
        endpointId,
        method,
        TransportErrorCode.NotFound,
        `Unknown tool endpoint '${endpointId}'`
      );
    }

    const request: JsonRpcRequest = { jsonrpc: '2.0', id: randomUUID(), method, params };
    const startTime = Date.now();

    let raw: unknown;
    try {
      raw = await withTimeout(
        (callSignal) => connection.send(request, callSignal),
        this.requestTimeoutMs,
        `${endpointId} ${method}`,
        signal
      );
    } catch (error) {
      if (error instanceof AppError && error.code === 'TIMEOUT_REQUEST') {
        throw AppError.upstreamInvocation(
          endpointId,
          method,
          TransportErrorCode.Timeout,
          `No response within ${this.requestTimeoutMs}ms`,
          error
        );
      }
      throw error;
    }

    const frame = jsonRpcResponseSchema.safeParse(raw);
    if (!frame.success || frame.data.id !== request.id) {
      logger.error(
        { endpointId, method, durationMs: Date.now() - startTime },
        'Malformed JSON-RPC response from tool endpoint'
      );
      throw AppError.upstreamInvocation(
        endpointId,
        method,
        TransportErrorCode.UpstreamUnavailable,
        'Malformed JSON-RPC response'
      );
    }

    const response = frame.data;
    if ('error' in response) {
      logger.warn(
        {
          endpointId,
          method,
          code: response.error.code,
          codeName: TRANSPORT_ERROR_NAMES[response.error.code],
          durationMs: Date.now() - startTime,
        },
        'Tool endpoint answered with an error'
      );
      throw AppError.upstreamInvocation(endpointId, method, response.error.code, response.error.message);
    }

    const result = resultSchema.safeParse(response.result);
    if (!result.success) {
      throw AppError.upstreamInvocation(
        endpointId,
        method,
        TransportErrorCode.UpstreamUnavailable,
        `Unexpected '${method}' result shape`
      );
    }

    logger.debug({ endpointId, method, durationMs: Date.now() - startTime }, 'Tool endpoint call completed');
    return result.data;
  }
}
