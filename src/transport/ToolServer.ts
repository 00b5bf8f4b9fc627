import pino from 'pino';
import { z } from 'zod';
import { AppError } from '../errors/AppError.js';
import { withTimeout } from '../http/timeout.js';
import {
  errorResponse,
  jsonRpcRequestSchema,
  PROTOCOL_VERSION,
  successResponse,
  ToolExecutionError,
  TransportErrorCode,
  type JsonRpcId,
  type JsonRpcResponse,
  type PromptMessage,
  type PromptTemplate,
  type ResourceContent,
  type ResourceDescriptor,
  type ToolCallResult,
  type ToolDescriptor,
} from './jsonRpc.js';

const logger = pino({ name: 'ToolServer' });

/**
 * A callable operation published by an endpoint. Arguments are validated
 * against `parameters` before `execute` runs.
 */
export interface ToolDefinition<TArgs> {
  name: string;
  description: string;
  parameters: z.ZodType<TArgs>;
  execute: (args: TArgs, signal: AbortSignal) => Promise<unknown>;
}

export interface ResourceDefinition extends ResourceDescriptor {
  read: () => Promise<string>;
}

export interface PromptDefinition extends PromptTemplate {
  render: (args: Record<string, string>) => string;
}

export interface ToolServerOptions {
  name: string;
  version?: string;
  /** Deadline for a single tools/call execution. */
  callTimeoutMs: number;
}

interface RegisteredTool {
  descriptor: ToolDescriptor;
  run: (rawArgs: unknown, signal: AbortSignal) => Promise<unknown>;
}

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

const resourceReadParamsSchema = z.object({
  uri: z.string().min(1),
});

const promptGetParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.string()).optional(),
});

function extractId(raw: unknown): JsonRpcId | undefined {
  if (typeof raw === 'object' && raw !== null && 'id' in raw) {
    const { id } = raw;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return undefined;
}

/**
 * ToolServer answers JSON-RPC 2.0 frames for one tool endpoint.
 *
 * It is stateless between calls: every frame is validated, dispatched and
 * answered independently, and failures always come back as one of the four
 * transport error codes. It never retries.
 */
export class ToolServer {
  readonly name: string;
  readonly version: string;
  private readonly callTimeoutMs: number;
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly resources = new Map<string, ResourceDefinition>();
  private readonly prompts = new Map<string, PromptDefinition>();

  constructor(options: ToolServerOptions) {
    this.name = options.name;
    this.version = options.version ?? '1.0.0';
    this.callTimeoutMs = options.callTimeoutMs;
  }

  registerTool<TArgs>(tool: ToolDefinition<TArgs>): this {
    const inputSchema: Record<string, unknown> = { ...z.toJSONSchema(tool.parameters) };
    this.tools.set(tool.name, {
      descriptor: { name: tool.name, description: tool.description, inputSchema },
      run: async (rawArgs, signal) => {
        const parsed = tool.parameters.safeParse(rawArgs ?? {});
        if (!parsed.success) {
          throw new ToolExecutionError(
            TransportErrorCode.InvalidParams,
            `Invalid arguments for tool '${tool.name}'`,
            { issues: parsed.error.issues.map((issue) => ({ path: issue.path.map(String), message: issue.message })) }
          );
        }
        return tool.execute(parsed.data, signal);
      },
    });
    return this;
  }

  registerResource(resource: ResourceDefinition): this {
    this.resources.set(resource.uri, resource);
    return this;
  }

  registerPrompt(prompt: PromptDefinition): this {
    this.prompts.set(prompt.name, prompt);
    return this;
  }

  listTools(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }

  /**
   * Handle one JSON-RPC frame. Never throws; every failure becomes an error response.
   */
  async handle(raw: unknown, signal?: AbortSignal): Promise<JsonRpcResponse> {
    const parsed = jsonRpcRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return errorResponse(extractId(raw), TransportErrorCode.InvalidParams, 'Invalid JSON-RPC request');
    }

    const request = parsed.data;
    const params = request.params ?? {};

    try {
      const result = await this.dispatch(request.method, params, signal);
      return successResponse(request.id, result);
    } catch (error) {
      return this.toErrorResponse(request.id, request.method, error);
    }
  }

  private async dispatch(
    method: string,
    params: Record<string, unknown>,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    if (method.startsWith('notifications/')) {
      return { accepted: true };
    }

    switch (method) {
      case 'initialize':
        return {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: { tools: {}, resources: {}, prompts: {} },
          serverInfo: { name: this.name, version: this.version },
        };
      case 'tools/list':
        return { tools: this.listTools() };
      case 'tools/call':
        return this.callTool(params, signal);
      case 'resources/list':
        return {
          resources: [...this.resources.values()].map(({ uri, name, description, mimeType }) => ({
            uri,
            name,
            description,
            mimeType,
          })),
        };
      case 'resources/read':
        return this.readResource(params);
      case 'prompts/list':
        return {
          prompts: [...this.prompts.values()].map(({ name, description, arguments: args }) => ({
            name,
            description,
            arguments: args,
          })),
        };
      case 'prompts/get':
        return this.getPrompt(params);
      default:
        throw new ToolExecutionError(TransportErrorCode.NotFound, `Method '${method}' not found`);
    }
  }

  private async callTool(params: Record<string, unknown>, signal: AbortSignal | undefined): Promise<ToolCallResult> {
    const { name, arguments: args } = toolCallParamsSchema.parse(params);
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolExecutionError(TransportErrorCode.NotFound, `Tool '${name}' not found`);
    }

    const result = await withTimeout(
      (callSignal) => tool.run(args, callSignal),
      this.callTimeoutMs,
      `${this.name}/${name}`,
      signal
    );

    return {
      content: [{ type: 'text', text: JSON.stringify(result) }],
      structuredContent: result,
    };
  }

  private async readResource(params: Record<string, unknown>): Promise<{ contents: ResourceContent[] }> {
    const { uri } = resourceReadParamsSchema.parse(params);
    const resource = this.resources.get(uri);
    if (!resource) {
      throw new ToolExecutionError(TransportErrorCode.NotFound, `Resource '${uri}' not found`);
    }
    const text = await resource.read();
    return {
      contents: [{ uri, mimeType: resource.mimeType ?? 'text/plain', text }],
    };
  }

  private getPrompt(params: Record<string, unknown>): { description: string; messages: PromptMessage[] } {
    const { name, arguments: args = {} } = promptGetParamsSchema.parse(params);
    const prompt = this.prompts.get(name);
    if (!prompt) {
      throw new ToolExecutionError(TransportErrorCode.NotFound, `Prompt '${name}' not found`);
    }

    const missing = prompt.arguments
      .filter((arg) => arg.required && !(arg.name in args))
      .map((arg) => arg.name);
    if (missing.length > 0) {
      throw new ToolExecutionError(
        TransportErrorCode.InvalidParams,
        `Prompt '${name}' is missing required arguments: ${missing.join(', ')}`
      );
    }

    return {
      description: prompt.description,
      messages: [{ role: 'user', content: { type: 'text', text: prompt.render(args) } }],
    };
  }

  private toErrorResponse(id: JsonRpcId | undefined, method: string, error: unknown): JsonRpcResponse {
    if (error instanceof ToolExecutionError) {
      return errorResponse(id, error.code, error.message, error.data);
    }
    if (error instanceof z.ZodError) {
      return errorResponse(id, TransportErrorCode.InvalidParams, `Invalid params for '${method}'`, {
        issues: error.issues.map((issue) => ({ path: issue.path.map(String), message: issue.message })),
      });
    }
    if (error instanceof AppError && (error.category === 'TIMEOUT' || error.category === 'CANCELLED')) {
      return errorResponse(id, TransportErrorCode.Timeout, `'${method}' did not finish before its deadline`);
    }

    logger.error(
      { server: this.name, method, error: error instanceof Error ? error.message : String(error) },
      'Tool endpoint failure'
    );
    return errorResponse(
      id,
      TransportErrorCode.UpstreamUnavailable,
      error instanceof Error ? error.message : 'Upstream failure'
    );
  }
}
