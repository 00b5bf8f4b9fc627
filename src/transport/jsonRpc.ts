import { z } from 'zod';

/**
 * Closed set of wire-level error codes a tool endpoint may answer with.
 */
export const TransportErrorCode = {
  InvalidParams: -32602,
  NotFound: -32601,
  UpstreamUnavailable: -32003,
  Timeout: -32008,
} as const;

export type TransportErrorCode = (typeof TransportErrorCode)[keyof typeof TransportErrorCode];

export const TRANSPORT_ERROR_NAMES: Record<TransportErrorCode, string> = {
  [TransportErrorCode.InvalidParams]: 'InvalidParams',
  [TransportErrorCode.NotFound]: 'NotFound',
  [TransportErrorCode.UpstreamUnavailable]: 'UpstreamUnavailable',
  [TransportErrorCode.Timeout]: 'Timeout',
};

/**
 * Methods every tool endpoint answers.
 */
export const TRANSPORT_METHODS = [
  'initialize',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/read',
  'prompts/list',
  'prompts/get',
] as const;

export type TransportMethod = (typeof TRANSPORT_METHODS)[number];

export const PROTOCOL_VERSION = '2024-11-05';

export type JsonRpcId = string | number;

/**
 * JSON-RPC request structure.
 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: TransportErrorCode;
  message: string;
  data?: unknown;
}

/**
 * JSON-RPC response structure: exactly one of result or error.
 */
export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId | null; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId | null; error: JsonRpcError };

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number()]).optional(),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

const transportErrorCodeSchema = z.union([
  z.literal(TransportErrorCode.InvalidParams),
  z.literal(TransportErrorCode.NotFound),
  z.literal(TransportErrorCode.UpstreamUnavailable),
  z.literal(TransportErrorCode.Timeout),
]);

export const jsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number(), z.null()]),
    error: z.object({
      code: transportErrorCodeSchema,
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
  z.object({
    jsonrpc: z.literal('2.0'),
    id: z.union([z.string(), z.number(), z.null()]),
    result: z.unknown(),
  }),
]);

export function successResponse(id: JsonRpcId | undefined, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id: id ?? null, result };
}

export function errorResponse(
  id: JsonRpcId | undefined,
  code: TransportErrorCode,
  message: string,
  data?: unknown
): JsonRpcResponse {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: '2.0', id: id ?? null, error };
}

/**
 * Error thrown inside a tool, resource or prompt implementation to answer
 * with a specific wire code instead of UpstreamUnavailable.
 */
export class ToolExecutionError extends Error {
  readonly code: TransportErrorCode;
  readonly data?: unknown;

  constructor(code: TransportErrorCode, message: string, data?: unknown) {
    super(message);
    this.name = 'ToolExecutionError';
    this.code = code;
    this.data = data;
  }
}

// Tool, resource and prompt metadata published by an endpoint.

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface PromptTemplate {
  name: string;
  description: string;
  arguments: PromptArgument[];
}

export interface ResourceContent {
  uri: string;
  mimeType: string;
  text: string;
}

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: { type: 'text'; text: string };
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent: unknown;
}

export const toolDescriptorSchema = z.object({
  name: z.string(),
  description: z.string(),
  inputSchema: z.record(z.string(), z.unknown()),
});

export const resourceDescriptorSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export const promptTemplateSchema = z.object({
  name: z.string(),
  description: z.string(),
  arguments: z.array(
    z.object({
      name: z.string(),
      description: z.string().optional(),
      required: z.boolean().optional(),
    })
  ),
});

export const toolCallResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  structuredContent: z.unknown(),
});

export const resourceReadResultSchema = z.object({
  contents: z.array(z.object({ uri: z.string(), mimeType: z.string(), text: z.string() })).min(1),
});

export const promptGetResultSchema = z.object({
  description: z.string().optional(),
  messages: z.array(
    z.object({
      role: z.enum(['user', 'assistant']),
      content: z.object({ type: z.literal('text'), text: z.string() }),
    })
  ),
});
