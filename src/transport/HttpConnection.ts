import { fetch } from 'undici';
import pino from 'pino';
import { AppError } from '../errors/AppError.js';
import { isAbortError } from '../errors/mapError.js';
import { TransportErrorCode, type JsonRpcId, type JsonRpcRequest } from './jsonRpc.js';
import type { ToolConnection } from './ToolConnection.js';

const logger = pino({ name: 'HttpConnection' });

export interface HttpConnectionOptions {
  endpointId: string;
  url: string;
  headers?: Record<string, string>;
}

function transportCodeForStatus(status: number): TransportErrorCode {
  if (status === 400 || status === 422) {
    return TransportErrorCode.InvalidParams;
  }
  if (status === 404) {
    return TransportErrorCode.NotFound;
  }
  if (status === 408 || status === 504) {
    return TransportErrorCode.Timeout;
  }
  return TransportErrorCode.UpstreamUnavailable;
}

/**
 * Sends JSON-RPC frames to a remote tool endpoint over HTTP POST.
 *
 * Accepts plain JSON bodies and single-message event-stream bodies. HTTP and
 * network failures are mapped onto the transport error codes; the JSON-RPC
 * payload itself is returned unparsed to the client for validation.
 */
export class HttpConnection implements ToolConnection {
  private readonly endpointId: string;
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(options: HttpConnectionOptions) {
    this.endpointId = options.endpointId;
    this.url = options.url;
    this.headers = options.headers ?? {};
  }

  describe(): string {
    return `http ${this.url}`;
  }

  async send(request: JsonRpcRequest, signal: AbortSignal): Promise<unknown> {
    let response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json, text/event-stream',
          ...this.headers,
        },
        body: JSON.stringify(request),
        signal,
      });
    } catch (error) {
      if (isAbortError(error) || signal.aborted) {
        throw error;
      }
      throw AppError.upstreamInvocation(
        this.endpointId,
        request.method,
        TransportErrorCode.UpstreamUnavailable,
        error instanceof Error ? error.message : 'Network failure',
        error instanceof Error ? error : undefined
      );
    }

    const contentType = response.headers.get('content-type') ?? '';

    if (!response.ok) {
      const errorBody = await response.text().catch(() => 'Unable to read error body');
      throw AppError.upstreamInvocation(
        this.endpointId,
        request.method,
        transportCodeForStatus(response.status),
        `Tool endpoint request failed: status=${response.status}, body=${errorBody.substring(0, 2000)}`
      );
    }

    // Read body as text first for better error diagnostics
    const rawBody = await response.text();

    try {
      if (contentType.includes('text/event-stream')) {
        return this.parseEventStream(rawBody, request.id);
      }
      return JSON.parse(rawBody);
    } catch (error) {
      logger.error(
        {
          endpointId: this.endpointId,
          status: response.status,
          contentType,
          bodySnippet: rawBody.substring(0, 2000),
          method: request.method,
          id: request.id,
        },
        'Failed to parse tool endpoint response'
      );
      throw AppError.upstreamInvocation(
        this.endpointId,
        request.method,
        TransportErrorCode.UpstreamUnavailable,
        `Failed to parse tool endpoint response: ${error instanceof Error ? error.message : 'unknown'}`
      );
    }
  }

  /**
   * Pick the JSON-RPC message out of an event-stream body: "data:" lines carry
   * JSON payloads, and the one matching the request id wins over the last one.
   */
  private parseEventStream(rawBody: string, requestId: JsonRpcId | undefined): unknown {
    const parsedObjects: unknown[] = [];

    for (const line of rawBody.split('\n')) {
      if (!line.startsWith('data:')) {
        continue;
      }
      const payload = line.substring(5).trim();
      if (!payload || payload === '[DONE]') {
        continue;
      }
      try {
        parsedObjects.push(JSON.parse(payload));
      } catch {
        // Skip lines that aren't valid JSON
        continue;
      }
    }

    if (parsedObjects.length === 0) {
      throw new Error('No valid JSON-RPC responses found in event stream');
    }

    const matching = parsedObjects.find(
      (obj) => typeof obj === 'object' && obj !== null && 'id' in obj && obj.id === requestId
    );
    return matching ?? parsedObjects[parsedObjects.length - 1];
  }
}
