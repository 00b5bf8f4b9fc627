import type { JsonRpcRequest } from './jsonRpc.js';
import type { ToolServer } from './ToolServer.js';

/**
 * One way of reaching a tool endpoint. `send` returns the raw response frame;
 * the client validates it.
 */
export interface ToolConnection {
  send(request: JsonRpcRequest, signal: AbortSignal): Promise<unknown>;
  describe(): string;
}

/**
 * Reaches a ToolServer living in the same process. The frame still goes
 * through JSON serialization so both connection kinds see the same payloads.
 */
export class InProcessConnection implements ToolConnection {
  constructor(private readonly server: ToolServer) {}

  describe(): string {
    return `in-process ${this.server.name}`;
  }

  async send(request: JsonRpcRequest, signal: AbortSignal): Promise<unknown> {
    const frame: unknown = JSON.parse(JSON.stringify(request));
    const response = await this.server.handle(frame, signal);
    return JSON.parse(JSON.stringify(response));
  }
}
