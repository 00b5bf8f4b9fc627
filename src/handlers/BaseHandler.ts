import type { BroadcastMessage, CardRegistration, RegistrationHooks } from '../registry/capabilityTypes.js';
import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import type { HandlerRequest, HandlerResult, TaskHandler } from '../router/taskTypes.js';

/**
 * Shared plumbing for the built-in handlers: the capability card they
 * publish, and how they answer probes and broadcasts.
 *
 * A handler is alive when every tool endpoint it depends on answers the
 * initialize handshake.
 */
export abstract class BaseHandler implements TaskHandler {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly capabilities: readonly string[];

  protected constructor(
    protected readonly transport: ToolTransportClient,
    private readonly endpoints: readonly string[]
  ) {}

  abstract handle(request: HandlerRequest): Promise<HandlerResult>;

  registration(): CardRegistration {
    return { name: this.name, description: this.description, capabilities: [...this.capabilities] };
  }

  hooks(): RegistrationHooks {
    return {
      receive: (message, signal) => this.receive(message, signal),
      probe: (signal) => this.probe(signal),
    };
  }

  async probe(signal: AbortSignal): Promise<boolean> {
    await Promise.all(this.endpoints.map((endpointId) => this.transport.initialize(endpointId, signal)));
    return true;
  }

  async receive(message: BroadcastMessage, signal: AbortSignal): Promise<unknown> {
    switch (message.type) {
      case 'ping':
        return { pong: true, handler: this.name };
      case 'health':
        return { handler: this.name, alive: await this.probe(signal) };
      case 'describe':
        return this.registration();
      default:
        return { handler: this.name, ignored: message.type };
    }
  }
}
