export type HandlerStatus = 'unknown' | 'healthy' | 'degraded' | 'unreachable';

export interface HandlerMetrics {
  requestsProcessed: number;
  successfulRequests: number;
  failedRequests: number;
  averageResponseMs: number;
}

/**
 * Published identity, declared capabilities and current health of a handler.
 */
export interface CapabilityCard {
  name: string;
  description: string;
  capabilities: readonly string[];
  status: HandlerStatus;
  /** Epoch ms of the last heartbeat; null until the first one arrives. */
  lastHeartbeat: number | null;
  registeredAt: number;
  /** Why the card was last marked degraded or unreachable. */
  statusReason?: string;
  metrics: HandlerMetrics;
}

export interface CardRegistration {
  name: string;
  description: string;
  capabilities: string[];
}

/**
 * Out-of-band message delivered to handlers by broadcast, used for health
 * probing and cache invalidation. Never part of a user-facing workflow.
 */
export interface BroadcastMessage {
  type: string;
  payload?: Record<string, unknown>;
}

export type BroadcastOutcome =
  | { name: string; ok: true; result: unknown }
  | { name: string; ok: false; error: { code: string; message: string } };

/**
 * Callbacks the registry uses to reach a registered handler.
 */
export interface RegistrationHooks {
  receive(message: BroadcastMessage, signal: AbortSignal): Promise<unknown>;
  /** Resolves true when the handler can take work. Absent means always healthy. */
  probe?(signal: AbortSignal): Promise<boolean>;
}
