import pino from 'pino';
import { mapError } from '../errors/mapError.js';
import { withTimeout } from '../http/timeout.js';
import type {
  BroadcastMessage,
  BroadcastOutcome,
  CapabilityCard,
  CardRegistration,
  HandlerMetrics,
  RegistrationHooks,
} from './capabilityTypes.js';

const logger = pino({ name: 'CapabilityRegistry' });

export interface CapabilityRegistryOptions {
  /** How often handlers are probed and stale cards swept. */
  heartbeatIntervalMs: number;
  /** A card without a heartbeat for longer than this becomes unreachable. */
  stalenessMs: number;
  /** Deadline for one probe or broadcast delivery. */
  deliveryTimeoutMs?: number;
  now?: () => number;
}

interface Entry {
  card: CapabilityCard;
  hooks: RegistrationHooks;
}

function emptyMetrics(): HandlerMetrics {
  return { requestsProcessed: 0, successfulRequests: 0, failedRequests: 0, averageResponseMs: 0 };
}

function snapshot(card: CapabilityCard): CapabilityCard {
  return Object.freeze({
    ...card,
    capabilities: Object.freeze([...card.capabilities]),
    metrics: Object.freeze({ ...card.metrics }),
  });
}

/**
 * CapabilityRegistry tracks which handlers exist, what they can do and
 * whether they are fit to receive work.
 *
 * Every mutation is synchronous, so it is atomic with respect to the event
 * loop and readers never observe a half-written card. Callers get frozen
 * copies, never the live record.
 */
export class CapabilityRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly heartbeatIntervalMs: number;
  private readonly stalenessMs: number;
  private readonly deliveryTimeoutMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: CapabilityRegistryOptions) {
    this.heartbeatIntervalMs = options.heartbeatIntervalMs;
    this.stalenessMs = options.stalenessMs;
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? 2000;
    this.now = options.now ?? Date.now;
  }

  register(registration: CardRegistration, hooks: RegistrationHooks): CapabilityCard {
    const previous = this.entries.get(registration.name);
    const card: CapabilityCard = {
      name: registration.name,
      description: registration.description,
      capabilities: [...new Set(registration.capabilities)],
      status: 'unknown',
      lastHeartbeat: null,
      registeredAt: this.now(),
      metrics: previous ? previous.card.metrics : emptyMetrics(),
    };
    this.entries.set(registration.name, { card, hooks });
    logger.info({ name: card.name, capabilities: card.capabilities }, 'Handler registered');
    return snapshot(card);
  }

  unregister(name: string): boolean {
    const removed = this.entries.delete(name);
    if (removed) {
      logger.info({ name }, 'Handler unregistered');
    }
    return removed;
  }

  list(): CapabilityCard[] {
    return [...this.entries.values()].map((entry) => snapshot(entry.card));
  }

  get(name: string): CapabilityCard | undefined {
    const entry = this.entries.get(name);
    return entry ? snapshot(entry.card) : undefined;
  }

  /**
   * Record a heartbeat. Brings the card back to healthy, including from
   * degraded and unreachable.
   */
  heartbeat(name: string): boolean {
    const entry = this.entries.get(name);
    if (!entry) {
      return false;
    }
    if (entry.card.status !== 'healthy') {
      logger.info({ name, from: entry.card.status }, 'Handler is healthy');
    }
    entry.card.status = 'healthy';
    entry.card.lastHeartbeat = this.now();
    entry.card.statusReason = undefined;
    return true;
  }

  markDegraded(name: string, reason: string): boolean {
    const entry = this.entries.get(name);
    if (!entry) {
      return false;
    }
    if (entry.card.status !== 'unreachable') {
      entry.card.status = 'degraded';
      entry.card.statusReason = reason;
      logger.warn({ name, reason }, 'Handler marked degraded');
    }
    return true;
  }

  /**
   * Cards declaring `capability` that may receive work: healthy ones first,
   * then cards that have not been probed yet.
   */
  findCapable(capability: string): CapabilityCard[] {
    const candidates = [...this.entries.values()]
      .map((entry) => entry.card)
      .filter((card) => card.capabilities.includes(capability))
      .filter((card) => card.status === 'healthy' || card.status === 'unknown');
    candidates.sort((a, b) => Number(b.status === 'healthy') - Number(a.status === 'healthy'));
    return candidates.map(snapshot);
  }

  isRoutable(name: string): boolean {
    const status = this.entries.get(name)?.card.status;
    return status === 'healthy' || status === 'unknown';
  }

  /**
   * Flip every healthy or degraded card whose last heartbeat is older than
   * the staleness window to unreachable. Returns the names that changed.
   */
  sweep(now: number = this.now()): string[] {
    const flipped: string[] = [];
    for (const { card } of this.entries.values()) {
      if (card.status !== 'healthy' && card.status !== 'degraded') {
        continue;
      }
      if (card.lastHeartbeat !== null && now - card.lastHeartbeat > this.stalenessMs) {
        card.status = 'unreachable';
        card.statusReason = `No heartbeat for ${now - card.lastHeartbeat}ms`;
        flipped.push(card.name);
      }
    }
    if (flipped.length > 0) {
      logger.warn({ names: flipped, stalenessMs: this.stalenessMs }, 'Handlers became unreachable');
    }
    return flipped;
  }

  recordCall(name: string, ok: boolean, durationMs: number): void {
    const entry = this.entries.get(name);
    if (!entry) {
      return;
    }
    const metrics = entry.card.metrics;
    const total = metrics.requestsProcessed + 1;
    entry.card.metrics = {
      requestsProcessed: total,
      successfulRequests: metrics.successfulRequests + (ok ? 1 : 0),
      failedRequests: metrics.failedRequests + (ok ? 0 : 1),
      averageResponseMs: (metrics.averageResponseMs * metrics.requestsProcessed + durationMs) / total,
    };
  }

  /**
   * Deliver the same message to every healthy handler outside `excludeNames`
   * and collect each outcome. One failing handler never fails the broadcast.
   */
  async broadcast(
    message: BroadcastMessage,
    excludeNames: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<BroadcastOutcome[]> {
    const excluded = new Set(excludeNames);
    const targets = [...this.entries.values()].filter(
      (entry) => entry.card.status === 'healthy' && !excluded.has(entry.card.name)
    );

    return Promise.all(
      targets.map(async ({ card, hooks }): Promise<BroadcastOutcome> => {
        try {
          const result = await withTimeout(
            (deliverySignal) => hooks.receive(message, deliverySignal),
            this.deliveryTimeoutMs,
            `broadcast ${message.type} to ${card.name}`,
            signal
          );
          return { name: card.name, ok: true, result };
        } catch (error) {
          const appError = mapError(error);
          return { name: card.name, ok: false, error: { code: appError.code, message: appError.safeMessage } };
        }
      })
    );
  }

  /**
   * Probe every handler once; those answering true get a heartbeat and the
   * rest are marked degraded. Handlers without a probe are treated as always
   * alive.
   */
  async probeAll(signal?: AbortSignal): Promise<void> {
    await Promise.all(
      [...this.entries.values()].map(async ({ card, hooks }) => {
        if (!hooks.probe) {
          this.heartbeat(card.name);
          return;
        }
        const probe = hooks.probe;
        try {
          const alive = await withTimeout(
            (probeSignal) => probe(probeSignal),
            this.deliveryTimeoutMs,
            `probe ${card.name}`,
            signal
          );
          if (alive) {
            this.heartbeat(card.name);
          } else {
            this.markDegraded(card.name, 'Probe reported not ready');
          }
        } catch (error) {
          const appError = mapError(error);
          logger.warn({ name: card.name, error: appError.message }, 'Handler probe failed');
          this.markDegraded(card.name, `Probe failed (${appError.code})`);
        }
      })
    );
  }

  /**
   * Start the probe-and-sweep loop. The first probe runs immediately.
   */
  start(): void {
    if (this.timer) {
      return;
    }
    void this.tick();
    this.timer = setInterval(() => void this.tick(), this.heartbeatIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async tick(): Promise<void> {
    try {
      await this.probeAll();
    } catch (error) {
      logger.error({ error: mapError(error).message }, 'Heartbeat round failed');
    }
    this.sweep();
  }
}
