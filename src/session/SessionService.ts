import pino from 'pino';
import { AppError } from '../errors/AppError.js';
import type { ISessionStore } from './ISessionStore.js';
import { KeyedMutex } from './KeyedMutex.js';
import * as machine from './footprintStateMachine.js';
import { createEmptySession, freezeSession, type CartItem, type SessionSnapshot, type SessionState } from './sessionTypes.js';

const logger = pino({ name: 'SessionService' });

export type CommitFn = (
  transition: (state: SessionState) => machine.Transition,
  operation: string
) => Promise<SessionSnapshot>;

export interface SessionServiceOptions {
  store: ISessionStore;
  ttlSeconds: number;
  now?: () => number;
}

/**
 * Owns every session: mutations for one session id run one at a time under a
 * per-key lock, and reads return frozen snapshots of the last committed state.
 *
 * A mutation whose signal aborts before it commits is dropped, whether it was
 * still waiting for the lock or already holding it.
 */
export class SessionService {
  private readonly store: ISessionStore;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly mutex = new KeyedMutex();

  constructor(options: SessionServiceOptions) {
    this.store = options.store;
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Committed state of a session, or null when it has never been touched or has expired.
   */
  async find(sessionId: string): Promise<SessionSnapshot | null> {
    const state = await this.store.get(sessionId);
    return state ? freezeSession(state) : null;
  }

  /**
   * ViewCart: the committed state, or the zero value for a new session.
   * Never writes to the store.
   */
  async view(sessionId: string): Promise<SessionSnapshot> {
    const state = await this.store.get(sessionId);
    return freezeSession(machine.viewCart(state ?? createEmptySession(sessionId, this.now(), this.ttlMs)));
  }

  /**
   * Apply a transition under the session's lock and commit the result.
   * Throws the transition's INVALID_SESSION_STATE error and leaves the
   * stored state untouched when a precondition fails.
   */
  apply(
    sessionId: string,
    operation: string,
    transition: (state: SessionState) => machine.Transition,
    signal?: AbortSignal
  ): Promise<SessionSnapshot> {
    return this.withLock(sessionId, (_current, commit) => commit(transition, operation), signal);
  }

  addToCart(sessionId: string, item: CartItem, signal?: AbortSignal): Promise<SessionSnapshot> {
    return this.apply(sessionId, 'addToCart', (state) => machine.addToCart(state, item), signal);
  }

  removeFromCart(sessionId: string, productId: string, quantity?: number, signal?: AbortSignal): Promise<SessionSnapshot> {
    return this.apply(sessionId, 'removeFromCart', (state) => machine.removeFromCart(state, productId, quantity), signal);
  }

  selectShipping(sessionId: string, method: string, footprintKg: number, signal?: AbortSignal): Promise<SessionSnapshot> {
    return this.apply(sessionId, 'selectShipping', (state) => machine.selectShipping(state, method, footprintKg), signal);
  }

  checkout(sessionId: string, signal?: AbortSignal): Promise<SessionSnapshot> {
    return this.apply(sessionId, 'checkout', (state) => machine.checkout(state), signal);
  }

  paymentSuccess(sessionId: string, payment: machine.PaymentDetails, signal?: AbortSignal): Promise<SessionSnapshot> {
    return this.apply(sessionId, 'paymentSuccess', (state) => machine.paymentSuccess(state, payment), signal);
  }

  clearCart(sessionId: string, signal?: AbortSignal): Promise<SessionSnapshot> {
    return this.apply(sessionId, 'clearCart', (state) => machine.clearCart(state), signal);
  }

  /**
   * Run `work` while holding the session's lock, for read-check-act sequences
   * that span an external call such as a payment. `work` commits through
   * `commit`; calling the public mutators from inside would deadlock.
   */
  async withLock<T>(
    sessionId: string,
    work: (current: SessionSnapshot, commit: CommitFn) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    return this.mutex.runExclusive(
      sessionId,
      async () => {
        let latest = (await this.store.get(sessionId)) ?? createEmptySession(sessionId, this.now(), this.ttlMs);

        const commit: CommitFn = async (transition, operation) => {
          const result = transition(latest);
          if (!result.ok) {
            logger.info({ sessionId, operation, code: result.error.code }, 'Transition rejected');
            throw result.error;
          }
          if (!machine.isConsistent(result.state)) {
            throw AppError.internal(`Footprint total drifted during ${operation}`);
          }
          if (signal?.aborted) {
            throw AppError.cancelled(operation);
          }

          const now = this.now();
          const committed: SessionState = {
            ...result.state,
            version: latest.version + 1,
            updatedAt: now,
            expiresAt: now + this.ttlMs,
          };
          await this.store.set(sessionId, committed);
          latest = committed;
          logger.debug(
            { sessionId, operation, version: committed.version, totalFootprintKg: committed.totalFootprintKg },
            'Session updated'
          );
          return freezeSession(committed);
        };

        return work(freezeSession(latest), commit);
      },
      signal
    );
  }
}
