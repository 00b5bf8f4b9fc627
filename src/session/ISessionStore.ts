import { SessionState } from './sessionTypes.js';

/**
 * Persistence for shopping sessions. Stores hold whole snapshots; callers
 * serialize writers per key themselves.
 */
export interface ISessionStore {
  get(key: string): Promise<SessionState | null>;
  set(key: string, state: SessionState): Promise<void>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  touch(key: string): Promise<boolean>;
  /** Number of live sessions, when the store can tell cheaply. */
  size?(): Promise<number>;
}
