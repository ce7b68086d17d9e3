import { randomUUID } from 'node:crypto';
import { QueryResult, TargetKey } from '../types.js';

export interface ConsoleState {
  statement: string;
  result?: QueryResult;
  /** Set when the last submission was blank; cleared on the next read. */
  warning?: string;
}

export type SessionState = Map<TargetKey, ConsoleState>;

export interface SessionStoreOptions {
  maxSessions: number;
  idleMs: number;
}

interface Entry {
  state: SessionState;
  lastSeen: number;
}

const DEFAULT_OPTIONS: SessionStoreOptions = { maxSessions: 1000, idleMs: 30 * 60 * 1000 };

/**
 * Query-console state per browser session, keyed by target. Only ids this
 * store issued are accepted; idle sessions expire and the oldest are evicted
 * once `maxSessions` is reached.
 */
export class SessionStore {
  // Insertion order doubles as least-recently-seen order.
  private sessions = new Map<string, Entry>();
  private options: SessionStoreOptions;

  constructor(options: Partial<SessionStoreOptions> = {}, private now: () => number = Date.now) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): string {
    this.prune();
    while (this.sessions.size >= this.options.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }

    const id = randomUUID();
    this.sessions.set(id, { state: new Map(), lastSeen: this.now() });
    return id;
  }

  /** True when `sessionId` is live; marks it as just seen. */
  touch(sessionId: string): boolean {
    const entry = this.live(sessionId);
    if (!entry) return false;

    entry.lastSeen = this.now();
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, entry);
    return true;
  }

  get(sessionId: string, key: TargetKey): ConsoleState | undefined {
    return this.live(sessionId)?.state.get(key);
  }

  /** Ignored for ids that were never issued or have expired. */
  set(sessionId: string, key: TargetKey, state: ConsoleState): void {
    this.live(sessionId)?.state.set(key, state);
  }

  /** Returns the pending warning for a target once, then forgets it. */
  takeWarning(sessionId: string, key: TargetKey): string | undefined {
    const state = this.get(sessionId, key);
    const warning = state?.warning;
    if (state && warning) {
      this.set(sessionId, key, { statement: state.statement, result: state.result });
    }
    return warning;
  }

  private live(sessionId: string): Entry | undefined {
    const entry = this.sessions.get(sessionId);
    if (!entry) return undefined;
    if (this.now() - entry.lastSeen > this.options.idleMs) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return entry;
  }

  private prune(): void {
    const cutoff = this.now() - this.options.idleMs;
    for (const [id, entry] of this.sessions) {
      if (entry.lastSeen < cutoff) this.sessions.delete(id);
    }
  }
}
