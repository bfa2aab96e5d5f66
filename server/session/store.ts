/**
 * Session Store
 *
 * Maps a chat user id to the Genie conversation id of their ongoing thread.
 * This is the only mutable state shared between concurrent turns; each
 * get/put is a single-key operation with no transactional guarantee across
 * keys or calls.
 */

export interface ISessionStore {
  get(userId: string): Promise<string | undefined>;
  put(userId: string, conversationId: string): Promise<void>;
}

export type MemSessionStoreOptions = {
  /** Evict the least recently written session beyond this many. Unbounded when unset. */
  maxSessions?: number;
  /** Forget sessions not written for this long. Never expire when unset. */
  ttlMs?: number;
  now?: () => number;
};

type SessionEntry = {
  conversationId: string;
  updatedAt: number;
};

/**
 * Process-local store. With no options it keeps every session for the life
 * of the process, so memory grows with the number of distinct users.
 */
export class MemSessionStore implements ISessionStore {
  private sessions: Map<string, SessionEntry> = new Map();
  private maxSessions?: number;
  private ttlMs?: number;
  private now: () => number;

  constructor(options: MemSessionStoreOptions = {}) {
    this.maxSessions = options.maxSessions;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  async get(userId: string): Promise<string | undefined> {
    const entry = this.sessions.get(userId);
    if (!entry) return undefined;

    if (this.ttlMs !== undefined && this.now() - entry.updatedAt > this.ttlMs) {
      this.sessions.delete(userId);
      return undefined;
    }
    return entry.conversationId;
  }

  async put(userId: string, conversationId: string): Promise<void> {
    this.evictExpired();

    // Re-insert so Map order tracks write recency
    this.sessions.delete(userId);
    this.sessions.set(userId, { conversationId, updatedAt: this.now() });

    if (this.maxSessions !== undefined) {
      while (this.sessions.size > this.maxSessions) {
        const oldest = this.sessions.keys().next();
        if (oldest.done) break;
        this.sessions.delete(oldest.value);
      }
    }
  }

  /** Entries are in write order, so stop at the first one still live. */
  private evictExpired(): void {
    if (this.ttlMs === undefined) return;
    const cutoff = this.now() - this.ttlMs;
    for (const [userId, entry] of this.sessions) {
      if (entry.updatedAt >= cutoff) break;
      this.sessions.delete(userId);
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}
