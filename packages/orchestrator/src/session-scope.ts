/**
 * Maps an inbound conversation to the one session id used for every
 * downstream call made on its behalf.
 *
 * Holds at most `maxSessions` conversations; the least recently used one is
 * dropped first and starts a fresh downstream session if it comes back.
 */

export const DEFAULT_MAX_SESSIONS = 10_000;

export interface SessionScopeOptions {
  readonly createId?: (() => string) | undefined;
  readonly maxSessions?: number | undefined;
}

export class SessionScope {
  private readonly sessions = new Map<string, string>();
  private readonly createId: () => string;
  private readonly maxSessions: number;

  constructor(options?: SessionScopeOptions) {
    this.createId = options?.createId ?? (() => crypto.randomUUID());
    this.maxSessions = options?.maxSessions ?? DEFAULT_MAX_SESSIONS;
    if (!Number.isInteger(this.maxSessions) || this.maxSessions < 1) {
      throw new RangeError(`maxSessions must be an integer >= 1, got ${this.maxSessions}`);
    }
  }

  /** Downstream session for a conversation, created on first use */
  sessionFor(conversationId: string): string {
    const existing = this.sessions.get(conversationId);
    if (existing) {
      this.sessions.delete(conversationId);
      this.sessions.set(conversationId, existing);
      return existing;
    }

    const sessionId = this.createId();
    this.sessions.set(conversationId, sessionId);
    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
    }
    return sessionId;
  }

  forget(conversationId: string): boolean {
    return this.sessions.delete(conversationId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
