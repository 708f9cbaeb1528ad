import type { RenderSession } from "./session";

/**
 * Where render sessions live between requests.
 */
export interface SessionStore {
  get(sessionId: string): RenderSession | undefined;
  set(session: RenderSession): void;
  delete(sessionId: string): boolean;
  has(sessionId: string): boolean;
  values(): IterableIterator<RenderSession>;
  readonly size: number;
  /** Destroy and drop sessions idle for longer than `ttlMs` */
  sweep(now: number, ttlMs: number): string[];
}

/**
 * Process-local session store.
 */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, RenderSession>();

  get(sessionId: string): RenderSession | undefined {
    return this.sessions.get(sessionId);
  }

  set(session: RenderSession): void {
    this.sessions.set(session.id, session);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  values(): IterableIterator<RenderSession> {
    return this.sessions.values();
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Destroy and drop sessions idle for longer than `ttlMs`.
   *
   * @returns the ids of the swept sessions
   */
  sweep(now: number, ttlMs: number): string[] {
    const swept: string[] = [];
    for (const session of this.sessions.values()) {
      if (!session.isBusy && now - session.lastActivity > ttlMs) {
        session.destroy("idle");
        this.sessions.delete(session.id);
        swept.push(session.id);
      }
    }
    return swept;
  }
}
