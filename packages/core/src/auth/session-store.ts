import type { SessionInfo } from "./types";

/**
 * Keeps sessions by session id.
 */
export type SessionStore = {
  restore(sessionId: string): Promise<SessionInfo | null>;
  save(sessionId: string, session: SessionInfo): Promise<void>;
  delete(sessionId: string): Promise<void>;
};

/**
 * Process-local store. Sessions live as long as the store does.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionInfo>();

  async restore(sessionId: string) {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async save(sessionId: string, session: SessionInfo) {
    this.sessions.set(sessionId, { ...session });
  }

  async delete(sessionId: string) {
    this.sessions.delete(sessionId);
  }

  get size() {
    return this.sessions.size;
  }
}
