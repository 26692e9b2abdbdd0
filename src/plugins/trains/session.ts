import type { SessionContext } from './types.js';

/**
 * In-memory per-chat sessions. Handlers receive the session explicitly
 * instead of sharing a process-wide "last station".
 */
export class SessionRegistry {
  private readonly sessions: Map<string, SessionContext> = new Map();

  get(contextId: string): SessionContext {
    let session = this.sessions.get(contextId);
    if (!session) {
      session = { contextId };
      this.sessions.set(contextId, session);
    }
    return session;
  }

  clear(): void {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }
}
