/**
 * Session registry: owns every session's history, profile and cart, in memory only
 */

import type { ChatMessage, Session, SessionSnapshot } from "../types/session.js";
import { createCart, getCartSnapshot } from "./cart.js";
import { createProfile, isOrderReady } from "./profile.js";

export interface SessionRegistryOptions {
  historyLimit?: number;
}

function createSession(id: string): Session {
  return {
    id,
    history: [],
    profile: createProfile(),
    cart: createCart(),
    createdAt: new Date(),
  };
}

/**
 * Drop the oldest messages beyond `limit`, then keep dropping until history starts at a user message.
 * The current turn is never cut.
 */
export function trimHistory(history: ChatMessage[], limit: number): ChatMessage[] {
  if (history.length <= limit) {
    return history;
  }

  let start = history.length - limit;
  while (start < history.length && history[start]?.role !== "user") {
    start++;
  }
  if (start === history.length) {
    // A single turn longer than the limit: keep it whole from its user message
    const lastUser = history.map((message) => message.role).lastIndexOf("user");
    start = lastUser >= 0 ? lastUser : history.length - limit;
  }
  return history.slice(start);
}

export class SessionRegistry {
  private sessions = new Map<string, Session>();
  private queues = new Map<string, Promise<unknown>>();
  private historyLimit: number;

  constructor({ historyLimit = 200 }: SessionRegistryOptions = {}) {
    this.historyLimit = historyLimit;
  }

  getOrCreate(sessionId: string): Session {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = createSession(sessionId);
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Replace the session with fresh defaults, discarding cart, profile and history
   */
  reset(sessionId: string): Session {
    const session = createSession(sessionId);
    this.sessions.set(sessionId, session);
    return session;
  }

  appendMessage(session: Session, message: ChatMessage): void {
    session.history.push(message);
    if (session.history.length > this.historyLimit) {
      session.history = trimHistory(session.history, this.historyLimit);
    }
  }

  /**
   * Read-only view of a session. An unknown id yields the defaults of a fresh session without storing one.
   */
  snapshot(sessionId: string): SessionSnapshot {
    const session = this.sessions.get(sessionId) ?? createSession(sessionId);
    return {
      sessionId: session.id,
      cart: getCartSnapshot(session.cart),
      profile: { ...session.profile },
      orderReady: isOrderReady(session.profile, session.cart),
      messageCount: session.history.length,
    };
  }

  /**
   * Run `task` after every earlier task for the same session has settled
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task, task);
    const settled = run.catch(() => undefined);
    this.queues.set(sessionId, settled);

    try {
      return await run;
    } finally {
      if (this.queues.get(sessionId) === settled) {
        this.queues.delete(sessionId);
      }
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  clear(): void {
    this.sessions.clear();
    this.queues.clear();
  }
}
