/**
 * Socket.IO type definitions
 */

import type { SessionSnapshot } from "./session.js";

export interface SocketLogEvent {
  sessionId: string; // Session ID the browser identified with
  step: string;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface ServerToClientEvents {
  log: (event: SocketLogEvent) => void;
  snapshot: (snapshot: SessionSnapshot) => void;
}

export interface ClientToServerEvents {
  identify: (data: { sessionId?: string }) => void;
}

export interface InterServerEvents {}

export interface SocketData {
  sessionId?: string;
}

/**
 * Anything that can forward progress logs to a connected session
 */
export interface LogEmitter {
  emitLog(sessionId: string, step: string, message: string, metadata?: Record<string, unknown>): void;
}
