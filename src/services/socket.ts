/**
 * Socket.IO service for real-time progress and cart updates to the browser
 */

import { Server as SocketIOServer } from "socket.io";
import type { Server as HTTPServer } from "http";
import type {
  ClientToServerEvents,
  InterServerEvents,
  LogEmitter,
  ServerToClientEvents,
  SocketData,
  SocketLogEvent,
} from "../types/socket.js";
import type { SessionSnapshot } from "../types/session.js";
import type { Logger } from "../utils/logger.js";

export type { SocketLogEvent };

type OrderSocketServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

const SENSITIVE_KEYS = ["password", "token", "secret", "apikey", "authorization"];

/**
 * Trim metadata before it leaves the server: no secrets, no deep nesting, no huge strings
 */
export function sanitizeMetadata(metadata?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!metadata) return undefined;

  const seen = new WeakSet<object>();

  const sanitizeValue = (value: unknown, depth: number = 0): unknown => {
    if (depth > 3) return "[Too Deep]";
    if (value === null || value === undefined) return value;

    if (typeof value !== "object") {
      if (typeof value === "string" && value.length > 200) {
        return value.substring(0, 200) + "...";
      }
      return typeof value === "function" ? undefined : value;
    }

    if (Array.isArray(value)) {
      return value.slice(0, 10).map((item) => sanitizeValue(item, depth + 1));
    }

    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }

    if (value instanceof Date) {
      return value.toISOString();
    }

    if (seen.has(value)) {
      return "[Circular]";
    }
    seen.add(value);

    const result: Record<string, unknown> = {};
    let keyCount = 0;
    for (const [key, val] of Object.entries(value)) {
      if (SENSITIVE_KEYS.some((s) => key.toLowerCase().includes(s))) {
        result[key] = "[Redacted]";
        continue;
      }
      if (typeof val === "function") {
        continue;
      }
      if (keyCount >= 20) {
        result["..."] = "[More fields...]";
        break;
      }
      result[key] = sanitizeValue(val, depth + 1);
      keyCount++;
    }

    return result;
  };

  const sanitized = sanitizeValue(metadata);
  return typeof sanitized === "object" && sanitized !== null && !Array.isArray(sanitized)
    ? Object.fromEntries(Object.entries(sanitized))
    : undefined;
}

export class SocketService implements LogEmitter {
  private io: OrderSocketServer | null = null;
  private sessionSockets: Map<string, Set<string>> = new Map(); // sessionId -> Set of socketIds

  constructor(private readonly logger?: Logger) {}

  initialize(httpServer: HTTPServer, corsOrigin: string): void {
    this.io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(httpServer, {
      cors: {
        origin: corsOrigin,
        methods: ["GET", "POST"],
        credentials: true,
      },
    });

    this.logger?.info("Socket.IO server initialized", { corsOrigin });

    this.io.on("connection", (socket) => {
      this.logger?.debug("Socket connected", { socketId: socket.id });

      socket.on("identify", ({ sessionId }) => {
        if (!sessionId) return;
        this.track(sessionId, socket.id);
        socket.data.sessionId = sessionId;
        this.logger?.debug("Socket identified", { sessionId, socketId: socket.id });
      });

      socket.on("disconnect", () => {
        const sessionId = socket.data.sessionId;
        if (sessionId) {
          this.untrack(sessionId, socket.id);
        }
        this.logger?.debug("Socket disconnected", { sessionId, socketId: socket.id });
      });
    });
  }

  track(sessionId: string, socketId: string): void {
    let sockets = this.sessionSockets.get(sessionId);
    if (!sockets) {
      sockets = new Set();
      this.sessionSockets.set(sessionId, sockets);
    }
    sockets.add(socketId);
  }

  untrack(sessionId: string, socketId: string): void {
    const sockets = this.sessionSockets.get(sessionId);
    if (!sockets) return;
    sockets.delete(socketId);
    if (sockets.size === 0) {
      this.sessionSockets.delete(sessionId);
    }
  }

  emitLog(sessionId: string, step: string, message: string, metadata?: Record<string, unknown>): void {
    const sockets = this.sessionSockets.get(sessionId);
    if (!this.io || !sockets || sockets.size === 0) {
      return;
    }

    const logEvent: SocketLogEvent = {
      sessionId,
      step,
      message,
      timestamp: new Date().toISOString(),
    };

    const sanitized = sanitizeMetadata(metadata);
    if (sanitized && Object.keys(sanitized).length > 0) {
      logEvent.metadata = sanitized;
    }

    for (const socketId of sockets) {
      this.io.to(socketId).emit("log", logEvent);
    }
  }

  emitSnapshot(snapshot: SessionSnapshot): void {
    const sockets = this.sessionSockets.get(snapshot.sessionId);
    if (!this.io || !sockets) {
      return;
    }
    for (const socketId of sockets) {
      this.io.to(socketId).emit("snapshot", snapshot);
    }
  }

  isSessionConnected(sessionId: string): boolean {
    const sockets = this.sessionSockets.get(sessionId);
    return sockets !== undefined && sockets.size > 0;
  }

  getConnectedSessionsCount(): number {
    return this.sessionSockets.size;
  }

  async close(): Promise<void> {
    const io = this.io;
    this.io = null;
    this.sessionSockets.clear();
    if (io) {
      await new Promise<void>((resolve) => {
        io.close(() => resolve());
      });
    }
  }
}
