import { Router } from "express";
import type { Request, Response } from "express";
import type { AppContext } from "../context.js";

export function createHealthRouter(context: Pick<AppContext, "sessions" | "socket">): Router {
  const router = Router();

  /**
   * GET /health - Health check endpoint
   */
  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      service: "pastel-order-agent",
      activeSessions: context.sessions.size,
      connectedSessions: context.socket.getConnectedSessionsCount(),
    });
  });

  return router;
}
