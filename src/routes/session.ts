import { Router } from "express";
import type { Request, Response } from "express";
import type { AppContext } from "../context.js";
import { validateSessionParam } from "../middleware/validation.js";
import { WELCOME_MESSAGE } from "../orderFlow/prompts.js";
import { errorMessage, toError } from "../utils/errors.js";

export function createSessionRouter(context: Pick<AppContext, "agent" | "sessions" | "socket" | "logger">): Router {
  const router = Router();
  const { agent, sessions, socket, logger } = context;

  /**
   * GET /sessions/:sessionId - Cart, profile and diagnostics for a session
   */
  router.get("/sessions/:sessionId", validateSessionParam, (req: Request, res: Response) => {
    const { sessionId } = req.params;
    const session = sessions.get(sessionId);
    const snapshot = sessions.snapshot(sessionId);

    res.json({
      ...snapshot,
      diagnostics: {
        createdAt: session ? session.createdAt.toISOString() : null,
        hasName: snapshot.profile.name !== null,
        hasAddress: snapshot.profile.address !== null,
        hasPayment: snapshot.profile.payment !== null,
        cartItems: snapshot.cart.items.length,
      },
      welcome: WELCOME_MESSAGE,
    });
  });

  /**
   * POST /sessions/:sessionId/reset - Start over with an empty cart, profile and history
   */
  router.post("/sessions/:sessionId/reset", validateSessionParam, async (req: Request, res: Response) => {
    const { sessionId } = req.params;
    try {
      await agent.resetSession(sessionId);
      const snapshot = sessions.snapshot(sessionId);
      socket.emitSnapshot(snapshot);
      logger.info("Session reset", { sessionId });
      res.json(snapshot);
    } catch (error) {
      logger.error("Session reset failed", { sessionId, error: errorMessage(error) }, toError(error));
      res.status(500).json({
        error: "Internal server error",
        message: errorMessage(error),
      });
    }
  });

  return router;
}
