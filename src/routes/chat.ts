import { Router } from "express";
import type { Request, Response } from "express";
import type { AppContext } from "../context.js";
import { validateChatRequest } from "../middleware/validation.js";
import { errorMessage, toError } from "../utils/errors.js";

interface ChatRequestBody {
  sessionId: string;
  message: string;
}

export function createChatRouter(context: Pick<AppContext, "agent" | "logger" | "socket">): Router {
  const router = Router();
  const { agent, logger, socket } = context;

  /**
   * POST /chat - One conversational turn
   *
   * Request body:
   * - sessionId: string (required) - Browser session identifier
   * - message: string (required) - What the customer typed
   */
  router.post("/chat", validateChatRequest, async (req: Request, res: Response) => {
    const startTime = Date.now();
    const { sessionId, message }: ChatRequestBody = req.body;

    try {
      logger.info("Chat request received", { sessionId, messageLength: message.length });

      const result = await agent.handleTurn({ sessionId, message });
      socket.emitSnapshot(result.snapshot);

      logger.info("Chat request completed", {
        sessionId,
        duration: Date.now() - startTime,
        toolCalls: result.toolCalls.length,
        failed: result.failed,
      });

      return res.json({
        reply: result.reply,
        snapshot: result.snapshot,
        failed: result.failed,
      });
    } catch (error) {
      logger.error("Chat request failed", {
        sessionId,
        duration: Date.now() - startTime,
        error: errorMessage(error),
      }, toError(error));

      return res.status(500).json({
        error: "Internal server error",
        message: errorMessage(error),
      });
    }
  });

  return router;
}
