import type { Request, Response, NextFunction } from "express";

const MAX_MESSAGE_LENGTH = 2000;

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.trim().length > 0;

/**
 * Request validation middleware for chat endpoint
 */
export function validateChatRequest(req: Request, res: Response, next: NextFunction): void {
  const body: unknown = req.body;
  const sessionId = typeof body === "object" && body !== null && "sessionId" in body ? body.sessionId : undefined;
  const message = typeof body === "object" && body !== null && "message" in body ? body.message : undefined;

  if (!isNonEmptyString(message)) {
    res.status(400).json({
      error: "Validation error",
      message: "Request body must include 'message' field (non-empty string).",
    });
    return;
  }

  if (message.length > MAX_MESSAGE_LENGTH) {
    res.status(400).json({
      error: "Validation error",
      message: `'message' must be at most ${MAX_MESSAGE_LENGTH} characters.`,
    });
    return;
  }

  if (!isNonEmptyString(sessionId)) {
    res.status(400).json({
      error: "Validation error",
      message: "Request body must include 'sessionId' field (non-empty string) - a unique identifier for this chat session.",
    });
    return;
  }

  next();
}

/**
 * Session ids in the path must be non-blank and reasonably short
 */
export function validateSessionParam(req: Request, res: Response, next: NextFunction): void {
  const sessionId = req.params.sessionId;
  if (!isNonEmptyString(sessionId) || sessionId.length > 128) {
    res.status(400).json({
      error: "Validation error",
      message: "'sessionId' path parameter must be a non-empty string of at most 128 characters.",
    });
    return;
  }
  next();
}
