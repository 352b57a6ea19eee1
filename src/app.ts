import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { AppContext } from "./context.js";
import { createCorsMiddleware } from "./middleware/cors.js";
import { createChatRouter } from "./routes/chat.js";
import { createHealthRouter } from "./routes/health.js";
import { createSessionRouter } from "./routes/session.js";

/**
 * Build the Express app around an application context
 */
export function createApp(context: AppContext): express.Express {
  const { config, logger } = context;
  const app = express();

  // Middleware
  app.use(createCorsMiddleware(config.frontendUrl));
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    if (req.path !== "/health") {
      logger.info("Incoming request", {
        method: req.method,
        path: req.path,
        ip: req.ip,
      });
    }
    next();
  });

  // Routes
  app.use("/", createHealthRouter(context));
  app.use("/", createChatRouter(context));
  app.use("/", createSessionRouter(context));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: "Not found",
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Error handling middleware
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled error", {
      path: req.path,
      method: req.method,
    }, err);

    const isBadJson = err instanceof SyntaxError && "body" in err;
    res.status(isBadJson ? 400 : 500).json({
      error: isBadJson ? "Validation error" : "Internal server error",
      message: isBadJson || config.nodeEnv === "development" ? err.message : "An unexpected error occurred",
    });
  });

  return app;
}
