import cors from "cors";

/**
 * CORS configuration middleware
 */
export const createCorsMiddleware = (origin: string) =>
  cors({
    origin, // "*" in development, the shop front-end URL in production
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  });
