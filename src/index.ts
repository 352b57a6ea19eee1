import { createServer } from "http";
import { loadConfig, validateEnv } from "./config/env.js";
import { createAppContext } from "./context.js";
import { createApp } from "./app.js";
import { errorMessage, toError } from "./utils/errors.js";

const config = loadConfig();
const context = createAppContext(config);
const { logger } = context;

// Validate environment variables
validateEnv(logger);

const app = createApp(context);
const httpServer = createServer(app);

// Initialize Socket.IO for progress and cart updates
context.socket.initialize(httpServer, config.frontendUrl);

httpServer.listen(config.port, () => {
  logger.info("Server started", {
    port: config.port,
    environment: config.nodeEnv,
    frontendUrl: config.frontendUrl,
    model: config.aiModel,
    graph: config.falkor.graph,
  });
  console.log(`🚀 Server listening on port ${config.port}`);
  console.log(`📡 Socket.IO server initialized`);
  console.log(`🌍 Environment: ${config.nodeEnv}`);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutdown requested", { signal });

  try {
    // Closing Socket.IO also closes the HTTP server it is attached to
    await context.close();
    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }
    process.exit(0);
  } catch (error) {
    logger.error("Shutdown failed", { error: errorMessage(error) }, toError(error));
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
