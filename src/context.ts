/**
 * Application context: everything the server shares, built once and torn down explicitly
 */

import type { AppConfig } from "./config/env.js";
import type { CompletionClient, QueryClient, ToolDeps } from "./types/agent.js";
import { createLogger, parseLogLevel } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";
import { SessionRegistry } from "./services/sessionRegistry.js";
import { SocketService } from "./services/socket.js";
import { GenkitCompletionClient } from "./services/completion.js";
import { FalkorQueryClient } from "./database/falkorClient.js";
import { GraphSchemaCache } from "./schema/graphSchema.js";
import { ORDER_TOOLS, ToolRegistry } from "./tools/index.js";
import { ToolRouter } from "./orderFlow/toolRouter.js";
import { OrderAgent } from "./orderFlow/index.js";
import { createAi } from "./ai.js";

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  sessions: SessionRegistry;
  socket: SocketService;
  queryClient: QueryClient;
  completion: CompletionClient;
  schema: GraphSchemaCache;
  tools: ToolRegistry;
  agent: OrderAgent;
  close(): Promise<void>;
}

export interface AppContextOverrides {
  logger?: Logger;
  queryClient?: QueryClient;
  completion?: CompletionClient;
}

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger(parseLogLevel(config.logLevel));
  const socket = new SocketService(logger);
  logger.setEmitter(socket);

  const sessions = new SessionRegistry({ historyLimit: config.agent.historyLimit });
  const queryClient =
    overrides.queryClient ?? new FalkorQueryClient(config.falkor, logger, config.agent.queryTimeoutMs);
  const completion =
    overrides.completion ??
    new GenkitCompletionClient(createAi(config), logger, { timeoutMs: config.agent.completionTimeoutMs });
  const schema = new GraphSchemaCache(queryClient, logger);
  const tools = new ToolRegistry(ORDER_TOOLS);

  const toolDeps: ToolDeps = {
    queryClient,
    completion,
    logger,
    schemaDescription: () => schema.get(),
  };
  const router = new ToolRouter(tools, toolDeps);
  const agent = new OrderAgent(
    { sessions, tools, router, completion, logger },
    { maxToolRounds: config.agent.maxToolRounds, historyWindow: config.agent.historyWindow }
  );

  return {
    config,
    logger,
    sessions,
    socket,
    queryClient,
    completion,
    schema,
    tools,
    agent,
    async close() {
      logger.info("Shutting down application context", { sessions: sessions.size });
      sessions.clear();
      logger.setEmitter(null);
      await socket.close();
      await queryClient.close?.();
    },
  };
}
