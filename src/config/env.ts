/**
 * Environment configuration and validation
 */

import type { Logger } from "../utils/logger.js";

export interface FalkorConfig {
  url: string | undefined;
  host: string;
  port: number;
  username: string | undefined;
  password: string | undefined;
  graph: string;
}

export interface AgentConfig {
  maxToolRounds: number;
  historyWindow: number;
  historyLimit: number;
  completionTimeoutMs: number;
  queryTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  frontendUrl: string;
  nodeEnv: string;
  logLevel: string | undefined;
  geminiApiKey: string;
  aiModel: string;
  aiTemperature: number;
  falkor: FalkorConfig;
  agent: AgentConfig;
}

type Env = Record<string, string | undefined>;

const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const float = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value || "");
  return Number.isNaN(parsed) ? fallback : parsed;
};

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: int(env.PORT, 3000),
    frontendUrl: env.FRONTEND_URL || "*",
    nodeEnv: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL,
    geminiApiKey: env.GEMINI_API_KEY || "",
    aiModel: env.AI_MODEL || "gemini-2.5-flash",
    aiTemperature: float(env.AI_TEMPERATURE, 0.4),
    falkor: {
      url: env.FALKORDB_URL,
      host: env.FALKORDB_HOST || "localhost",
      port: int(env.FALKORDB_PORT, 6379),
      username: env.FALKORDB_USERNAME,
      password: env.FALKORDB_PASSWORD,
      graph: env.FALKORDB_GRAPH || "kg_pastel",
    },
    agent: {
      maxToolRounds: int(env.AGENT_MAX_TOOL_ROUNDS, 5),
      historyWindow: int(env.AGENT_HISTORY_WINDOW, 40),
      historyLimit: int(env.SESSION_HISTORY_LIMIT, 200),
      completionTimeoutMs: int(env.COMPLETION_TIMEOUT_MS, 30000),
      queryTimeoutMs: int(env.QUERY_TIMEOUT_MS, 10000),
    },
  };
}

/**
 * Validate required environment variables
 */
export function validateEnv(logger: Logger, env: Env = process.env): string[] {
  const required = ["GEMINI_API_KEY"];
  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    logger.warn(`Missing environment variables: ${missing.join(", ")}`, {
      hint: "Some features may not work correctly.",
    });
  }

  return missing;
}
