/**
 * Agent loop, tool and external interface type definitions
 */

import type { z } from "genkit";
import type { ChatMessage, Session, SessionSnapshot, ToolCall } from "./session.js";
import type { Logger } from "../utils/logger.js";

export type AgentState = "AWAITING_INPUT" | "MODEL_DECIDING" | "TOOL_EXECUTING" | "RESPONDING";

export type ToolName =
  | "menu"
  | "add_to_cart"
  | "remove_from_cart"
  | "view_cart"
  | "clear_cart"
  | "set_profile_field"
  | "confirm_order";

export type ToolStatus = "ok" | "not_found" | "precondition_failed" | "invalid_arguments" | "error";

/**
 * Payload fed back to the model after a tool runs
 */
export interface ToolResult {
  status: ToolStatus;
  message: string;
  data?: unknown;
}

export type QueryRow = Record<string, unknown>;

/**
 * Opaque access to the menu data store. The query text is passed through untouched.
 * A session id routes the query's progress event to that session's sockets.
 */
export interface QueryClient {
  runQuery(query: string, sessionId?: string): Promise<QueryRow[]>;
  close?(): Promise<void>;
}

/**
 * Tool declaration as exposed to the model
 */
export interface ToolSpec {
  name: ToolName;
  description: string;
  inputSchema: z.ZodTypeAny;
}

export type CompletionDecision =
  | { kind: "reply"; text: string }
  | { kind: "tool_calls"; calls: ToolCall[]; text?: string };

export interface CompletionRequest {
  system: string;
  history: ChatMessage[];
  tools: ToolSpec[];
  temperature?: number;
}

export interface CompletionClient {
  decide(request: CompletionRequest): Promise<CompletionDecision>;
  generateText(prompt: string, temperature?: number): Promise<string>;
}

/**
 * Collaborators a tool may reach during execution
 */
export interface ToolDeps {
  queryClient: QueryClient;
  completion: CompletionClient;
  logger: Logger;
  schemaDescription: () => Promise<string>;
}

export interface OrderTool extends ToolSpec {
  execute(session: Session, args: unknown, deps: ToolDeps): Promise<ToolResult>;
}

export interface ToolCallRecord {
  name: string;
  args: unknown;
  result: ToolResult;
}

export interface TurnInput {
  sessionId: string;
  message: string;
}

export interface TurnResult {
  reply: string;
  snapshot: SessionSnapshot;
  toolCalls: ToolCallRecord[];
  forced: boolean;
  failed: boolean;
}
