/**
 * Central type exports
 * Import all types from this file for convenience
 */

// Session types
export type {
  ToolCall,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  ChatMessage,
  ProfileField,
  CustomerProfile,
  CartItem,
  Cart,
  Session,
  CartSnapshot,
  SessionSnapshot,
} from "./session.js";

// Agent types
export type {
  AgentState,
  ToolName,
  ToolStatus,
  ToolResult,
  QueryRow,
  QueryClient,
  ToolSpec,
  CompletionDecision,
  CompletionRequest,
  CompletionClient,
  ToolDeps,
  OrderTool,
  ToolCallRecord,
  TurnInput,
  TurnResult,
} from "./agent.js";

// Socket types
export type {
  SocketLogEvent,
  ServerToClientEvents,
  ClientToServerEvents,
  SocketData,
  LogEmitter,
} from "./socket.js";

// Logger types
export { LogLevel } from "./logger.js";
export type { LogEntry } from "./logger.js";
