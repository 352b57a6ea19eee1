/**
 * Session, profile and cart type definitions
 */

export interface ToolCall {
  id: string;
  name: string;
  args: unknown;
}

export interface UserMessage {
  role: "user";
  content: string;
  timestamp: Date;
}

export interface AssistantMessage {
  role: "assistant";
  content: string;
  toolCalls?: ToolCall[]; // Present when the model asked for tools instead of replying
  timestamp: Date;
}

export interface ToolMessage {
  role: "tool";
  toolCallId: string;
  name: string;
  content: string; // JSON-encoded ToolResult
  timestamp: Date;
}

export type ChatMessage = UserMessage | AssistantMessage | ToolMessage;

export type ProfileField = "name" | "address" | "payment";

export interface CustomerProfile {
  name: string | null;
  address: string | null;
  payment: string | null;
}

export interface CartItem {
  name: string;
  quantity: number;
  unitPrice: number;
}

export interface Cart {
  items: CartItem[];
  confirmed: boolean;
}

export interface Session {
  id: string;
  history: ChatMessage[];
  profile: CustomerProfile;
  cart: Cart;
  createdAt: Date;
}

export interface CartSnapshot {
  items: CartItem[];
  total: number;
  confirmed: boolean;
}

/**
 * Read-only view handed to the UI after every turn
 */
export interface SessionSnapshot {
  sessionId: string;
  cart: CartSnapshot;
  profile: CustomerProfile;
  orderReady: boolean;
  messageCount: number;
}
