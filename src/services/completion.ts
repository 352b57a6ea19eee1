/**
 * Completion client backed by Genkit. Tool calls are returned to the agent loop, never run here.
 */

import { randomUUID } from "node:crypto";
import type { MessageData, Part, ToolRequestPart } from "genkit";
import type { Ai } from "../ai.js";
import type { ChatMessage, ToolCall } from "../types/session.js";
import type { CompletionClient, CompletionDecision, CompletionRequest, ToolSpec } from "../types/agent.js";
import type { Logger } from "../utils/logger.js";
import { CompletionError, TimeoutError, errorMessage, errorStatus } from "../utils/errors.js";
import { retryWithBackoff } from "../utils/retryWithBackoff.js";
import { withTimeout } from "../utils/withTimeout.js";

function parseToolOutput(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return content;
  }
}

/**
 * Session history to Genkit messages; consecutive tool results share one tool message
 */
export function toGenkitMessages(history: ChatMessage[]): MessageData[] {
  const messages: MessageData[] = [];

  for (const message of history) {
    if (message.role === "user") {
      messages.push({ role: "user", content: [{ text: message.content }] });
      continue;
    }

    if (message.role === "assistant") {
      const content: Part[] = [];
      if (message.content) {
        content.push({ text: message.content });
      }
      for (const call of message.toolCalls ?? []) {
        content.push({ toolRequest: { name: call.name, ref: call.id, input: call.args } });
      }
      messages.push({ role: "model", content });
      continue;
    }

    const part: Part = {
      toolResponse: { name: message.name, ref: message.toolCallId, output: parseToolOutput(message.content) },
    };
    const last = messages[messages.length - 1];
    if (last && last.role === "tool") {
      last.content.push(part);
    } else {
      messages.push({ role: "tool", content: [part] });
    }
  }

  return messages;
}

/**
 * Turn a model response into a reply or an ordered list of tool calls
 */
export function toDecision(text: string, toolRequests: ToolRequestPart[]): CompletionDecision {
  if (toolRequests.length > 0) {
    const calls: ToolCall[] = toolRequests.map(({ toolRequest }) => ({
      id: toolRequest.ref || randomUUID(),
      name: toolRequest.name,
      args: toolRequest.input ?? {},
    }));
    return text.trim() ? { kind: "tool_calls", calls, text: text.trim() } : { kind: "tool_calls", calls };
  }

  const reply = text.trim();
  if (!reply) {
    throw new CompletionError("Model returned neither text nor tool requests");
  }
  return { kind: "reply", text: reply };
}

function declareTool(ai: Ai, spec: ToolSpec) {
  return ai.defineTool(
    {
      name: spec.name,
      description: spec.description,
      inputSchema: spec.inputSchema,
    },
    async () => {
      throw new CompletionError(`Tool ${spec.name} is executed by the agent loop`);
    }
  );
}

type DeclaredTool = ReturnType<typeof declareTool>;

export interface GenkitCompletionOptions {
  timeoutMs: number;
  maxRetries?: number;
}

export class GenkitCompletionClient implements CompletionClient {
  private declared = new Map<string, DeclaredTool>();

  constructor(
    private readonly ai: Ai,
    private readonly logger: Logger,
    private readonly options: GenkitCompletionOptions
  ) {}

  private tool(spec: ToolSpec): DeclaredTool {
    let action = this.declared.get(spec.name);
    if (!action) {
      action = declareTool(this.ai, spec);
      this.declared.set(spec.name, action);
    }
    return action;
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(() => withTimeout(fn(), this.options.timeoutMs, label), {
        maxRetries: this.options.maxRetries ?? 2,
        logger: this.logger,
      });
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof CompletionError) {
        throw error;
      }
      const status = errorStatus(error);
      throw new CompletionError(`${label} failed: ${errorMessage(error)}`, {
        cause: error,
        ...(status !== undefined ? { status } : {}),
      });
    }
  }

  async decide(request: CompletionRequest): Promise<CompletionDecision> {
    const startTime = Date.now();
    const response = await this.call("Model decision", () =>
      this.ai.generate({
        system: request.system,
        messages: toGenkitMessages(request.history),
        tools: request.tools.map((spec) => this.tool(spec)),
        returnToolRequests: true,
        ...(request.temperature !== undefined ? { config: { temperature: request.temperature } } : {}),
      })
    );

    const decision = toDecision(response.text, response.toolRequests);
    this.logger.aiAction("Model Decision", {
      duration: Date.now() - startTime,
      kind: decision.kind,
      tools: decision.kind === "tool_calls" ? decision.calls.map((call) => call.name) : [],
      response: decision.kind === "reply" ? decision.text : undefined,
    });
    return decision;
  }

  async generateText(prompt: string, temperature?: number): Promise<string> {
    const response = await this.call("Text generation", () =>
      this.ai.generate({
        prompt,
        ...(temperature !== undefined ? { config: { temperature } } : {}),
      })
    );
    return response.text;
  }
}
