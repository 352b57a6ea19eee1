/**
 * Agent loop: one user message in, one assistant reply out, with tool rounds in between
 */

import type { AgentState, CompletionClient, ToolCallRecord, TurnInput, TurnResult } from "../types/agent.js";
import type { ChatMessage, Session } from "../types/session.js";
import type { SessionRegistry } from "../services/sessionRegistry.js";
import { trimHistory } from "../services/sessionRegistry.js";
import type { ToolRegistry } from "../tools/index.js";
import type { ToolRouter } from "./toolRouter.js";
import type { Logger } from "../utils/logger.js";
import { errorMessage, getUserFriendlyErrorMessage, toError } from "../utils/errors.js";
import { AI_TEMPERATURES, buildSystemPrompt, MAX_ROUNDS_FALLBACK } from "./prompts.js";

const STEP_NAMES: Record<AgentState, string> = {
  AWAITING_INPUT: "Awaiting Input",
  MODEL_DECIDING: "Model Deciding",
  TOOL_EXECUTING: "Tool Executing",
  RESPONDING: "Responding",
};

export interface OrderAgentDeps {
  sessions: SessionRegistry;
  tools: ToolRegistry;
  router: ToolRouter;
  completion: CompletionClient;
  logger: Logger;
}

export interface OrderAgentOptions {
  maxToolRounds: number;
  historyWindow: number;
}

class TurnTracker {
  state: AgentState = "AWAITING_INPUT";

  constructor(
    private readonly logger: Logger,
    private readonly sessionId: string
  ) {}

  to(next: AgentState, details?: Record<string, unknown>): void {
    this.state = next;
    this.logger.flowStep(STEP_NAMES[next], details, this.sessionId);
  }
}

export class OrderAgent {
  constructor(
    private readonly deps: OrderAgentDeps,
    private readonly options: OrderAgentOptions
  ) {}

  /**
   * Process one turn; turns for the same session never overlap
   */
  handleTurn(input: TurnInput): Promise<TurnResult> {
    return this.deps.sessions.runExclusive(input.sessionId, () => this.runTurn(input));
  }

  /**
   * Reset the session once any in-flight turn has finished
   */
  resetSession(sessionId: string): Promise<Session> {
    return this.deps.sessions.runExclusive(sessionId, async () => {
      this.deps.logger.flowStep("Session Reset", undefined, sessionId);
      return this.deps.sessions.reset(sessionId);
    });
  }

  private message(role: "user" | "assistant", content: string): ChatMessage {
    return { role, content, timestamp: new Date() };
  }

  private async runTurn({ sessionId, message }: TurnInput): Promise<TurnResult> {
    const { sessions, logger } = this.deps;
    const startTime = Date.now();
    const session = sessions.getOrCreate(sessionId);
    const historyBefore = [...session.history];
    const tracker = new TurnTracker(logger, sessionId);
    const toolCalls: ToolCallRecord[] = [];

    logger.flowStep("Turn Started", { messageLength: message.length }, sessionId);
    sessions.appendMessage(session, this.message("user", message));

    try {
      const { reply, forced } = await this.decideAndAct(session, tracker, toolCalls);

      tracker.to("RESPONDING", { forced });
      sessions.appendMessage(session, this.message("assistant", reply));
      logger.flowStep("Turn Completed", { duration: Date.now() - startTime, toolCalls: toolCalls.length }, sessionId);

      return { reply, snapshot: sessions.snapshot(sessionId), toolCalls, forced, failed: false };
    } catch (error) {
      logger.error("Turn failed", {
        sessionId,
        state: tracker.state,
        duration: Date.now() - startTime,
        error: errorMessage(error),
      }, toError(error));

      const reply = getUserFriendlyErrorMessage(error);
      session.history = historyBefore;
      sessions.appendMessage(session, this.message("user", message));
      sessions.appendMessage(session, this.message("assistant", reply));
      logger.flowStep("Turn Failed", { state: tracker.state }, sessionId);

      return { reply, snapshot: sessions.snapshot(sessionId), toolCalls, forced: false, failed: true };
    }
  }

  private async decideAndAct(
    session: Session,
    tracker: TurnTracker,
    toolCalls: ToolCallRecord[]
  ): Promise<{ reply: string; forced: boolean }> {
    const { tools, completion, router, sessions, logger } = this.deps;
    const specs = tools.list();
    let rounds = 0;

    for (;;) {
      tracker.to("MODEL_DECIDING", { round: rounds });
      const decision = await completion.decide({
        system: buildSystemPrompt(session),
        history: trimHistory(session.history, this.options.historyWindow),
        tools: specs,
      });

      if (decision.kind === "reply") {
        return { reply: decision.text, forced: false };
      }

      if (rounds >= this.options.maxToolRounds) {
        logger.warn("Tool round limit reached, forcing a reply", {
          sessionId: session.id,
          rounds,
          requested: decision.calls.map((call) => call.name),
        });
        return { reply: await this.forceReply(session), forced: true };
      }
      rounds++;

      sessions.appendMessage(session, {
        role: "assistant",
        content: decision.text ?? "",
        toolCalls: decision.calls,
        timestamp: new Date(),
      });

      for (const call of decision.calls) {
        tracker.to("TOOL_EXECUTING", { tool: call.name, round: rounds });
        const result = await router.route(session, call);
        toolCalls.push({ name: call.name, args: call.args, result });
        sessions.appendMessage(session, {
          role: "tool",
          toolCallId: call.id,
          name: call.name,
          content: JSON.stringify(result),
          timestamp: new Date(),
        });
      }
    }
  }

  /**
   * One last decision with no tools on offer. A model that still asks for tools, or a call that fails,
   * gets the fixed fallback so the tool results already gathered are kept.
   */
  private async forceReply(session: Session): Promise<string> {
    try {
      const decision = await this.deps.completion.decide({
        system: buildSystemPrompt(session),
        history: trimHistory(session.history, this.options.historyWindow),
        tools: [],
        temperature: AI_TEMPERATURES.FORCED_REPLY,
      });
      return decision.kind === "reply" ? decision.text : MAX_ROUNDS_FALLBACK;
    } catch (error) {
      this.deps.logger.warn(
        "Forced reply failed, using fallback",
        { sessionId: session.id, error: errorMessage(error) },
        toError(error)
      );
      return MAX_ROUNDS_FALLBACK;
    }
  }
}
