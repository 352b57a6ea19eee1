import type { Session, ToolCall } from "../types/session.js";
import type { ToolDeps, ToolResult } from "../types/agent.js";
import type { ToolRegistry } from "../tools/index.js";

/**
 * Dispatches a model tool call to the registered tool of the same name
 */
export class ToolRouter {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly deps: ToolDeps
  ) {}

  async route(session: Session, call: ToolCall): Promise<ToolResult> {
    const tool = this.registry.get(call.name);
    if (!tool) {
      this.deps.logger.warn("No tool registered for call", { sessionId: session.id, tool: call.name });
      return {
        status: "error",
        message: `Ferramenta desconhecida: ${call.name}.`,
        data: { available: this.registry.list().map((entry) => entry.name) },
      };
    }

    const startTime = Date.now();
    const result = await tool.execute(session, call.args, this.deps);
    this.deps.logger.info("Tool executed", {
      sessionId: session.id,
      tool: call.name,
      status: result.status,
      duration: Date.now() - startTime,
    });
    return result;
  }
}
