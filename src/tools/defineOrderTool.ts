import type { z } from "genkit";
import type { Session } from "../types/session.js";
import type { OrderTool, ToolDeps, ToolName, ToolResult } from "../types/agent.js";

/**
 * Build an order tool whose arguments are validated against its schema before it runs
 */
export function defineOrderTool<S extends z.ZodTypeAny>(
  config: { name: ToolName; description: string; inputSchema: S },
  fn: (session: Session, input: z.infer<S>, deps: ToolDeps) => Promise<ToolResult> | ToolResult
): OrderTool {
  return {
    ...config,
    async execute(session, args, deps) {
      const parsed = config.inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`);
        deps.logger.warn("Tool arguments rejected", { tool: config.name, issues });
        return {
          status: "invalid_arguments",
          message: "Argumentos inválidos para a ferramenta.",
          data: { issues },
        };
      }
      return fn(session, parsed.data, deps);
    },
  };
}
