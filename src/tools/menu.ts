import { z } from "genkit";
import { defineOrderTool } from "./defineOrderTool.js";
import { buildCypherPrompt, AI_TEMPERATURES } from "../orderFlow/prompts.js";
import { QueryError, errorMessage } from "../utils/errors.js";

const WRITE_CLAUSE = /\b(CREATE|MERGE|DELETE|DETACH|SET|REMOVE|DROP|LOAD\s+CSV|CALL\s+db\.idx)\b/i;

/**
 * Take the last fenced block if the model wrapped the query, otherwise the whole text
 */
export function extractCypher(text: string): string {
  const blocks = [...text.matchAll(/```(?:cypher)?([\s\S]*?)```/gi)];
  const last = blocks[blocks.length - 1];
  if (last) {
    return (last[1] ?? "").trim();
  }
  return text.trim();
}

export function isReadOnlyCypher(query: string): boolean {
  return !WRITE_CLAUSE.test(query);
}

const menuTool = defineOrderTool(
  {
    name: "menu",
    description:
      "Consult the cardápio for flavors, ingredients, categories and prices. Use it before answering any pastel-related question.",
    inputSchema: z.object({
      question: z.string().min(1).describe("The customer's question about the menu, in their own words"),
    }),
  },
  async (session, { question }, { completion, queryClient, logger, schemaDescription }) => {
    let query = "";

    try {
      const schema = await schemaDescription();
      const startTime = Date.now();
      const suggestion = await completion.generateText(buildCypherPrompt(schema, question), AI_TEMPERATURES.CYPHER_GENERATION);
      query = extractCypher(suggestion);
      logger.aiAction("Cypher Generation", {
        sessionId: session.id,
        prompt: question,
        response: query,
        duration: Date.now() - startTime,
      });

      if (!query) {
        return {
          status: "error",
          message: "Não consegui gerar uma consulta para essa pergunta.",
          data: { query, rows: [], error: true },
        };
      }

      if (!isReadOnlyCypher(query)) {
        logger.warn("Rejected non read-only Cypher", { sessionId: session.id, query });
        return {
          status: "error",
          message: "A consulta gerada não é somente leitura.",
          data: { query, rows: [], error: true },
        };
      }

      const rows = await queryClient.runQuery(query, session.id);
      return {
        status: "ok",
        message: rows.length ? `Encontrei ${rows.length} registro(s).` : "Nenhum registro encontrado.",
        data: { query, rows, error: false },
      };
    } catch (error) {
      if (!(error instanceof QueryError)) {
        throw error;
      }
      logger.warn("Menu lookup failed", { sessionId: session.id, query, error: errorMessage(error) });
      return {
        status: "error",
        message: "Não consegui consultar o cardápio agora.",
        data: { query, rows: [], error: true },
      };
    }
  }
);

export default menuTool;
