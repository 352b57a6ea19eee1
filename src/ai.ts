import { googleAI } from "@genkit-ai/google-genai";
import { genkit } from "genkit";
import type { AppConfig } from "./config/env.js";

/**
 * Create the Genkit instance backing the completion client
 */
export function createAi(config: Pick<AppConfig, "geminiApiKey" | "aiModel" | "aiTemperature">) {
  return genkit({
    plugins: [googleAI({ apiKey: config.geminiApiKey })],
    model: googleAI.model(config.aiModel, {
      temperature: config.aiTemperature,
    }),
  });
}

export type Ai = ReturnType<typeof createAi>;
