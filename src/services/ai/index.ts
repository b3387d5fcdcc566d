/**
 * AI provider selection.
 *
 * `resolveProvider` builds the provider named by `AI_PROVIDER` from the
 * environment. A provider without its API key is never constructed: callers
 * receive `null` and fall back to canned text.
 */
import type { BotEnv } from "@/configuration";
import { createGeminiProvider } from "./gemini";
import { createOpenAIProvider } from "./openai";
import type { AIProvider } from "./types";

export * from "./constants";
export * from "./response";
export * from "./types";
export { createGeminiProvider, createOpenAIProvider };

type ProviderEnv = Pick<
  BotEnv,
  "AI_PROVIDER" | "OPENAI_API_KEY" | "OPENAI_MODEL" | "GEMINI_API_KEY" | "GEMINI_MODEL"
>;

export function resolveProvider(env: ProviderEnv): AIProvider | null {
  if (env.AI_PROVIDER === "gemini") {
    if (!env.GEMINI_API_KEY) {
      console.warn("[ai-service] GEMINI_API_KEY not set - commentary uses canned lines");
      return null;
    }
    return createGeminiProvider({ apiKey: env.GEMINI_API_KEY, model: env.GEMINI_MODEL });
  }

  if (!env.OPENAI_API_KEY) {
    console.warn("[ai-service] OPENAI_API_KEY not set - commentary uses canned lines");
    return null;
  }
  return createOpenAIProvider({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL });
}
