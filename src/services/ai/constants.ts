/**
 * Shared constants for the AI providers: supported ids, default models and
 * sampling defaults. No I/O here.
 */
export const PROVIDER_IDS = ["openai", "gemini"] as const;
export type AIProviderId = (typeof PROVIDER_IDS)[number];

export const DEFAULT_PROVIDER_ID: AIProviderId = "openai";
export const DEFAULT_OPENAI_MODEL = "gpt-4.1-mini";
export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

// Commentary lines are one or two sentences.
export const DEFAULT_MAX_OUTPUT_TOKENS = 256;
export const DEFAULT_TEMPERATURE = 0.9;
export const DEFAULT_TOP_P = 0.95;
export const DEFAULT_TOP_K = 40;

export const AI_REQUEST_TIMEOUT_MS = 10_000;
