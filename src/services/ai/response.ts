/**
 * Normalises what every provider returns into an `AIResponse` and logs
 * finish reasons other than a clean stop.
 */
import { FinishReason } from "@google/genai";
import type { AIProviderId } from "./constants";
import type { AIPromptFeedback, AIResponse, AIUsageMetadata } from "./types";

export function buildAIResponse(input: {
  providerId: AIProviderId;
  model: string;
  rawText?: string | null;
  finishReason?: FinishReason;
  usage?: AIUsageMetadata;
  promptFeedback?: AIPromptFeedback;
}): AIResponse {
  const text = (input.rawText ?? "").trim();
  const blocked =
    input.finishReason === FinishReason.SAFETY || Boolean(input.promptFeedback?.blockReason);

  if (input.finishReason && input.finishReason !== FinishReason.STOP) {
    console.warn("[ai-service] Non-stop finish reason", {
      providerId: input.providerId,
      model: input.model,
      finishReason: input.finishReason,
      usage: input.usage,
      promptFeedback: input.promptFeedback,
    });
  }

  return {
    ok: text.length > 0 && !blocked,
    text: blocked ? "" : text,
    meta: {
      providerId: input.providerId,
      model: input.model,
      finishReason: input.finishReason,
      usage: input.usage,
      promptFeedback: input.promptFeedback,
    },
  };
}

/** Response for a request that never produced anything. */
export function failedAIResponse(providerId: AIProviderId, model: string): AIResponse {
  return { ok: false, text: "", meta: { providerId, model } };
}
