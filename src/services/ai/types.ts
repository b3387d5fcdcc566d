/**
 * Provider-neutral contracts for text generation, so callers can switch
 * between OpenAI and Gemini without touching their own code.
 */
import type { FinishReason, GenerateContentResponse } from "@google/genai";
import type { AIProviderId } from "./constants";

export type AIMessageRole = "user" | "assistant";

export interface AIMessage {
  role: AIMessageRole;
  content: string;
}

export type OpenAIUsageMetadata = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
};

export type AIUsageMetadata = GenerateContentResponse["usageMetadata"] | OpenAIUsageMetadata;
export type AIPromptFeedback = GenerateContentResponse["promptFeedback"];

export interface AIResponseMeta {
  providerId: AIProviderId;
  model: string;
  finishReason?: FinishReason;
  usage?: AIUsageMetadata;
  promptFeedback?: AIPromptFeedback;
}

export interface AIResponse {
  /** False when the request failed, was blocked or produced no text. */
  ok: boolean;
  text: string;
  meta: AIResponseMeta;
}

export interface AIRequestOptions {
  model?: string;
  systemPrompt?: string;
  maxOutputTokens?: number;
  temperature?: number;
  topP?: number;
  topK?: number;
}

export interface AIProvider {
  id: AIProviderId;
  label: string;
  defaultModel: string;
  generate(messages: AIMessage[], options?: AIRequestOptions): Promise<AIResponse>;
}
