/**
 * Gemini (Google GenAI) adapter behind the common `AIProvider` interface.
 */
import {
  type Content,
  type GenerateContentParameters,
  type GenerateContentResponse,
  GoogleGenAI,
} from "@google/genai";
import { SAFETY_SETTINGS } from "@/constants/ai";
import {
  AI_REQUEST_TIMEOUT_MS,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TOP_K,
  DEFAULT_TOP_P,
} from "./constants";
import { buildAIResponse, failedAIResponse } from "./response";
import type { AIMessage, AIProvider, AIRequestOptions, AIResponse } from "./types";

export interface GeminiProviderConfig {
  apiKey: string;
  model?: string;
}

function buildGeminiParams(
  messages: AIMessage[],
  model: string,
  options?: AIRequestOptions,
): GenerateContentParameters {
  const contents: Content[] = messages.map((msg) => ({
    role: msg.role === "assistant" ? "model" : "user",
    parts: [{ text: msg.content }],
  }));

  return {
    model,
    contents,
    config: {
      systemInstruction: options?.systemPrompt,
      safetySettings: SAFETY_SETTINGS,
      candidateCount: 1,
      maxOutputTokens: options?.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      topK: options?.topK ?? DEFAULT_TOP_K,
      topP: options?.topP ?? DEFAULT_TOP_P,
    },
  };
}

function parseGeminiResponse(response: GenerateContentResponse, model: string): AIResponse {
  const candidate = response.candidates?.[0];
  let text = "";
  for (const part of candidate?.content?.parts ?? []) {
    if (typeof part.text === "string") text += part.text;
  }

  return buildAIResponse({
    providerId: "gemini",
    model,
    rawText: text,
    finishReason: candidate?.finishReason,
    usage: response.usageMetadata,
    promptFeedback: response.promptFeedback,
  });
}

export function createGeminiProvider(config: GeminiProviderConfig): AIProvider {
  const genAI = new GoogleGenAI({
    apiKey: config.apiKey,
    httpOptions: { timeout: AI_REQUEST_TIMEOUT_MS },
  });
  const defaultModel = config.model ?? DEFAULT_GEMINI_MODEL;

  const generate = async (
    messages: AIMessage[],
    options?: AIRequestOptions,
  ): Promise<AIResponse> => {
    const model = options?.model ?? defaultModel;
    try {
      const response = await genAI.models.generateContent(
        buildGeminiParams(messages, model, options),
      );
      return parseGeminiResponse(response, model);
    } catch (error) {
      console.error("[ai-service] Gemini request failed", error);
      return failedAIResponse("gemini", model);
    }
  };

  return { id: "gemini", label: "Gemini", defaultModel, generate };
}
