/**
 * OpenAI adapter behind the common `AIProvider` interface, using the official
 * `openai` SDK for typed requests and client-side timeouts.
 */
import { FinishReason } from "@google/genai";
import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import {
  AI_REQUEST_TIMEOUT_MS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TOP_P,
} from "./constants";
import { buildAIResponse, failedAIResponse } from "./response";
import type { AIMessage, AIProvider, AIRequestOptions, AIResponse } from "./types";

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
}

function mapOpenAIFinishReason(value?: string | null): FinishReason | undefined {
  switch (value) {
    case "stop":
      return FinishReason.STOP;
    case "length":
      return FinishReason.MAX_TOKENS;
    case "content_filter":
      return FinishReason.SAFETY;
    default:
      return value ? FinishReason.OTHER : undefined;
  }
}

function toOpenAIMessage(msg: AIMessage): ChatCompletionMessageParam {
  return msg.role === "assistant"
    ? { role: "assistant", content: msg.content }
    : { role: "user", content: msg.content };
}

export function createOpenAIProvider(config: OpenAIProviderConfig): AIProvider {
  const client = new OpenAI({
    apiKey: config.apiKey,
    timeout: AI_REQUEST_TIMEOUT_MS,
    maxRetries: 0,
  });
  const defaultModel = config.model ?? DEFAULT_OPENAI_MODEL;

  const generate = async (
    messages: AIMessage[],
    options?: AIRequestOptions,
  ): Promise<AIResponse> => {
    const model = options?.model ?? defaultModel;

    const openaiMessages: ChatCompletionMessageParam[] = messages.map(toOpenAIMessage);
    if (options?.systemPrompt) {
      openaiMessages.unshift({ role: "system", content: options.systemPrompt });
    }

    const payload: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: openaiMessages,
      max_tokens: options?.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
      temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
      top_p: options?.topP ?? DEFAULT_TOP_P,
    };

    try {
      const completion = await client.chat.completions.create(payload);
      const choice = completion.choices[0];

      return buildAIResponse({
        providerId: "openai",
        model,
        rawText: choice?.message.content,
        finishReason: mapOpenAIFinishReason(choice?.finish_reason),
        usage: completion.usage,
      });
    } catch (error) {
      console.error("[ai-service] OpenAI request failed", error);
      return failedAIResponse("openai", model);
    }
  };

  return { id: "openai", label: "OpenAI", defaultModel, generate };
}
