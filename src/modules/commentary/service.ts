/**
 * Game commentary.
 *
 * Purpose: turn game events into short persona lines. With an AI provider
 * every event becomes an `EVENT: <name>\nDATA: <json>` request; without one,
 * hint and no-answer quips come from the canned snark lines and the other
 * events stay silent.
 *
 * Invariants:
 * - Quips are at most `MAX_QUIP_LENGTH` characters.
 * - A hint quip never contains the answer.
 * - A failed request yields "" for quips and a fixed line for mention replies.
 */
import { buildPersonaPrompt } from "@/constants/ai";
import type { AIProvider } from "@/services/ai";
import type { GameCommentary, GameMode, ScoreEntry } from "@/modules/games/types";
import { snark, type SnarkRandom } from "./snark";

export type CommentaryEvent = "mention" | "hint_3" | "no_answer" | "mid_round_quip";

export const MAX_QUIP_LENGTH = 200;
export const LEAKED_HINT_QUIP = "Yeah… that was dangerously close.";
export const EMPTY_MENTION_TEXT = "User mentioned you without saying anything. Respond sarcastically.";
export const MENTION_FALLBACK_REPLY = "I'm having a moment. Try again in a sec.";

export interface CommentaryOptions {
  provider: AIProvider | null;
  persona: string;
  random?: SnarkRandom;
}

export const buildEventPayload = (event: CommentaryEvent, data: Record<string, unknown>): string =>
  `EVENT: ${event}\nDATA: ${JSON.stringify(data)}`;

const clamp = (text: string): string => Array.from(text).slice(0, MAX_QUIP_LENGTH).join("");

/** Swaps `@DisplayName` placeholders for real mentions, longest names first. */
export function replaceNameMentions(text: string, players: readonly ScoreEntry[]): string {
  const byLength = [...players].sort((a, b) => b.displayName.length - a.displayName.length);
  let result = text;
  for (const player of byLength) {
    result = result.split(`@${player.displayName}`).join(`<@${player.userId}>`);
  }
  return result;
}

export class CommentaryService implements GameCommentary {
  private readonly provider: AIProvider | null;
  private readonly systemPrompt: string;
  private readonly random: SnarkRandom;

  constructor(options: CommentaryOptions) {
    this.provider = options.provider;
    this.systemPrompt = buildPersonaPrompt(options.persona);
    this.random = options.random ?? Math.random;
  }

  async hintQuip(input: {
    mode: GameMode;
    hint: string;
    answer: string;
    round: number;
    maxRounds: number;
    question?: string;
  }): Promise<string> {
    const quip = this.provider
      ? await this.generate("hint_3", {
          hint: input.hint,
          mode: input.mode,
          answer: input.answer,
          round: input.round,
          max_rounds: input.maxRounds,
          question: input.question ?? null,
        })
      : snark("hint_3", this.random);

    if (!quip) return "";
    if (quip.toLowerCase().includes(input.answer.toLowerCase())) return LEAKED_HINT_QUIP;
    return clamp(quip);
  }

  async noAnswerQuip(input: {
    mode: GameMode;
    answer: string;
    round: number;
    maxRounds: number;
    question?: string;
  }): Promise<string> {
    const quip = this.provider
      ? await this.generate("no_answer", {
          mode: input.mode,
          answer: input.answer,
          round: input.round,
          max_rounds: input.maxRounds,
          question: input.question ?? null,
        })
      : snark("nobody_got_it", this.random);
    return clamp(quip);
  }

  async scoreboardQuip(input: {
    mode: GameMode;
    round: number;
    maxRounds: number;
    players: readonly ScoreEntry[];
  }): Promise<string> {
    if (!this.provider || input.players.length === 0) return "";

    const quip = await this.generate("mid_round_quip", {
      mode: input.mode,
      round: input.round,
      max_rounds: input.maxRounds,
      scores: input.players.map((player) => ({
        display_name: player.displayName,
        score: player.score,
      })),
    });
    if (!quip) return "";
    return clamp(replaceNameMentions(quip, input.players));
  }

  /** Reply to a message that mentions the bot. Never empty. */
  async mentionReply(text: string): Promise<string> {
    if (!this.provider) return MENTION_FALLBACK_REPLY;
    const reply = await this.generate("mention", { text: text.trim() || EMPTY_MENTION_TEXT });
    return reply || MENTION_FALLBACK_REPLY;
  }

  private async generate(event: CommentaryEvent, data: Record<string, unknown>): Promise<string> {
    if (!this.provider) return "";

    const response = await this.provider.generate(
      [{ role: "user", content: buildEventPayload(event, data) }],
      { systemPrompt: this.systemPrompt },
    );
    if (!response.ok) {
      console.warn(`[commentary] ${event} produced no text`, {
        providerId: response.meta.providerId,
        model: response.meta.model,
      });
      return "";
    }
    return response.text;
  }
}
