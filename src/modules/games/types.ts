/**
 * Multi-round game types.
 *
 * Purpose: shared contracts between the engine, the mode definitions and the
 * Discord adapters.
 */
import type { Result } from "@/utils/result";

export type GameMode = "trivia" | "scramble";

/** One round's challenge as the engine sees it. */
export interface RoundChallenge {
  readonly id: number;
  /** Text shown to players (question or scrambled word). */
  readonly prompt: string;
  /** Accepted answers; the first one is revealed when the round closes. */
  readonly answers: readonly string[];
  readonly primaryAnswer: string;
  /** Original question text, passed to commentary. */
  readonly question?: string;
}

export interface CorrectCandidate {
  readonly userId: string;
  readonly displayName: string;
  readonly messageId: string;
}

export type RoundOutcome =
  | { readonly kind: "winner"; readonly userId: string }
  | { readonly kind: "timeout" };

/** Where a game posts its messages. Implemented over Seyfert in `adapters/`. */
export interface GameChannel {
  readonly id: string;
  readonly guildId: string;
  send(content: string): Promise<void>;
}

export interface PlayerAnswer {
  readonly userId: string;
  readonly displayName: string;
  readonly messageId: string;
  readonly content: string;
}

export interface ScoreEntry {
  readonly userId: string;
  readonly displayName: string;
  readonly score: number;
}

/** Persists leaderboard points. */
export interface ScoreRecorder {
  awardPoints(input: {
    guildId: string;
    userId: string;
    displayName: string;
    points: number;
    mode: GameMode;
  }): Promise<Result<void, Error>>;
}

/** Optional flavour text; every method resolves to "" when there is nothing to say. */
export interface GameCommentary {
  hintQuip(input: {
    mode: GameMode;
    hint: string;
    answer: string;
    round: number;
    maxRounds: number;
    question?: string;
  }): Promise<string>;
  noAnswerQuip(input: {
    mode: GameMode;
    answer: string;
    round: number;
    maxRounds: number;
    question?: string;
  }): Promise<string>;
  scoreboardQuip(input: {
    mode: GameMode;
    round: number;
    maxRounds: number;
    players: readonly ScoreEntry[];
  }): Promise<string>;
}

export type GameStartErrorCode = "ROUNDS_OUT_OF_RANGE" | "GAME_ALREADY_RUNNING";
export type GameStopErrorCode = "NO_GAME_RUNNING";

export class GameError<Code extends string> extends Error {
  constructor(
    readonly code: Code,
    message: string,
  ) {
    super(message);
    this.name = "GameError";
  }
}
