import { randomUUID } from "node:crypto";
import type { CorrectCandidate, GameMode, RoundChallenge, RoundOutcome, ScoreEntry } from "./types";

/**
 * Mutable state of one running game in one channel.
 *
 * The engine owns every write; listeners and commands only read it through
 * the registry.
 */
export class GameState {
  readonly sessionId: string = randomUUID();
  round = 0;
  current: RoundChallenge | null = null;
  outcome: RoundOutcome | null = null;
  inProgress = true;
  /** Set once the scoreboard (or the out-of-content notice) has been posted. */
  finished = false;
  resolving = false;
  midgameQuipDone = false;
  candidates: CorrectCandidate[] = [];

  readonly scores = new Map<string, number>();
  readonly names = new Map<string, string>();

  constructor(
    readonly mode: GameMode,
    readonly channelId: string,
    readonly guildId: string,
    readonly maxRounds: number,
  ) {}

  /** True while a round is open and nobody has won or timed it out. */
  get roundOpen(): boolean {
    return this.inProgress && this.current !== null && this.outcome === null;
  }

  resetRound(challenge: RoundChallenge | null): void {
    this.current = challenge;
    this.outcome = null;
    this.resolving = false;
    this.candidates = [];
  }

  addPoint(userId: string, displayName: string): number {
    const next = (this.scores.get(userId) ?? 0) + 1;
    this.scores.set(userId, next);
    this.names.set(userId, displayName);
    return next;
  }

  /** Players by score, highest first; ties keep the order they first scored in. */
  ranking(): ScoreEntry[] {
    return [...this.scores.entries()]
      .map(([userId, score]) => ({
        userId,
        score,
        displayName: this.names.get(userId) ?? userId,
      }))
      .sort((a, b) => b.score - a.score);
  }
}
