/**
 * Game timing and round limits.
 *
 * Purpose: one place for every delay the engine waits on. All values are in
 * milliseconds unless the name says otherwise.
 */
import type { GameMode } from "./types";

export const MIN_ROUNDS = 5;
export const MAX_ROUNDS = 100;

/** Rounds needed before mid-game and end-of-game scoreboard quips are posted. */
export const QUIP_MIN_ROUNDS = 15;

export interface GameTimings {
  /** Delay before each hint, relative to the previous step. */
  hintDelays: readonly number[];
  /** Wait after the last hint before the round times out. */
  finalWait: number;
}

export const GAME_TIMINGS: Record<GameMode, GameTimings> = {
  trivia: {
    hintDelays: [25_000, 20_000, 20_000],
    finalWait: 10_000,
  },
  scramble: {
    hintDelays: [20_000, 20_000],
    finalWait: 20_000,
  },
};

/** Window for simultaneous correct answers before a winner is picked. */
export const RESOLVE_DELAY = 800;
/** Pause between a winner announcement and the next round. */
export const ROUND_TRANSITION_DELAY = 1_000;
/** Extra wait when a winner is being resolved as the round runs out. */
export const RESOLVE_GRACE_DELAY = 900;

/** Wait before retrying a round that failed to load. */
export const ROUND_RETRY_DELAY = 2_000;
/** Questions drawn in a row before giving up on finding one with answers. */
export const MAX_QUESTION_PICKS = 5;

/** Time players are told they have in a scramble round. */
export const SCRAMBLE_ROUND_SECONDS = 60;
