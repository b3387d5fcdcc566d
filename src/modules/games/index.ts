/**
 * Games module entrypoint.
 *
 * `getGameEngine()` wires the engine to the PostgreSQL stores and the
 * commentary service once per process.
 */
import { scoreRepo, scrambleWordRepo, triviaQuestionRepo } from "@/db";
import { getCommentary } from "@/modules/commentary";
import { GameEngine } from "./engine";
import { createGameModes } from "./modes";

export * from "./answers";
export * from "./config";
export * from "./engine";
export * from "./hints";
export * from "./messages";
export * from "./modes";
export * from "./registry";
export * from "./state";
export * from "./types";

let engine: GameEngine | null = null;

export function getGameEngine(): GameEngine {
  if (!engine) {
    const commentary = getCommentary();
    engine = new GameEngine({
      modes: createGameModes({
        questions: triviaQuestionRepo,
        words: scrambleWordRepo,
        commentary,
      }),
      scores: scoreRepo,
      commentary,
    });
  }
  return engine;
}
