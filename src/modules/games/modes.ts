/**
 * Per-mode round behaviour.
 *
 * Purpose: everything that differs between trivia and scramble (where a
 * round's content comes from, how it is shown, hinted, checked and closed)
 * behind one `GameModeDefinition`, so the engine stays mode-agnostic.
 */
import type { ScrambleWordRepo, TriviaQuestionRepo } from "@/db";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { isCorrectAnswer, isScrambleMatch } from "./answers";
import { MAX_QUESTION_PICKS } from "./config";
import {
  buildScrambleHint,
  buildTriviaHint,
  hasSingleCharacterAnswer,
  scrambleWord,
  type RandomSource,
} from "./hints";
import {
  noHintAvailable,
  scrambleFirstHint,
  scramblePrompt,
  scrambleSecondHint,
  scrambleTimeout,
  triviaHint,
  triviaPrompt,
  triviaTimeout,
} from "./messages";
import type { GameState } from "./state";
import type { GameCommentary, GameMode, RoundChallenge } from "./types";

export interface GameModeDefinition {
  readonly mode: GameMode;
  /** `Ok(null)` when there is nothing left to ask. */
  nextChallenge(state: GameState): Promise<Result<RoundChallenge | null, Error>>;
  prompt(state: GameState, challenge: RoundChallenge): string;
  isCorrect(content: string, challenge: RoundChallenge): boolean;
  /** Text for hint `level` (1-based). */
  hint(state: GameState, challenge: RoundChallenge, level: number): Promise<string>;
  timeoutMessage(state: GameState, challenge: RoundChallenge): Promise<string>;
  /** Releases whatever the mode stored for this game. */
  closeSession(state: GameState): Promise<void>;
}

export type GameModes = Record<GameMode, GameModeDefinition>;

export interface GameModeSources {
  questions: Pick<TriviaQuestionRepo, "pickQuestion" | "closeSession">;
  words: Pick<ScrambleWordRepo, "pickWord">;
  commentary: GameCommentary;
  random?: RandomSource;
}

export function createTriviaMode(
  sources: Pick<GameModeSources, "questions" | "commentary">,
): GameModeDefinition {
  const { questions, commentary } = sources;

  return {
    mode: "trivia",

    async nextChallenge(state) {
      // A picked question joins the session, so a skipped one is not drawn again.
      for (let pick = 0; pick < MAX_QUESTION_PICKS; pick++) {
        const picked = await questions.pickQuestion(state.guildId, state.sessionId);
        if (picked.isErr()) return ErrResult(picked.error);

        const question = picked.value;
        if (!question) return OkResult(null);

        const answers = question.answers.filter((answer) => answer.trim().length > 0);
        const [primaryAnswer] = answers;
        if (primaryAnswer === undefined) {
          console.warn(`[games] Skipping question ${question.id}: it has no answers`);
          continue;
        }

        return OkResult({
          id: question.id,
          prompt: question.question,
          question: question.question,
          answers,
          primaryAnswer,
        });
      }

      return ErrResult(new Error(`No answerable question in ${MAX_QUESTION_PICKS} picks`));
    },

    prompt(state, challenge) {
      return triviaPrompt(state.round, state.maxRounds, challenge.prompt);
    },

    isCorrect(content, challenge) {
      return isCorrectAnswer(content, challenge.answers);
    },

    async hint(state, challenge, level) {
      if (hasSingleCharacterAnswer(challenge.answers)) return noHintAvailable(level);

      const hint = buildTriviaHint(challenge.primaryAnswer, level);
      if (level < 3) return triviaHint(level, hint);

      const quip = await commentary.hintQuip({
        mode: "trivia",
        hint,
        answer: challenge.primaryAnswer,
        round: state.round,
        maxRounds: state.maxRounds,
        question: challenge.question,
      });
      return triviaHint(level, hint, quip);
    },

    async timeoutMessage(state, challenge) {
      const quip = await commentary.noAnswerQuip({
        mode: "trivia",
        answer: challenge.primaryAnswer,
        round: state.round,
        maxRounds: state.maxRounds,
        question: challenge.question,
      });
      return triviaTimeout(challenge.primaryAnswer, quip);
    },

    async closeSession(state) {
      const closed = await questions.closeSession(state.guildId, state.sessionId);
      if (closed.isErr()) {
        console.error(`[games] Could not close trivia session ${state.sessionId}`, closed.error);
      }
    },
  };
}

export function createScrambleMode(
  sources: Pick<GameModeSources, "words" | "random">,
): GameModeDefinition {
  const { words, random = Math.random } = sources;

  return {
    mode: "scramble",

    async nextChallenge(state) {
      const picked = await words.pickWord(state.guildId);
      if (picked.isErr()) return ErrResult(picked.error);

      const entry = picked.value;
      if (!entry) return OkResult(null);

      return OkResult({
        id: entry.id,
        prompt: scrambleWord(entry.word, random),
        answers: [entry.word],
        primaryAnswer: entry.word,
      });
    },

    prompt(state, challenge) {
      return scramblePrompt(state.round, state.maxRounds, challenge.prompt);
    },

    isCorrect(content, challenge) {
      return isScrambleMatch(content, challenge.primaryAnswer);
    },

    async hint(_state, challenge, level) {
      const word = challenge.primaryAnswer;
      return level <= 1 ? scrambleFirstHint(word) : scrambleSecondHint(buildScrambleHint(word));
    },

    async timeoutMessage(_state, challenge) {
      return scrambleTimeout(challenge.primaryAnswer);
    },

    async closeSession() {
      // Word repeats are limited by the store's cooldown; nothing is kept per game.
    },
  };
}

export function createGameModes(sources: GameModeSources): GameModes {
  return {
    trivia: createTriviaMode(sources),
    scramble: createScrambleMode(sources),
  };
}
