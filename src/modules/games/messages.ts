/**
 * Channel texts posted during a game.
 */
import { SCRAMBLE_ROUND_SECONDS } from "./config";
import type { GameMode, ScoreEntry } from "./types";

const MODE_LABELS: Record<GameMode, string> = {
  trivia: "Trivia",
  scramble: "Scramble",
};

export const gameStartMessage = (mode: GameMode, rounds: number): string =>
  mode === "trivia"
    ? `Starting a trivia game with **${rounds} questions.**\nFastest correct answer wins each round. Try not to embarrass yourselves.`
    : `🔀 Starting a **${rounds}-round scramble game**.\nUnscramble the word. Fastest answer wins.`;

export const triviaPrompt = (round: number, maxRounds: number, question: string): string =>
  `❓ **Question ${round} of ${maxRounds}**\n${question}`;

export const scramblePrompt = (round: number, maxRounds: number, scrambled: string): string =>
  `🔀 **Scramble ${round} of ${maxRounds}**\n\n**${scrambled.toUpperCase()}**\n\n⏱️ You have **${SCRAMBLE_ROUND_SECONDS} seconds**. Go.`;

export const triviaHint = (level: number, hint: string, quip = ""): string => {
  const line = `💡 **Hint ${level}/3:** \`${hint}\``;
  return quip ? `${line}\n> ${quip}` : line;
};

export const noHintAvailable = (level: number): string =>
  `💡 **Hint ${level}/3:** \`No hints for single-character answers.\``;

export const scrambleFirstHint = (word: string): string =>
  `💡 **Hint 1:** Starts with **${word.charAt(0).toUpperCase()}** (${word.length} letters)`;

export const scrambleSecondHint = (pattern: string): string => `💡 **Hint 2:** \`${pattern}\``;

export const triviaTimeout = (answer: string, quip = ""): string => {
  const text = `⏰ Time's up. No one got it.\nThe correct answer was: **${answer}**.`;
  return quip ? `${text}\n> ${quip}` : text;
};

export const scrambleTimeout = (word: string): string =>
  `⏰ Time’s up! The correct word was **${word.toUpperCase()}**.`;

export const winnerMessage = (userId: string, answer: string): string =>
  `✅ <@${userId}> got it right. Correct answer: **${answer}**.`;

export const OUT_OF_CONTENT: Record<GameMode, string> = {
  trivia: "I ran out of questions. Blame whoever configured me.",
  scramble: "I ran out of scramble words. This is awkward.",
};

export const ROUND_LOAD_FAILED_MESSAGE = "⚠️ I couldn't load the next round, so this game ends here.";

const SCOREBOARD_TITLE: Record<GameMode, string> = {
  trivia: "🎮 **Game over.** Here’s the damage:",
  scramble: "🔀 **Scramble over.** Final scores:",
};

const EMPTY_SCOREBOARD: Record<GameMode, string> = {
  trivia: "🎮 **Game over.** Nobody scored anything. Impressive, in a tragic way.",
  scramble: "🔀 **Scramble over.** Nobody solved anything. Incredible.",
};

export const scoreLine = (position: number, entry: ScoreEntry): string =>
  `**${position}. ${entry.displayName}** — ${entry.score} point(s)`;

export function scoreboardMessage(mode: GameMode, ranking: readonly ScoreEntry[]): string {
  if (ranking.length === 0) return EMPTY_SCOREBOARD[mode];
  const lines = ranking.map((entry, index) => scoreLine(index + 1, entry));
  return [SCOREBOARD_TITLE[mode], ...lines].join("\n");
}

export const ROUNDS_OUT_OF_RANGE_MESSAGE = "Pick a number between **5 and 100** rounds.";
export const GAME_ALREADY_RUNNING_MESSAGE = "There’s already a game running in this channel.";

export const noGameRunningMessage = (mode: GameMode): string =>
  `There’s no ${mode} game running here.`;

export const gameStoppedMessage = (mode: GameMode): string =>
  `⛔ **${MODE_LABELS[mode]} game stopped.**`;
