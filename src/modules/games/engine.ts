/**
 * Multi-round game engine.
 *
 * Purpose: drive trivia and scramble games in a channel: ask rounds, run the
 * hint/timeout timer, pick winners and post the final scoreboard.
 *
 * Concurrency model:
 * - Every round runs one background timer (hints, then timeout).
 * - The first correct answer of a round schedules one resolution; answers that
 *   arrive during `RESOLVE_DELAY` still compete and the earliest message wins.
 * - Whichever of the two settles the round first sets `state.outcome`; the other
 *   sees it and bails, so a round advances exactly once.
 * - Background work never rejects unobserved: it is started through
 *   `background()`, which logs failures.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { compareSnowflakes } from "@/utils/snowflake";
import {
  GAME_TIMINGS,
  MAX_ROUNDS,
  MIN_ROUNDS,
  QUIP_MIN_ROUNDS,
  RESOLVE_DELAY,
  RESOLVE_GRACE_DELAY,
  ROUND_RETRY_DELAY,
  ROUND_TRANSITION_DELAY,
} from "./config";
import {
  GAME_ALREADY_RUNNING_MESSAGE,
  OUT_OF_CONTENT,
  ROUND_LOAD_FAILED_MESSAGE,
  ROUNDS_OUT_OF_RANGE_MESSAGE,
  noGameRunningMessage,
  scoreboardMessage,
  winnerMessage,
} from "./messages";
import type { GameModes } from "./modes";
import { GameRegistry } from "./registry";
import { GameState } from "./state";
import {
  GameError,
  type GameChannel,
  type GameCommentary,
  type GameMode,
  type GameStartErrorCode,
  type GameStopErrorCode,
  type PlayerAnswer,
  type ScoreRecorder,
} from "./types";

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface GameEngineOptions {
  modes: GameModes;
  scores: ScoreRecorder;
  commentary: GameCommentary;
  registry?: GameRegistry;
  sleep?: Sleep;
}

export interface StartGameInput {
  channel: GameChannel;
  mode: GameMode;
  rounds: number;
}

export class GameEngine {
  readonly registry: GameRegistry;
  private readonly modes: GameModes;
  private readonly scores: ScoreRecorder;
  private readonly commentary: GameCommentary;
  private readonly sleep: Sleep;

  constructor(options: GameEngineOptions) {
    this.modes = options.modes;
    this.scores = options.scores;
    this.commentary = options.commentary;
    this.registry = options.registry ?? new GameRegistry();
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Claims the channel for a new game. The caller announces the game and then
   * calls `run` to ask the first round.
   */
  start(input: StartGameInput): Result<GameState, GameError<GameStartErrorCode>> {
    const { channel, mode, rounds } = input;

    if (!Number.isInteger(rounds) || rounds < MIN_ROUNDS || rounds > MAX_ROUNDS) {
      return ErrResult(new GameError("ROUNDS_OUT_OF_RANGE", ROUNDS_OUT_OF_RANGE_MESSAGE));
    }

    const state = new GameState(mode, channel.id, channel.guildId, rounds);
    if (!this.registry.claim(channel.id, state)) {
      return ErrResult(new GameError("GAME_ALREADY_RUNNING", GAME_ALREADY_RUNNING_MESSAGE));
    }

    console.log(
      `[games] ${mode} game started in channel ${channel.id} (${rounds} rounds, session ${state.sessionId})`,
    );
    return OkResult(state);
  }

  async run(channel: GameChannel, state: GameState): Promise<void> {
    await this.askNextRound(channel, state);
  }

  /**
   * Offers a chat message as an answer to the channel's open round.
   * @returns whether the message was a correct answer.
   */
  submitAnswer(channel: GameChannel, answer: PlayerAnswer): boolean {
    const state = this.registry.activeRound(channel.id);
    const challenge = state?.current;
    if (!state || !challenge || state.outcome) return false;

    if (!this.modes[state.mode].isCorrect(answer.content, challenge)) return false;

    state.candidates.push({
      userId: answer.userId,
      displayName: answer.displayName,
      messageId: answer.messageId,
    });

    if (!state.resolving) {
      state.resolving = true;
      this.background(this.resolveRound(channel, state, state.round), "round resolution");
    }
    return true;
  }

  /**
   * Stops the channel's game of the given mode. Timers see the stopped state
   * and bail; the caller posts the stop notice and then calls `finish`.
   */
  stop(channelId: string, mode: GameMode): Result<GameState, GameError<GameStopErrorCode>> {
    const state = this.registry.get(channelId);
    if (!state || !state.inProgress || state.mode !== mode) {
      return ErrResult(new GameError("NO_GAME_RUNNING", noGameRunningMessage(mode)));
    }

    state.inProgress = false;
    console.log(`[games] ${mode} game stopped in channel ${channelId} at round ${state.round}`);
    return OkResult(state);
  }

  /** Drops a game that never asked a round, without posting anything. */
  cancel(state: GameState): void {
    state.inProgress = false;
    state.finished = true;
    state.resetRound(null);
    this.registry.release(state.channelId, state);
    console.log(`[games] ${state.mode} game in channel ${state.channelId} cancelled before its first round`);
  }

  /** Ends the game: frees the channel, closes the session and posts the scoreboard. */
  async finish(channel: GameChannel, state: GameState): Promise<void> {
    if (state.finished) return;
    state.finished = true;
    state.inProgress = false;
    state.resetRound(null);
    this.registry.release(state.channelId, state);

    await this.modes[state.mode].closeSession(state);

    const ranking = state.ranking();
    await channel.send(scoreboardMessage(state.mode, ranking));

    if (state.maxRounds >= QUIP_MIN_ROUNDS && ranking.length > 0) {
      await this.postScoreboardQuip(channel, state);
    }
  }

  private async askNextRound(channel: GameChannel, state: GameState): Promise<void> {
    if (!state.inProgress) return;

    const mode = this.modes[state.mode];
    let next = await mode.nextChallenge(state);
    if (next.isErr() && state.inProgress) {
      console.error(`[games] Could not load the next ${state.mode} round, retrying`, next.error);
      await this.sleep(ROUND_RETRY_DELAY);
      if (!state.inProgress) return;
      next = await mode.nextChallenge(state);
    }
    if (!state.inProgress) return;

    if (next.isErr()) {
      console.error(`[games] Giving up on the ${state.mode} game in channel ${state.channelId}`, next.error);
      await channel.send(ROUND_LOAD_FAILED_MESSAGE);
      await this.finish(channel, state);
      return;
    }

    const challenge = next.value;
    if (!challenge) {
      state.inProgress = false;
      state.finished = true;
      state.resetRound(null);
      this.registry.release(state.channelId, state);
      await mode.closeSession(state);
      await channel.send(OUT_OF_CONTENT[state.mode]);
      return;
    }

    state.round += 1;
    state.resetRound(challenge);
    await channel.send(mode.prompt(state, challenge));

    this.background(this.runRoundTimer(channel, state, state.round), "round timer");
  }

  private isRoundLive(state: GameState, round: number): boolean {
    return state.inProgress && state.round === round && state.current !== null && !state.outcome;
  }

  private async runRoundTimer(channel: GameChannel, state: GameState, round: number): Promise<void> {
    const challenge = state.current;
    if (!challenge) return;

    const mode = this.modes[state.mode];
    const { hintDelays, finalWait } = GAME_TIMINGS[state.mode];

    for (const [index, delay] of hintDelays.entries()) {
      await this.sleep(delay);
      if (!this.isRoundLive(state, round)) return;

      const hint = await mode.hint(state, challenge, index + 1);
      if (!this.isRoundLive(state, round)) return;
      await channel.send(hint);
    }

    await this.sleep(finalWait);
    if (state.resolving) {
      await this.sleep(RESOLVE_GRACE_DELAY);
    }
    if (!this.isRoundLive(state, round)) return;

    state.outcome = { kind: "timeout" };
    state.candidates = [];

    await channel.send(await mode.timeoutMessage(state, challenge));
    await this.advance(channel, state);
  }

  private async resolveRound(channel: GameChannel, state: GameState, round: number): Promise<void> {
    await this.sleep(RESOLVE_DELAY);

    const challenge = state.current;
    if (!challenge || !this.isRoundLive(state, round)) {
      if (state.round === round) state.resolving = false;
      return;
    }

    const [winner] = [...state.candidates].sort((a, b) =>
      compareSnowflakes(a.messageId, b.messageId),
    );
    if (!winner) {
      state.resolving = false;
      return;
    }

    state.outcome = { kind: "winner", userId: winner.userId };
    state.addPoint(winner.userId, winner.displayName);

    const persisted = await this.scores.awardPoints({
      guildId: state.guildId,
      userId: winner.userId,
      displayName: winner.displayName,
      points: 1,
      mode: state.mode,
    });
    if (persisted.isErr()) {
      console.error(`[games] Could not save the point for ${winner.userId}`, persisted.error);
    }

    await channel.send(winnerMessage(winner.userId, challenge.primaryAnswer));

    if (
      state.maxRounds >= QUIP_MIN_ROUNDS &&
      state.round === Math.floor(state.maxRounds / 2) &&
      !state.midgameQuipDone
    ) {
      state.midgameQuipDone = true;
      this.background(this.postScoreboardQuip(channel, state), "mid-game quip");
    }

    state.candidates = [];
    state.resolving = false;

    await this.sleep(ROUND_TRANSITION_DELAY);
    await this.advance(channel, state);
  }

  private async advance(channel: GameChannel, state: GameState): Promise<void> {
    if (!state.inProgress) return;
    if (state.round >= state.maxRounds) {
      await this.finish(channel, state);
    } else {
      await this.askNextRound(channel, state);
    }
  }

  private async postScoreboardQuip(channel: GameChannel, state: GameState): Promise<void> {
    const players = state.ranking();
    if (players.length === 0) return;

    const quip = await this.commentary.scoreboardQuip({
      mode: state.mode,
      round: state.round,
      maxRounds: state.maxRounds,
      players,
    });
    if (quip) await channel.send(quip);
  }

  private background(task: Promise<void>, label: string): void {
    task.catch((error) => {
      console.error(`[games] ${label} failed:`, error);
    });
  }
}
