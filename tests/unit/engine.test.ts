/**
 * Unit Tests: GameEngine
 *
 * Purpose: round flow against in-memory stores and a recording channel:
 * refusals, winners, hints and timeouts, stopping, and running out of content.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ScrambleWord, TriviaQuestion } from "@/db";
import { GameEngine } from "@/modules/games/engine";
import { createGameModes } from "@/modules/games/modes";
import type { GameState } from "@/modules/games/state";
import type { GameChannel, GameCommentary, GameMode, ScoreRecorder } from "@/modules/games/types";
import { parseAnswers } from "@/db/normalizers";
import { ErrResult, OkResult, type Result } from "@/utils/result";

class RecordingChannel implements GameChannel {
	readonly id = "channel-1";
	readonly guildId = "guild-1";
	readonly sent: string[] = [];

	async send(content: string): Promise<void> {
		this.sent.push(content);
	}
}

interface HarnessOptions {
	repeatQuestion?: TriviaQuestion;
	awardFails?: boolean;
	/** Number of leading `pickQuestion` calls that fail. */
	pickFailures?: number;
}

function createHarness(options: HarnessOptions = {}) {
	const questions: TriviaQuestion[] = [];
	const words: ScrambleWord[] = [];
	let pickFailures = options.pickFailures ?? 0;

	const pickQuestion = vi.fn(async (): Promise<Result<TriviaQuestion | null, Error>> => {
		if (pickFailures > 0) {
			pickFailures -= 1;
			return ErrResult(new Error("connection reset"));
		}
		return OkResult(options.repeatQuestion ?? questions.shift() ?? null);
	});
	const closeSession = vi.fn(async (): Promise<Result<void, Error>> => OkResult(undefined));
	const pickWord = vi.fn(
		async (): Promise<Result<ScrambleWord | null, Error>> => OkResult(words.shift() ?? null),
	);
	const awardPoints = vi.fn(
		async (): Promise<Result<void, Error>> =>
			options.awardFails ? ErrResult(new Error("db down")) : OkResult(undefined),
	);

	const commentary = {
		hintQuip: vi.fn(async () => ""),
		noAnswerQuip: vi.fn(async () => ""),
		scoreboardQuip: vi.fn(async () => "@Alice is carrying this server."),
	};
	const gameCommentary: GameCommentary = commentary;
	const scores: ScoreRecorder = { awardPoints };

	const engine = new GameEngine({
		modes: createGameModes({
			questions: { pickQuestion, closeSession },
			words: { pickWord },
			commentary: gameCommentary,
			random: () => 0,
		}),
		scores,
		commentary: gameCommentary,
	});

	return {
		engine,
		channel: new RecordingChannel(),
		questions,
		words,
		pickQuestion,
		closeSession,
		awardPoints,
		commentary,
	};
}

type Harness = ReturnType<typeof createHarness>;

function startGame(harness: Harness, mode: GameMode, rounds: number): GameState {
	const started = harness.engine.start({ channel: harness.channel, mode, rounds });
	if (started.isErr()) throw started.error;
	return started.value;
}

const answer = (userId: string, displayName: string, messageId: string, content: string) => ({
	userId,
	displayName,
	messageId,
	content,
});

describe("GameEngine", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	describe("start", () => {
		it("refuses round counts outside 5..100", () => {
			const { engine, channel } = createHarness();

			for (const rounds of [4, 101, 7.5]) {
				const result = engine.start({ channel, mode: "trivia", rounds });
				expect(result.isErr() && result.error.code).toBe("ROUNDS_OUT_OF_RANGE");
			}
			expect(engine.registry.get(channel.id)).toBeUndefined();
		});

		it("refuses a second game in the same channel", () => {
			const harness = createHarness();
			startGame(harness, "trivia", 5);

			const second = harness.engine.start({ channel: harness.channel, mode: "scramble", rounds: 5 });
			expect(second.isErr() && second.error.code).toBe("GAME_ALREADY_RUNNING");
		});
	});

	describe("trivia rounds", () => {
		it("awards the first correct answer and moves on", async () => {
			const harness = createHarness();
			harness.questions.push({ id: 1, question: "What is the capital of France?", answers: ["Paris"] });
			const state = startGame(harness, "trivia", 5);

			await harness.engine.run(harness.channel, state);
			expect(harness.channel.sent).toEqual(["❓ **Question 1 of 5**\nWhat is the capital of France?"]);

			expect(harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "200", "paris"))).toBe(true);
			await vi.advanceTimersByTimeAsync(800);

			expect(harness.channel.sent[1]).toBe("✅ <@u1> got it right. Correct answer: **Paris**.");
			expect(state.scores.get("u1")).toBe(1);
			expect(harness.awardPoints).toHaveBeenCalledWith({
				guildId: "guild-1",
				userId: "u1",
				displayName: "Alice",
				points: 1,
				mode: "trivia",
			});

			// No second question is stored, so the next round runs out of content.
			await vi.advanceTimersByTimeAsync(1_000);
			expect(harness.channel.sent[2]).toBe("I ran out of questions. Blame whoever configured me.");
			expect(harness.channel.sent).toHaveLength(3);
			expect(harness.closeSession).toHaveBeenCalledWith("guild-1", state.sessionId);
			expect(harness.engine.registry.get("channel-1")).toBeUndefined();
		});

		it("ignores wrong answers and answers after the round is won", async () => {
			const harness = createHarness();
			harness.questions.push({ id: 1, question: "2 + 2?", answers: ["four", "4"] });
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			expect(harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "100", "five"))).toBe(false);
			expect(harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "101", "4"))).toBe(true);
			await vi.advanceTimersByTimeAsync(800);

			expect(harness.engine.submitAnswer(harness.channel, answer("u2", "Bob", "102", "four"))).toBe(false);
			expect(harness.awardPoints).toHaveBeenCalledTimes(1);
		});

		it("gives the round to the earliest message among simultaneous answers", async () => {
			const harness = createHarness();
			harness.questions.push({ id: 1, question: "Largest planet?", answers: ["Jupiter"] });
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			harness.engine.submitAnswer(harness.channel, answer("u2", "Bob", "300", "jupiter"));
			harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "299", "Jupiter!"));
			await vi.advanceTimersByTimeAsync(800);

			expect(harness.channel.sent[1]).toBe("✅ <@u1> got it right. Correct answer: **Jupiter**.");
			expect([...state.scores.keys()]).toEqual(["u1"]);
		});

		it("posts three hints, then the answer when nobody gets it", async () => {
			const harness = createHarness();
			harness.questions.push({ id: 7, question: "Highest mountain on Earth?", answers: ["Mount Everest"] });
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			await vi.advanceTimersByTimeAsync(25_000);
			expect(harness.channel.sent[1]).toBe("💡 **Hint 1/3:** `M•••• E••••••`");

			await vi.advanceTimersByTimeAsync(20_000);
			expect(harness.channel.sent[2]).toBe("💡 **Hint 2/3:** `Mo••• Eve••••`");

			await vi.advanceTimersByTimeAsync(20_000);
			expect(harness.channel.sent[3]).toBe("💡 **Hint 3/3:** `Mou•• Evere••`");
			expect(harness.commentary.hintQuip).toHaveBeenCalledWith({
				mode: "trivia",
				hint: "Mou•• Evere••",
				answer: "Mount Everest",
				round: 1,
				maxRounds: 5,
				question: "Highest mountain on Earth?",
			});

			await vi.advanceTimersByTimeAsync(10_000);
			expect(harness.channel.sent[4]).toBe(
				"⏰ Time's up. No one got it.\nThe correct answer was: **Mount Everest**.",
			);
			expect(harness.channel.sent[5]).toBe("I ran out of questions. Blame whoever configured me.");
			expect(harness.awardPoints).not.toHaveBeenCalled();
		});

		it("lets a winner resolving at the deadline beat the timeout", async () => {
			const harness = createHarness();
			harness.questions.push({ id: 8, question: "Capital of Spain?", answers: ["Madrid"] });
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			// The round times out at 75 s; this answer resolves 800 ms later.
			await vi.advanceTimersByTimeAsync(74_600);
			expect(harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "900", "madrid"))).toBe(true);
			await vi.advanceTimersByTimeAsync(2_000);

			expect(harness.channel.sent[4]).toBe("✅ <@u1> got it right. Correct answer: **Madrid**.");
			expect(harness.channel.sent.filter((line) => line.startsWith("⏰"))).toEqual([]);
			expect(state.scores.get("u1")).toBe(1);
		});

		it("does not hint single-character answers", async () => {
			const harness = createHarness();
			harness.questions.push({ id: 2, question: "Chemical symbol for oxygen?", answers: ["O"] });
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			await vi.advanceTimersByTimeAsync(25_000);
			expect(harness.channel.sent[1]).toBe("💡 **Hint 1/3:** `No hints for single-character answers.`");
		});

		it("keeps the game going when a point cannot be saved", async () => {
			const harness = createHarness({ awardFails: true });
			harness.questions.push({ id: 1, question: "Capital of Japan?", answers: ["Tokyo"] });
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "10", "tokyo"));
			await vi.advanceTimersByTimeAsync(800);

			expect(harness.channel.sent[1]).toBe("✅ <@u1> got it right. Correct answer: **Tokyo**.");
			expect(state.scores.get("u1")).toBe(1);
			expect(console.error).toHaveBeenCalledWith(
				"[games] Could not save the point for u1",
				expect.any(Error),
			);
		});

		it("posts a scoreboard quip halfway through long games", async () => {
			const harness = createHarness({
				repeatQuestion: { id: 3, question: "Color of the sky?", answers: ["blue"] },
			});
			const state = startGame(harness, "trivia", 15);
			await harness.engine.run(harness.channel, state);

			for (let round = 1; round <= 7; round++) {
				harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", String(round), "blue"));
				await vi.advanceTimersByTimeAsync(1_800);
			}

			expect(state.round).toBe(8);
			expect(harness.commentary.scoreboardQuip).toHaveBeenCalledTimes(1);
			expect(harness.commentary.scoreboardQuip).toHaveBeenCalledWith({
				mode: "trivia",
				round: 7,
				maxRounds: 15,
				players: [{ userId: "u1", displayName: "Alice", score: 7 }],
			});
			expect(harness.channel.sent).toContain("@Alice is carrying this server.");
		});
	});

	describe("loading rounds", () => {
		it("skips questions without answers", async () => {
			const harness = createHarness();
			harness.questions.push(
				{ id: 1, question: "Broken question?", answers: parseAnswers(null) },
				{ id: 2, question: "Capital of Italy?", answers: ["Rome"] },
			);
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			expect(harness.channel.sent).toEqual(["❓ **Question 1 of 5**\nCapital of Italy?"]);
			expect(harness.pickQuestion).toHaveBeenCalledTimes(2);
			expect(state.inProgress).toBe(true);
		});

		it("retries a round that failed to load", async () => {
			const harness = createHarness({ pickFailures: 1 });
			harness.questions.push({ id: 2, question: "Capital of Italy?", answers: ["Rome"] });
			const state = startGame(harness, "trivia", 5);

			const running = harness.engine.run(harness.channel, state);
			await vi.advanceTimersByTimeAsync(2_000);
			await running;

			expect(harness.channel.sent).toEqual(["❓ **Question 1 of 5**\nCapital of Italy?"]);
			expect(state.round).toBe(1);
		});

		it("ends the game with a failure notice when loading keeps failing", async () => {
			const harness = createHarness({ pickFailures: 2 });
			harness.questions.push({ id: 2, question: "Capital of Italy?", answers: ["Rome"] });
			const state = startGame(harness, "trivia", 5);

			const running = harness.engine.run(harness.channel, state);
			await vi.advanceTimersByTimeAsync(2_000);
			await running;

			expect(harness.channel.sent).toEqual([
				"⚠️ I couldn't load the next round, so this game ends here.",
				"🎮 **Game over.** Nobody scored anything. Impressive, in a tragic way.",
			]);
			expect(harness.closeSession).toHaveBeenCalledWith("guild-1", state.sessionId);
			expect(harness.engine.registry.get("channel-1")).toBeUndefined();
		});
	});

	describe("scramble rounds", () => {
		it("shows the scrambled word, two hints and the word on timeout", async () => {
			const harness = createHarness();
			harness.words.push({ id: 4, word: "planet" });
			const state = startGame(harness, "scramble", 5);
			await harness.engine.run(harness.channel, state);

			expect(harness.channel.sent[0]).toBe(
				"🔀 **Scramble 1 of 5**\n\n**LANETP**\n\n⏱️ You have **60 seconds**. Go.",
			);

			await vi.advanceTimersByTimeAsync(20_000);
			expect(harness.channel.sent[1]).toBe("💡 **Hint 1:** Starts with **P** (6 letters)");

			await vi.advanceTimersByTimeAsync(20_000);
			expect(harness.channel.sent[2]).toBe("💡 **Hint 2:** `P _ _ _ E _`");

			await vi.advanceTimersByTimeAsync(20_000);
			expect(harness.channel.sent[3]).toBe("⏰ Time’s up! The correct word was **PLANET**.");
			expect(harness.channel.sent[4]).toBe("I ran out of scramble words. This is awkward.");
		});

		it("only accepts the exact word", async () => {
			const harness = createHarness();
			harness.words.push({ id: 4, word: "planet" });
			const state = startGame(harness, "scramble", 5);
			await harness.engine.run(harness.channel, state);

			expect(harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "1", "planets"))).toBe(false);
			expect(harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "2", " PLANET "))).toBe(true);
		});
	});

	describe("stop and finish", () => {
		it("refuses to stop a game of another mode", () => {
			const harness = createHarness();
			harness.questions.push({ id: 1, question: "Q?", answers: ["A1"] });
			startGame(harness, "trivia", 5);

			const result = harness.engine.stop("channel-1", "scramble");
			expect(result.isErr() && result.error.message).toBe("There’s no scramble game running here.");
		});

		it("posts the final scoreboard and frees the channel", async () => {
			const harness = createHarness();
			harness.questions.push({ id: 1, question: "Capital of Italy?", answers: ["Rome"] });
			const state = startGame(harness, "trivia", 5);
			await harness.engine.run(harness.channel, state);

			harness.engine.submitAnswer(harness.channel, answer("u1", "Alice", "5", "rome"));
			await vi.advanceTimersByTimeAsync(800);

			const stopped = harness.engine.stop("channel-1", "trivia");
			expect(stopped.isOk()).toBe(true);
			await harness.engine.finish(harness.channel, state);

			expect(harness.channel.sent.at(-1)).toBe("🎮 **Game over.** Here’s the damage:\n**1. Alice** — 1 point(s)");
			expect(harness.closeSession).toHaveBeenCalledWith("guild-1", state.sessionId);
			expect(harness.engine.registry.get("channel-1")).toBeUndefined();

			// Pending round transitions and timers see the stopped game and stay quiet.
			const posted = harness.channel.sent.length;
			await vi.advanceTimersByTimeAsync(120_000);
			expect(harness.channel.sent).toHaveLength(posted);
			expect(harness.pickQuestion).toHaveBeenCalledTimes(1);
		});

		it("cancels a game before its first round without posting", () => {
			const harness = createHarness();
			const state = startGame(harness, "trivia", 5);

			harness.engine.cancel(state);

			expect(harness.channel.sent).toEqual([]);
			expect(harness.engine.registry.get("channel-1")).toBeUndefined();
			expect(harness.engine.start({ channel: harness.channel, mode: "scramble", rounds: 5 }).isOk()).toBe(true);
		});

		it("only finishes once", async () => {
			const harness = createHarness();
			const state = startGame(harness, "trivia", 5);
			harness.engine.stop("channel-1", "trivia");

			await harness.engine.finish(harness.channel, state);
			await harness.engine.finish(harness.channel, state);

			expect(harness.channel.sent).toEqual([
				"🎮 **Game over.** Nobody scored anything. Impressive, in a tragic way.",
			]);
		});
	});
});
