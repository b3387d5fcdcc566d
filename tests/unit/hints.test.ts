/**
 * Unit Tests: Hints
 *
 * Purpose: Masked trivia hints, letter scrambling and scramble hint patterns.
 */
import { describe, expect, it } from "vitest";
import {
	buildScrambleHint,
	buildTriviaHint,
	hasSingleCharacterAnswer,
	scrambleWord,
} from "@/modules/games/hints";

describe("buildTriviaHint", () => {
	it("reveals a quarter, half and three quarters of each word", () => {
		expect(buildTriviaHint("Mount Everest", 1)).toBe("M•••• E••••••");
		expect(buildTriviaHint("Mount Everest", 2)).toBe("Mo••• Eve••••");
		expect(buildTriviaHint("Mount Everest", 3)).toBe("Mou•• Evere••");
	});

	it("shows only the first letter of short words", () => {
		expect(buildTriviaHint("The Eiffel Tower", 1)).toBe("T•• E••••• T••••");
		expect(buildTriviaHint("The Eiffel Tower", 3)).toBe("T•• Eiff•• Tow••");
	});

	it("re-joins words with single spaces", () => {
		expect(buildTriviaHint("  Blue   Whale ", 2)).toBe("Bl•• Wh•••");
	});
});

describe("hasSingleCharacterAnswer", () => {
	it("detects one-character answers after trimming", () => {
		expect(hasSingleCharacterAnswer(["AB", " b "])).toBe(true);
		expect(hasSingleCharacterAnswer(["AB", "CD"])).toBe(false);
	});
});

describe("scrambleWord", () => {
	it("shuffles with the given random source", () => {
		expect(scrambleWord("planet", () => 0)).toBe("lanetp");
	});

	it("falls back to the reversed word when shuffling keeps the original", () => {
		expect(scrambleWord("ab", () => 0.9)).toBe("ba");
	});

	it("leaves one-letter words alone", () => {
		expect(scrambleWord("a", () => 0)).toBe("a");
	});
});

describe("buildScrambleHint", () => {
	it("reveals the first and second to last letters", () => {
		expect(buildScrambleHint("cabbage")).toBe("C _ _ _ _ G _");
	});

	it("reveals the second letter of two-letter words", () => {
		expect(buildScrambleHint("ox")).toBe("O X");
	});
});
