/**
 * Unit Tests: Content Importers
 *
 * Purpose: Open Trivia DB request URLs and payload decoding, and word list parsing.
 */
import { describe, expect, it } from "vitest";
import { OpenTdbError, buildOpenTdbUrl, parseOpenTdbResponse } from "@/modules/importers/opentdb";
import { parseWordList } from "@/modules/importers/words";

describe("Open Trivia DB", () => {
	it("builds a multiple-choice url with the amount capped at 50", () => {
		expect(buildOpenTdbUrl({ amount: 80, category: 9 })).toBe(
			"https://opentdb.com/api.php?amount=50&category=9&type=multiple&encode=url3986",
		);
		expect(buildOpenTdbUrl({ amount: 0 })).toBe(
			"https://opentdb.com/api.php?amount=1&type=multiple&encode=url3986",
		);
	});

	it("decodes every text field", () => {
		const rows = parseOpenTdbResponse({
			response_code: 0,
			results: [
				{
					category: "Science%3A%20Computers",
					difficulty: "easy",
					question: "What%20does%20%22CPU%22%20stand%20for%3F",
					correct_answer: "Central%20Processing%20Unit",
					incorrect_answers: ["Computer%20Personal%20Unit", "Core%20Power%20Unit"],
				},
			],
		});

		expect(rows).toEqual([
			{
				source: "opentdb",
				externalId: null,
				category: "Science: Computers",
				difficulty: "easy",
				question: 'What does "CPU" stand for?',
				correctAnswers: ["Central Processing Unit"],
				incorrectAnswers: ["Computer Personal Unit", "Core Power Unit"],
			},
		]);
	});

	it("surfaces non-zero response codes", () => {
		try {
			parseOpenTdbResponse({ response_code: 1, results: [] });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(OpenTdbError);
			expect(error instanceof OpenTdbError && error.responseCode).toBe(1);
		}
	});

	it("rejects malformed payloads", () => {
		expect(() => parseOpenTdbResponse({ results: "nope" })).toThrow(OpenTdbError);
	});
});

describe("parseWordList", () => {
	it("keeps unique lowercase words of three letters or more", () => {
		const text = "# animals\nApple\n  banana \nno\nx-ray\napple\n\r\nCherry\r\n";
		expect(parseWordList(text)).toEqual(["apple", "banana", "cherry"]);
	});
});
