/**
 * Unit Tests: Utilities
 *
 * Purpose: mention stripping, display names, snowflake ordering and stored answer parsing.
 */
import { describe, expect, it } from "vitest";
import { parseAnswers } from "@/db/normalizers";
import { resolveDisplayName } from "@/utils/displayName";
import { stripUserMentions } from "@/utils/mentions";
import { compareSnowflakes } from "@/utils/snowflake";

describe("stripUserMentions", () => {
	it("removes mentions and tidies spacing", () => {
		expect(stripUserMentions("<@123> hey <@!456>  there")).toBe("hey there");
		expect(stripUserMentions("<@123>")).toBe("");
	});
});

describe("resolveDisplayName", () => {
	it("prefers nickname, then global name, then username", () => {
		const user = { username: "alice_01", globalName: "Alice" };
		expect(resolveDisplayName(user, { nick: "Ali" })).toBe("Ali");
		expect(resolveDisplayName(user, { nick: "" })).toBe("Alice");
		expect(resolveDisplayName({ username: "alice_01", globalName: null }, null)).toBe("alice_01");
	});
});

describe("compareSnowflakes", () => {
	it("compares numerically", () => {
		expect(compareSnowflakes("9", "10")).toBe(-1);
		expect(compareSnowflakes("1100000000000000000", "1099999999999999999")).toBe(1);
		expect(compareSnowflakes("42", "42")).toBe(0);
	});
});

describe("parseAnswers", () => {
	it("accepts arrays, JSON strings and bare strings", () => {
		expect(parseAnswers(["Paris", 3])).toEqual(["Paris", "3"]);
		expect(parseAnswers('["a","b"]')).toEqual(["a", "b"]);
		expect(parseAnswers('"x"')).toEqual(["x"]);
		expect(parseAnswers("plain text")).toEqual(["plain text"]);
		expect(parseAnswers(null)).toEqual([]);
	});
});
