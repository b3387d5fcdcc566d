/**
 * Unit Tests: Leaderboard Views
 *
 * Purpose: leaderboard lines, rank text and the embeds built from them.
 */
import { describe, expect, it } from "vitest";
import {
	LEADERBOARD_TITLE,
	buildLeaderboardEmbed,
	buildRankEmbed,
	formatLeaderboardLines,
	formatRankDescription,
} from "@/modules/leaderboard/views";

const rows = [
	{ userId: "1", displayName: "Alice", scoreTotal: 12 },
	{ userId: "2", displayName: null, scoreTotal: 7 },
];

describe("leaderboard views", () => {
	it("numbers rows and falls back to mentions for unknown names", () => {
		expect(formatLeaderboardLines(rows)).toBe("**#1** — Alice — 12 pts\n**#2** — <@2> — 7 pts");
	});

	it("describes a user's rank", () => {
		expect(formatRankDescription("Alice", { rank: 3, scoreTotal: 40 })).toBe(
			"Alice, you are **#3** in this server with **40** points.",
		);
	});

	it("builds embeds with the server in the footer", () => {
		const board = buildLeaderboardEmbed(rows, "Quiz Night").toJSON();
		expect(board.title).toBe(LEADERBOARD_TITLE);
		expect(board.description).toBe("**#1** — Alice — 12 pts\n**#2** — <@2> — 7 pts");
		expect(board.footer?.text).toBe("Server: Quiz Night");

		const rank = buildRankEmbed("Alice", { rank: 1, scoreTotal: 12 }, "Quiz Night").toJSON();
		expect(rank.description).toBe("Alice, you are **#1** in this server with **12** points.");
	});
});
