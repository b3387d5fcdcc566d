/**
 * Leaderboard view builders.
 *
 * Purpose: turn score rows into display text, then into Seyfert embeds.
 * The text builders are pure; only the `build*Embed` functions touch Seyfert.
 */
import { Embed } from "seyfert";
import type { LeaderboardRow, UserRank } from "@/db";

export const LEADERBOARD_TITLE = "🏆 Trivia Leaderboard";
export const RANK_TITLE = "📊 Your Rank";
export const EMPTY_LEADERBOARD_MESSAGE =
  "No one is on the leaderboard yet. Answer a question to claim the top spot!";
export const UNRANKED_MESSAGE =
  "You're not on the leaderboard yet. Answer a question to earn your first points!";
export const LEADERBOARD_UNAVAILABLE_MESSAGE =
  "The leaderboard is unavailable right now. Try again in a bit.";

const EMBED_COLOR = 0xf1c40f;

/** Stored display name, or a mention when none was ever recorded. */
export const leaderboardName = (row: Pick<LeaderboardRow, "userId" | "displayName">): string =>
  row.displayName || `<@${row.userId}>`;

export function formatLeaderboardLines(rows: readonly LeaderboardRow[]): string {
  return rows
    .map((row, index) => `**#${index + 1}** — ${leaderboardName(row)} — ${row.scoreTotal} pts`)
    .join("\n");
}

export const formatRankDescription = (displayName: string, rank: UserRank): string =>
  `${displayName}, you are **#${rank.rank}** in this server with **${rank.scoreTotal}** points.`;

export const serverFooter = (guildName: string): string => `Server: ${guildName}`;

export function buildLeaderboardEmbed(rows: readonly LeaderboardRow[], guildName: string): Embed {
  return new Embed()
    .setTitle(LEADERBOARD_TITLE)
    .setDescription(formatLeaderboardLines(rows))
    .setColor(EMBED_COLOR)
    .setFooter({ text: serverFooter(guildName) });
}

export function buildRankEmbed(displayName: string, rank: UserRank, guildName: string): Embed {
  return new Embed()
    .setTitle(RANK_TITLE)
    .setDescription(formatRankDescription(displayName, rank))
    .setColor(EMBED_COLOR)
    .setFooter({ text: serverFooter(guildName) });
}
