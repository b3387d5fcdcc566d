/**
 * Leaderboard repository.
 *
 * Purpose: persist points won in games and read per-guild rankings.
 * Ranking uses competition order: players with equal totals share a rank.
 */
import { and, asc, count, desc, eq, gt, sql } from "drizzle-orm";
import type { GameMode, ScoreRecorder } from "@/modules/games/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { getDb } from "../client";
import { userScores } from "../schema";

export interface LeaderboardRow {
  readonly userId: string;
  readonly displayName: string | null;
  readonly scoreTotal: number;
}

export interface UserRank {
  readonly rank: number;
  readonly scoreTotal: number;
}

export interface AwardPointsInput {
  guildId: string;
  userId: string;
  displayName: string;
  points: number;
  mode: GameMode;
}

export interface ScoreRepo extends ScoreRecorder {
  getLeaderboard(guildId: string, limit?: number): Promise<Result<LeaderboardRow[], Error>>;
  getUserRank(guildId: string, userId: string): Promise<Result<UserRank | null, Error>>;
}

export const DEFAULT_LEADERBOARD_SIZE = 10;

class ScoreRepoImpl implements ScoreRepo {
  async awardPoints(input: AwardPointsInput): Promise<Result<void, Error>> {
    const { guildId, userId, displayName, points, mode } = input;
    try {
      await getDb()
        .insert(userScores)
        .values({
          guildId,
          userId,
          displayName,
          scoreTotal: points,
          triviaScore: mode === "trivia" ? points : 0,
          scrambleScore: mode === "scramble" ? points : 0,
        })
        .onConflictDoUpdate({
          target: [userScores.guildId, userScores.userId],
          set: {
            displayName,
            scoreTotal: sql`${userScores.scoreTotal} + ${points}`,
            ...(mode === "trivia"
              ? { triviaScore: sql`${userScores.triviaScore} + ${points}` }
              : { scrambleScore: sql`${userScores.scrambleScore} + ${points}` }),
            updatedAt: sql`NOW()`,
          },
        });
      return OkResult(undefined);
    } catch (error) {
      console.error("[db] awardPoints failed", error);
      return ErrResult(toError(error));
    }
  }

  async getLeaderboard(
    guildId: string,
    limit: number = DEFAULT_LEADERBOARD_SIZE,
  ): Promise<Result<LeaderboardRow[], Error>> {
    try {
      const rows = await getDb()
        .select({
          userId: userScores.userId,
          displayName: userScores.displayName,
          scoreTotal: userScores.scoreTotal,
        })
        .from(userScores)
        .where(eq(userScores.guildId, guildId))
        .orderBy(desc(userScores.scoreTotal), asc(userScores.updatedAt))
        .limit(limit);
      return OkResult(rows);
    } catch (error) {
      console.error("[db] getLeaderboard failed", error);
      return ErrResult(toError(error));
    }
  }

  async getUserRank(guildId: string, userId: string): Promise<Result<UserRank | null, Error>> {
    try {
      const db = getDb();
      const [own] = await db
        .select({ scoreTotal: userScores.scoreTotal })
        .from(userScores)
        .where(and(eq(userScores.guildId, guildId), eq(userScores.userId, userId)))
        .limit(1);
      if (!own) return OkResult(null);

      const [ahead] = await db
        .select({ value: count() })
        .from(userScores)
        .where(and(eq(userScores.guildId, guildId), gt(userScores.scoreTotal, own.scoreTotal)));

      return OkResult({ rank: (ahead?.value ?? 0) + 1, scoreTotal: own.scoreTotal });
    } catch (error) {
      console.error("[db] getUserRank failed", error);
      return ErrResult(toError(error));
    }
  }
}

export const scoreRepo: ScoreRepo = new ScoreRepoImpl();
