/**
 * Scramble word repository.
 *
 * Purpose: pick the next word for a guild and import word lists.
 * Words asked in the same guild within the cooldown window are skipped; the
 * rest are ordered like trivia questions (guild usage, global usage, random).
 */
import { eq, sql } from "drizzle-orm";
import { z } from "zod";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { getDb } from "../client";
import { scrambleUsage, scrambleWords } from "../schema";

export const SCRAMBLE_REPEAT_COOLDOWN_MINUTES = 30;

const WORD_PATTERN = /^[a-z]{3,}$/;

export interface ScrambleWord {
  readonly id: number;
  readonly word: string;
}

export interface ScrambleWordRepo {
  pickWord(guildId: string): Promise<Result<ScrambleWord | null, Error>>;
  insertWords(words: readonly string[]): Promise<Result<number, Error>>;
}

const PickedWordSchema = z.object({
  id: z.coerce.number().int(),
  word: z.string().min(1),
});

/** Lower-cases, trims and deduplicates a word list, keeping only plain words. */
export function normalizeWordList(words: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const entry of words) {
    const word = entry.trim().toLowerCase();
    if (WORD_PATTERN.test(word)) seen.add(word);
  }
  return [...seen];
}

class ScrambleWordRepoImpl implements ScrambleWordRepo {
  async pickWord(guildId: string): Promise<Result<ScrambleWord | null, Error>> {
    try {
      const picked = await getDb().transaction(async (tx) => {
        const result = await tx.execute(sql`
          SELECT w.id, w.word
          FROM scramble_words w
          WHERE w.approved = TRUE
            AND NOT EXISTS (
              SELECT 1
              FROM scramble_usage u
              WHERE u.guild_id = ${guildId}
                AND u.word_id = w.id
                AND u.last_asked_at > NOW() - make_interval(mins => ${SCRAMBLE_REPEAT_COOLDOWN_MINUTES})
            )
          ORDER BY
            COALESCE((
              SELECT u.times_asked
              FROM scramble_usage u
              WHERE u.word_id = w.id
                AND u.guild_id = ${guildId}
            ), 0) ASC,
            w.times_asked ASC,
            RANDOM()
          LIMIT 1
          FOR UPDATE OF w SKIP LOCKED
        `);

        const [raw] = result.rows;
        if (!raw) return null;
        const row = PickedWordSchema.parse(raw);

        await tx
          .update(scrambleWords)
          .set({ timesAsked: sql`${scrambleWords.timesAsked} + 1` })
          .where(eq(scrambleWords.id, row.id));

        await tx
          .insert(scrambleUsage)
          .values({ guildId, wordId: row.id, timesAsked: 1 })
          .onConflictDoUpdate({
            target: [scrambleUsage.guildId, scrambleUsage.wordId],
            set: {
              timesAsked: sql`${scrambleUsage.timesAsked} + 1`,
              lastAskedAt: sql`NOW()`,
            },
          });

        return row;
      });

      if (!picked) {
        console.debug(`[db] No eligible scramble words for guild ${guildId}`);
        return OkResult(null);
      }

      console.debug(`[db] Selected scramble word id=${picked.id} guild=${guildId}`);
      return OkResult(picked);
    } catch (error) {
      console.error("[db] pickWord failed", error);
      return ErrResult(toError(error));
    }
  }

  async insertWords(words: readonly string[]): Promise<Result<number, Error>> {
    const normalized = normalizeWordList(words);
    if (normalized.length === 0) return OkResult(0);
    try {
      const inserted = await getDb()
        .insert(scrambleWords)
        .values(normalized.map((word) => ({ word })))
        .onConflictDoNothing({ target: scrambleWords.word })
        .returning({ id: scrambleWords.id });
      return OkResult(inserted.length);
    } catch (error) {
      console.error("[db] insertWords failed", error);
      return ErrResult(toError(error));
    }
  }
}

export const scrambleWordRepo: ScrambleWordRepo = new ScrambleWordRepoImpl();
