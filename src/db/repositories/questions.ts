/**
 * Trivia question repository.
 *
 * Purpose: pick the next question for a guild's game session and import new questions.
 *
 * Selection policy, applied atomically inside one transaction:
 * - only approved questions not yet asked in this (guild, session);
 * - least asked in this guild first, then least asked globally, then random;
 * - the chosen row is locked (`SKIP LOCKED`) so two channels never race for it;
 * - global and per-guild counters plus the session marker are written before commit.
 */
import { and, eq, sql } from "drizzle-orm";
import { z } from "zod";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import { getDb } from "../client";
import { parseAnswers } from "../normalizers";
import {
  questionUsage,
  questions,
  triviaSessionQuestions,
  type NewQuestionRow,
} from "../schema";

export interface TriviaQuestion {
  readonly id: number;
  readonly question: string;
  readonly answers: string[];
}

export interface TriviaQuestionRepo {
  pickQuestion(guildId: string, sessionId: string): Promise<Result<TriviaQuestion | null, Error>>;
  closeSession(guildId: string, sessionId: string): Promise<Result<void, Error>>;
  insertQuestions(rows: NewQuestionRow[]): Promise<Result<number, Error>>;
}

const PickedRowSchema = z.object({
  id: z.coerce.number().int(),
  question: z.string(),
  correct_answers: z.unknown(),
});

class TriviaQuestionRepoImpl implements TriviaQuestionRepo {
  async pickQuestion(
    guildId: string,
    sessionId: string,
  ): Promise<Result<TriviaQuestion | null, Error>> {
    try {
      const picked = await getDb().transaction(async (tx) => {
        const result = await tx.execute(sql`
          SELECT q.id, q.question, q.correct_answers
          FROM questions q
          WHERE q.approved = TRUE
            AND NOT EXISTS (
              SELECT 1
              FROM trivia_session_questions s
              WHERE s.guild_id = ${guildId}
                AND s.session_id = ${sessionId}
                AND s.question_id = q.id
            )
          ORDER BY
            COALESCE((
              SELECT u.times_asked
              FROM question_usage u
              WHERE u.question_id = q.id
                AND u.guild_id = ${guildId}
            ), 0) ASC,
            q.times_asked ASC,
            RANDOM()
          LIMIT 1
          FOR UPDATE OF q SKIP LOCKED
        `);

        const [raw] = result.rows;
        if (!raw) return null;
        const row = PickedRowSchema.parse(raw);

        await tx
          .update(questions)
          .set({ timesAsked: sql`${questions.timesAsked} + 1` })
          .where(eq(questions.id, row.id));

        await tx
          .insert(questionUsage)
          .values({ guildId, questionId: row.id, timesAsked: 1 })
          .onConflictDoUpdate({
            target: [questionUsage.guildId, questionUsage.questionId],
            set: {
              timesAsked: sql`${questionUsage.timesAsked} + 1`,
              lastAskedAt: sql`NOW()`,
            },
          });

        await tx
          .insert(triviaSessionQuestions)
          .values({ guildId, sessionId, questionId: row.id })
          .onConflictDoNothing();

        return row;
      });

      if (!picked) {
        console.debug(`[db] No eligible trivia questions for guild ${guildId}`);
        return OkResult(null);
      }

      return OkResult({
        id: picked.id,
        question: picked.question,
        answers: parseAnswers(picked.correct_answers),
      });
    } catch (error) {
      console.error("[db] pickQuestion failed", error);
      return ErrResult(toError(error));
    }
  }

  async closeSession(guildId: string, sessionId: string): Promise<Result<void, Error>> {
    try {
      await getDb()
        .delete(triviaSessionQuestions)
        .where(
          and(
            eq(triviaSessionQuestions.guildId, guildId),
            eq(triviaSessionQuestions.sessionId, sessionId),
          ),
        );
      return OkResult(undefined);
    } catch (error) {
      console.error("[db] closeSession failed", error);
      return ErrResult(toError(error));
    }
  }

  async insertQuestions(rows: NewQuestionRow[]): Promise<Result<number, Error>> {
    if (rows.length === 0) return OkResult(0);
    try {
      const inserted = await getDb()
        .insert(questions)
        .values(rows)
        .onConflictDoNothing({ target: [questions.source, questions.question] })
        .returning({ id: questions.id });
      return OkResult(inserted.length);
    } catch (error) {
      console.error("[db] insertQuestions failed", error);
      return ErrResult(toError(error));
    }
  }
}

export const triviaQuestionRepo: TriviaQuestionRepo = new TriviaQuestionRepoImpl();
