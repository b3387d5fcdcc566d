/**
 * Table definitions for drizzle.
 * Purpose: single source of truth for column names and types used by the repositories.
 * The DDL that creates these tables lives in `./init.ts`.
 */
import {
  boolean,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  serial,
  text,
  timestamp,
  unique,
  uuid,
} from "drizzle-orm/pg-core";

export const questions = pgTable(
  "questions",
  {
    id: serial("id").primaryKey(),
    source: text("source"),
    externalId: text("external_id"),
    category: text("category"),
    difficulty: text("difficulty"),
    question: text("question").notNull(),
    correctAnswers: jsonb("correct_answers").$type<string[]>(),
    incorrectAnswers: jsonb("incorrect_answers").$type<string[]>(),
    approved: boolean("approved").notNull().default(true),
    timesAsked: integer("times_asked").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    sourceQuestion: unique("questions_source_question_key").on(table.source, table.question),
  }),
);

export const questionUsage = pgTable(
  "question_usage",
  {
    guildId: text("guild_id").notNull(),
    questionId: integer("question_id")
      .notNull()
      .references(() => questions.id, { onDelete: "cascade" }),
    timesAsked: integer("times_asked").notNull().default(0),
    lastAskedAt: timestamp("last_asked_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.guildId, table.questionId] }),
  }),
);

export const triviaSessionQuestions = pgTable(
  "trivia_session_questions",
  {
    guildId: text("guild_id").notNull(),
    sessionId: uuid("session_id").notNull(),
    questionId: integer("question_id")
      .notNull()
      .references(() => questions.id, { onDelete: "cascade" }),
    askedAt: timestamp("asked_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.guildId, table.sessionId, table.questionId] }),
  }),
);

export const scrambleWords = pgTable("scramble_words", {
  id: serial("id").primaryKey(),
  word: text("word").notNull().unique(),
  approved: boolean("approved").notNull().default(true),
  timesAsked: integer("times_asked").notNull().default(0),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const scrambleUsage = pgTable(
  "scramble_usage",
  {
    guildId: text("guild_id").notNull(),
    wordId: integer("word_id")
      .notNull()
      .references(() => scrambleWords.id, { onDelete: "cascade" }),
    timesAsked: integer("times_asked").notNull().default(0),
    lastAskedAt: timestamp("last_asked_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.guildId, table.wordId] }),
  }),
);

export const userScores = pgTable(
  "user_scores",
  {
    guildId: text("guild_id").notNull(),
    userId: text("user_id").notNull(),
    displayName: text("display_name"),
    scoreTotal: integer("score_total").notNull().default(0),
    triviaScore: integer("trivia_score").notNull().default(0),
    scrambleScore: integer("scramble_score").notNull().default(0),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.guildId, table.userId] }),
  }),
);

export type NewQuestionRow = typeof questions.$inferInsert;
