/**
 * Idempotent schema bootstrap, run before the client connects to Discord.
 */
import { sql } from "drizzle-orm";
import { getDb } from "./client";

const STATEMENTS = [
  sql`CREATE TABLE IF NOT EXISTS questions (
    id SERIAL PRIMARY KEY,
    source TEXT,
    external_id TEXT,
    category TEXT,
    difficulty TEXT,
    question TEXT NOT NULL,
    correct_answers JSONB,
    incorrect_answers JSONB,
    approved BOOLEAN NOT NULL DEFAULT TRUE,
    times_asked INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT questions_source_question_key UNIQUE (source, question)
  )`,
  sql`CREATE TABLE IF NOT EXISTS question_usage (
    guild_id TEXT NOT NULL,
    question_id INTEGER NOT NULL REFERENCES questions(id) ON DELETE CASCADE,
    times_asked INTEGER NOT NULL DEFAULT 0,
    last_asked_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (guild_id, question_id)
  )`,
  sql`CREATE TABLE IF NOT EXISTS trivia_session_questions (
    guild_id TEXT NOT NULL,
    session_id UUID NOT NULL,
    question_id INTEGER NOT NULL REFERENCES questions(id) ON DELETE CASCADE,
    asked_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (guild_id, session_id, question_id)
  )`,
  sql`CREATE TABLE IF NOT EXISTS scramble_words (
    id SERIAL PRIMARY KEY,
    word TEXT NOT NULL UNIQUE,
    approved BOOLEAN NOT NULL DEFAULT TRUE,
    times_asked INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  sql`CREATE TABLE IF NOT EXISTS scramble_usage (
    guild_id TEXT NOT NULL,
    word_id INTEGER NOT NULL REFERENCES scramble_words(id) ON DELETE CASCADE,
    times_asked INTEGER NOT NULL DEFAULT 0,
    last_asked_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (guild_id, word_id)
  )`,
  sql`CREATE TABLE IF NOT EXISTS user_scores (
    guild_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    display_name TEXT,
    score_total INTEGER NOT NULL DEFAULT 0,
    trivia_score INTEGER NOT NULL DEFAULT 0,
    scramble_score INTEGER NOT NULL DEFAULT 0,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (guild_id, user_id)
  )`,
  sql`CREATE INDEX IF NOT EXISTS user_scores_guild_total_idx
    ON user_scores (guild_id, score_total DESC)`,
  sql`CREATE INDEX IF NOT EXISTS scramble_usage_recent_idx
    ON scramble_usage (guild_id, last_asked_at)`,
];

export async function initSchema(): Promise<void> {
  const db = getDb();
  for (const statement of STATEMENTS) {
    await db.execute(statement);
  }
  console.log("[db] Schema created / already existed");
}
