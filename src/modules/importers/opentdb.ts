/**
 * Open Trivia DB client used by the question importer.
 *
 * Requests use `encode=url3986`, so every text field arrives percent-encoded
 * and is decoded with `decodeURIComponent` before it is stored.
 */
import { z } from "zod";
import type { NewQuestionRow } from "@/db/schema";

export const OPENTDB_API_URL = "https://opentdb.com/api.php";
export const OPENTDB_SOURCE = "opentdb";
export const OPENTDB_MAX_AMOUNT = 50;

const OpenTdbQuestionSchema = z.object({
  category: z.string().default(""),
  difficulty: z.string().default("easy"),
  question: z.string(),
  correct_answer: z.string(),
  incorrect_answers: z.array(z.string()).default([]),
});

const OpenTdbResponseSchema = z.object({
  response_code: z.number().int(),
  results: z.array(OpenTdbQuestionSchema).default([]),
});

export interface OpenTdbQuery {
  amount: number;
  category?: number;
}

export class OpenTdbError extends Error {
  constructor(
    message: string,
    readonly responseCode?: number,
  ) {
    super(message);
    this.name = "OpenTdbError";
  }
}

export function buildOpenTdbUrl(query: OpenTdbQuery): string {
  const url = new URL(OPENTDB_API_URL);
  url.searchParams.set("amount", String(Math.min(Math.max(1, query.amount), OPENTDB_MAX_AMOUNT)));
  if (query.category !== undefined) {
    url.searchParams.set("category", String(query.category));
  }
  url.searchParams.set("type", "multiple");
  url.searchParams.set("encode", "url3986");
  return url.toString();
}

/** Validates an API payload and maps it to question rows. */
export function parseOpenTdbResponse(payload: unknown): NewQuestionRow[] {
  const parsed = OpenTdbResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new OpenTdbError(`Unexpected Open Trivia DB payload: ${parsed.error.message}`);
  }
  if (parsed.data.response_code !== 0) {
    throw new OpenTdbError(
      `Open Trivia DB returned response_code=${parsed.data.response_code}`,
      parsed.data.response_code,
    );
  }

  return parsed.data.results.map((entry) => ({
    source: OPENTDB_SOURCE,
    externalId: null,
    category: decodeURIComponent(entry.category),
    difficulty: decodeURIComponent(entry.difficulty),
    question: decodeURIComponent(entry.question),
    correctAnswers: [decodeURIComponent(entry.correct_answer)],
    incorrectAnswers: entry.incorrect_answers.map((answer) => decodeURIComponent(answer)),
  }));
}

export async function fetchOpenTdbBatch(query: OpenTdbQuery): Promise<NewQuestionRow[]> {
  const response = await fetch(buildOpenTdbUrl(query));
  if (!response.ok) {
    throw new OpenTdbError(`Open Trivia DB request failed with HTTP ${response.status}`);
  }
  const payload: unknown = await response.json();
  return parseOpenTdbResponse(payload);
}
