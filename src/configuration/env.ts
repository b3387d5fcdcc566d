/**
 * Process configuration read from the environment.
 *
 * Role in system:
 * - Single place where `process.env` is parsed; every other module receives
 *   a typed `BotEnv`.
 *
 * Invariants:
 * - `BOT_TOKEN` and `DATABASE_URL` are required; everything else has a default.
 * - `DATABASE_URL` must use the `postgres:` or `postgresql:` scheme.
 *
 * Gotchas:
 * - `getEnv()` memoises the first successful parse; tests should call
 *   `loadEnv(source)` with their own object instead.
 */
import "dotenv/config";
import { z } from "zod";
import {
  DEFAULT_GEMINI_MODEL,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_PROVIDER_ID,
  PROVIDER_IDS,
} from "@/services/ai/constants";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => ["1", "true", "yes", "on"].includes(value));

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const DatabaseUrlSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => {
    try {
      const url = new URL(value);
      return url.protocol === "postgres:" || url.protocol === "postgresql:";
    } catch {
      return false;
    }
  }, "must be a postgres:// or postgresql:// connection string");

export const EnvSchema = z.object({
  BOT_TOKEN: z.string().trim().min(1),
  DATABASE_URL: DatabaseUrlSchema,
  DATABASE_SSL: booleanFlag.default("false"),
  AI_PROVIDER: z.enum(PROVIDER_IDS).default(DEFAULT_PROVIDER_ID),
  OPENAI_API_KEY: optionalSecret,
  OPENAI_MODEL: z.string().trim().min(1).default(DEFAULT_OPENAI_MODEL),
  GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_GEMINI_MODEL),
  BOT_PERSONA: z.string().trim().min(1).default("Trivio"),
});

export type BotEnv = z.infer<typeof EnvSchema>;

export function loadEnv(
  source: Record<string, string | undefined> = process.env,
): BotEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

let cached: BotEnv | null = null;

export function getEnv(): BotEnv {
  if (!cached) cached = loadEnv();
  return cached;
}
