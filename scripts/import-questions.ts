/**
 * Pulls multiple-choice questions from the Open Trivia DB until several
 * batches in a row add nothing new.
 *
 * Usage: npm run import:questions -- [--category 9] [--amount 50] [--max-empty 5]
 */
import { setTimeout as sleep } from "node:timers/promises";
import { parseArgs } from "node:util";
import { z } from "zod";
import { disconnectDb, initSchema, triviaQuestionRepo } from "@/db";
import { OPENTDB_MAX_AMOUNT, fetchOpenTdbBatch } from "@/modules/importers";

const BATCH_PAUSE_MS = 1_000;

const ArgsSchema = z.object({
  category: z.coerce.number().int().positive().optional(),
  amount: z.coerce.number().int().min(1).max(OPENTDB_MAX_AMOUNT).default(OPENTDB_MAX_AMOUNT),
  maxEmpty: z.coerce.number().int().min(1).default(5),
});

function readArgs() {
  const { values } = parseArgs({
    options: {
      category: { type: "string" },
      amount: { type: "string" },
      "max-empty": { type: "string" },
    },
  });
  return ArgsSchema.parse({
    category: values.category,
    amount: values.amount,
    maxEmpty: values["max-empty"],
  });
}

async function main(): Promise<void> {
  const { category, amount, maxEmpty } = readArgs();
  await initSchema();

  let emptyBatches = 0;
  let totalNew = 0;
  let batchNumber = 1;

  while (emptyBatches < maxEmpty) {
    console.log(`[import-questions] Fetching batch #${batchNumber}...`);
    const batch = await fetchOpenTdbBatch({ amount, category });
    if (batch.length === 0) {
      console.log("[import-questions] No data returned, stopping");
      break;
    }

    const inserted = await triviaQuestionRepo.insertQuestions(batch);
    if (inserted.isErr()) throw inserted.error;

    if (inserted.value === 0) {
      emptyBatches += 1;
      console.log(`[import-questions] No new questions (${emptyBatches}/${maxEmpty})`);
    } else {
      emptyBatches = 0;
      totalNew += inserted.value;
      console.log(`[import-questions] Added ${inserted.value} new questions (total: ${totalNew})`);
    }

    batchNumber += 1;
    await sleep(BATCH_PAUSE_MS);
  }

  console.log(`[import-questions] Done. Unique questions added: ${totalNew}`);
}

main()
  .catch((error) => {
    console.error("[import-questions] Failed:", error);
    process.exitCode = 1;
  })
  .then(() => disconnectDb())
  .catch((error) => {
    console.error("[import-questions] Failed to close the database pool:", error);
  });
