/**
 * Loads a newline-separated word list into the scramble word store.
 *
 * Usage: npm run import:words -- [path/to/words.txt]
 */
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { disconnectDb, initSchema, scrambleWordRepo } from "@/db";
import { parseWordList } from "@/modules/importers";

const DEFAULT_WORD_FILE = resolve(__dirname, "..", "data", "scramble-words.txt");

async function main(): Promise<void> {
  const file = process.argv[2] ? resolve(process.argv[2]) : DEFAULT_WORD_FILE;
  const words = parseWordList(await readFile(file, "utf8"));
  console.log(`[import-words] ${words.length} valid words in ${file}`);

  await initSchema();
  const inserted = await scrambleWordRepo.insertWords(words);
  if (inserted.isErr()) throw inserted.error;

  console.log(`[import-words] Added ${inserted.value} new words`);
}

main()
  .catch((error) => {
    console.error("[import-words] Failed:", error);
    process.exitCode = 1;
  })
  .then(() => disconnectDb())
  .catch((error) => {
    console.error("[import-words] Failed to close the database pool:", error);
  });
