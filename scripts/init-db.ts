/**
 * Creates every table and index the bot uses. Safe to run repeatedly.
 *
 * Usage: npm run db:init
 */
import { disconnectDb, initSchema } from "@/db";

async function main(): Promise<void> {
  await initSchema();
  console.log("[init-db] Schema is ready");
}

main()
  .catch((error) => {
    console.error("[init-db] Failed:", error);
    process.exitCode = 1;
  })
  .then(() => disconnectDb())
  .catch((error) => {
    console.error("[init-db] Failed to close the database pool:", error);
  });
