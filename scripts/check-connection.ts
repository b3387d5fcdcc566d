/**
 * Verifies that DATABASE_URL points at a reachable PostgreSQL server.
 *
 * Usage: npm run db:check
 */
import { sql } from "drizzle-orm";
import { disconnectDb, getDb } from "@/db";

async function main(): Promise<void> {
  const result = await getDb().execute(sql`SELECT 1 AS ok, version() AS version`);
  const [row] = result.rows;
  console.log("[check-connection] Connected:", row?.version ?? "unknown server version");
}

main()
  .catch((error) => {
    console.error("[check-connection] Could not connect:", error);
    process.exitCode = 1;
  })
  .then(() => disconnectDb())
  .catch((error) => {
    console.error("[check-connection] Failed to close the database pool:", error);
  });
