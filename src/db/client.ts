/**
 * PostgreSQL pool and drizzle handle for the whole process.
 * Purpose: one entrypoint to obtain the database (`getDb`) and to close it (`disconnectDb`).
 */
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { getEnv } from "@/configuration";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;
let dbInstance: Database | null = null;

export function getPool(): Pool {
  if (pool) return pool;

  const env = getEnv();
  pool = new Pool({
    connectionString: env.DATABASE_URL,
    ssl: env.DATABASE_SSL ? { rejectUnauthorized: false } : undefined,
  });
  pool.on("error", (error) => {
    console.error("[db] Idle client error", error);
  });
  console.log("[db] Connection pool created");
  return pool;
}

export function getDb(): Database {
  if (!dbInstance) {
    dbInstance = drizzle(getPool(), { schema });
  }
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  if (pool) {
    await pool.end();
  }
  pool = null;
  dbInstance = null;
}
