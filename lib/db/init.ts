// lib/db/init.ts
// Schema bootstrap for the Postgres audit log
import { sql } from "@vercel/postgres";
import { promises as fs } from "fs";
import path from "path";
import { log } from "@/lib/logging/logger";

let ready: Promise<void> | null = null;

/**
 * Create the query_sessions table and its indexes (idempotent).
 */
export async function initDatabase(): Promise<void> {
  const schemaPath = path.join(process.cwd(), "lib", "db", "schema.sql");
  const schema = await fs.readFile(schemaPath, "utf-8");
  await sql.query(schema);
  log.info("db.schema.ready", { table: "query_sessions" });
}

/**
 * Runs initDatabase once per process; a failed attempt is retried on the next call.
 */
export function ensureDatabase(): Promise<void> {
  ready ??= initDatabase().catch((err: unknown) => {
    ready = null;
    throw err;
  });
  return ready;
}

export async function checkDatabaseReady(): Promise<boolean> {
  try {
    const result = await sql`
      SELECT EXISTS (
        SELECT FROM information_schema.tables
        WHERE table_schema = 'public'
        AND table_name = 'query_sessions'
      ) AS table_exists;
    `;
    return result.rows[0]?.table_exists === true;
  } catch (err) {
    log.error("db.check", err);
    return false;
  }
}
