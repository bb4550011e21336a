import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { env } from "../config/env.ts";
import * as schema from "./schema/index.ts";

export type Database = NodePgDatabase<typeof schema>;

let db: Database | null = null;

/**
 * Drizzle ORM database instance over a pg Pool.
 * Created on first use so file-backed sessions never open a connection.
 */
export function getDb(): Database {
  if (!db) {
    if (!env.DATABASE_URL) {
      throw new Error(
        "DATABASE_URL environment variable is not set. Postgres session storage is unavailable.",
      );
    }
    const pool = new pg.Pool({ connectionString: env.DATABASE_URL });
    db = drizzle(pool, { schema });
  }
  return db;
}
