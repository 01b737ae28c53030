import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { getDatabaseUrl } from "./config";

const { Pool } = pg;

let pool: pg.Pool | undefined;
let database: NodePgDatabase<typeof schema> | undefined;

// Connects on first use so that commands which never touch the relational
// store (cleanup without a practice id, validation failures) need no DATABASE_URL.
export function getDb(): NodePgDatabase<typeof schema> {
  if (!database) {
    pool = new Pool({ connectionString: getDatabaseUrl() });
    database = drizzle(pool, { schema });
  }
  return database;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = undefined;
    database = undefined;
    await current.end();
  }
}
