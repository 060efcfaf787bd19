import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";

/**
 * Any drizzle Postgres database: postgres-js at run time, PGlite in tests.
 */
export type AppDatabase = PgDatabase<PgQueryResultHKT>;

/**
 * Builds both typed ORM and raw SQL clients so the CLI can close the pool when a command finishes.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 10 });
  const db = drizzle(sql);
  return { db, sql };
};
