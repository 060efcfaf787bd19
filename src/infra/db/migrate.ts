import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";

export const migrationsFolder = fileURLToPath(
  new URL("../../../drizzle", import.meta.url),
);

/**
 * Applies pending SQL migrations from the repository's drizzle folder.
 */
export const runMigrations = async (
  db: PostgresJsDatabase<Record<string, never>>,
): Promise<void> => {
  await migrate(db, { migrationsFolder });
};
