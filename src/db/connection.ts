import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import { CHECKPOINT_DB_PATH } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";

const IN_MEMORY = ":memory:";

/**
 * Open the checkpoint database. Pass ":memory:" for a throwaway instance.
 */
export function createDatabase(dbPath = CHECKPOINT_DB_PATH): Kysely<Database> {
  if (dbPath !== IN_MEMORY) {
    // Ensure data directory exists
    const dataDir = dirname(dbPath);
    if (dataDir !== "." && !existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  dbLogger.debug({ dbPath }, "Opening checkpoint database");

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(dbPath) }),
  });
}

/**
 * Close the database handle
 */
export async function closeDatabase(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    dbLogger.debug("Checkpoint database closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing checkpoint database");
    throw error;
  }
}
