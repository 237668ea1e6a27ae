import { sql, type Kysely } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";

/**
 * Create the checkpoint tables if they do not exist yet
 */
export async function ensureSchema(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable("crawl_runs")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
    .addColumn("profile", "text", (col) => col.notNull())
    .addColumn("dataset_path", "text", (col) => col.notNull())
    .addColumn("start_page", "integer", (col) => col.notNull())
    .addColumn("end_page", "integer", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull().defaultTo("running"))
    .addColumn("stop_reason", "text")
    .addColumn("resolved_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("missing_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("started_at", "text", (col) =>
      col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`)
    )
    .addColumn("finished_at", "text")
    .execute();

  await db.schema
    .createTable("crawl_checkpoints")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey().autoIncrement())
    .addColumn("run_id", "integer", (col) =>
      col.notNull().references("crawl_runs.id").onDelete("cascade")
    )
    .addColumn("page", "integer", (col) => col.notNull())
    .addColumn("resolved_count", "integer", (col) => col.notNull())
    .addColumn("missing_count", "integer", (col) => col.notNull())
    .addColumn("index_size", "integer", (col) => col.notNull())
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("crawl_checkpoints_run_idx")
    .ifNotExists()
    .on("crawl_checkpoints")
    .columns(["run_id", "page"])
    .execute();

  dbLogger.debug("Checkpoint schema ready");
}
