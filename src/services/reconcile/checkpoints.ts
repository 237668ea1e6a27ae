/**
 * Checkpointing - keep long crawls resumable
 *
 * Every few pages the partial lookup is applied to the whole dataset and the
 * target file is overwritten, so an interrupted run keeps every code it had
 * already found. Each save is also logged in the checkpoint database, which
 * is where `--resume` picks up the next page from.
 */

import { applyLookup, countResolved, type ApplyResult } from "./apply.js";
import { saveDataset } from "../../dataset/store.js";
import { reconcileLogger } from "../../logger.js";

import type { LookupIndex } from "./lookup-index.js";
import type { CrawlRun, CrawlRunStatus, Database } from "../../db/schema.js";
import type { CatalogRecord, CrawlConfig, Dataset } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface CheckpointInfo {
  runId: number;
  page: number;
  resolvedCount: number;
  missingCount: number;
  indexSize: number;
  createdAt: string;
}

export type RunOverview = CrawlRun & {
  last_page: number | null;
  checkpoint_count: number;
};

export interface RunSummary {
  status: Exclude<CrawlRunStatus, "running">;
  stopReason: string | null;
  resolvedCount: number;
  missingCount: number;
}

// ============================================================================
// Checkpoint Service
// ============================================================================

export class CrawlCheckpointService {
  constructor(private readonly db: Kysely<Database>) {}

  async startRun(config: CrawlConfig, datasetPath: string): Promise<number> {
    const result = await this.db
      .insertInto("crawl_runs")
      .values({
        profile: config.profile,
        dataset_path: datasetPath,
        start_page: config.startPage,
        end_page: config.endPage,
        status: "running",
        stop_reason: null,
        resolved_count: 0,
        missing_count: 0,
        started_at: new Date().toISOString(),
        finished_at: null,
      })
      .returning("id")
      .executeTakeFirstOrThrow();

    return result.id;
  }

  async saveCheckpoint(
    checkpoint: Omit<CheckpointInfo, "createdAt">
  ): Promise<void> {
    const now = new Date().toISOString();

    await this.db
      .insertInto("crawl_checkpoints")
      .values({
        run_id: checkpoint.runId,
        page: checkpoint.page,
        resolved_count: checkpoint.resolvedCount,
        missing_count: checkpoint.missingCount,
        index_size: checkpoint.indexSize,
        created_at: now,
      })
      .execute();

    await this.db
      .updateTable("crawl_runs")
      .set({
        resolved_count: checkpoint.resolvedCount,
        missing_count: checkpoint.missingCount,
      })
      .where("id", "=", checkpoint.runId)
      .execute();
  }

  async finishRun(runId: number, summary: RunSummary): Promise<void> {
    await this.db
      .updateTable("crawl_runs")
      .set({
        status: summary.status,
        stop_reason: summary.stopReason,
        resolved_count: summary.resolvedCount,
        missing_count: summary.missingCount,
        finished_at: new Date().toISOString(),
      })
      .where("id", "=", runId)
      .execute();
  }

  /**
   * Last checkpoint written since the most recent completed run of the same
   * profile on the same dataset.
   *
   * Returns null when there is nothing to resume.
   */
  async getResumePoint(
    profile: string,
    datasetPath: string
  ): Promise<CheckpointInfo | null> {
    const lastCompleted = await this.db
      .selectFrom("crawl_runs")
      .select((eb) => eb.fn.max("id").as("id"))
      .where("profile", "=", profile)
      .where("dataset_path", "=", datasetPath)
      .where("status", "=", "completed")
      .executeTakeFirst();

    const checkpoint = await this.db
      .selectFrom("crawl_checkpoints as c")
      .innerJoin("crawl_runs as r", "r.id", "c.run_id")
      .select([
        "c.run_id",
        "c.page",
        "c.resolved_count",
        "c.missing_count",
        "c.index_size",
        "c.created_at",
      ])
      .where("r.profile", "=", profile)
      .where("r.dataset_path", "=", datasetPath)
      .where("r.id", ">", lastCompleted?.id ?? 0)
      .orderBy("c.id", "desc")
      .limit(1)
      .executeTakeFirst();

    if (!checkpoint) {
      return null;
    }

    return {
      runId: checkpoint.run_id,
      page: checkpoint.page,
      resolvedCount: checkpoint.resolved_count,
      missingCount: checkpoint.missing_count,
      indexSize: checkpoint.index_size,
      createdAt: checkpoint.created_at,
    };
  }

  /**
   * Most recent runs first, each with its checkpoint count and the page of
   * its last checkpoint
   */
  async listRuns(limit = 20): Promise<RunOverview[]> {
    const rows = await this.db
      .selectFrom("crawl_runs")
      .selectAll("crawl_runs")
      .select((eb) => [
        eb
          .selectFrom("crawl_checkpoints")
          .select((sub) => sub.fn.max("crawl_checkpoints.page").as("page"))
          .whereRef("crawl_checkpoints.run_id", "=", "crawl_runs.id")
          .as("last_page"),
        eb
          .selectFrom("crawl_checkpoints")
          .select((sub) => sub.fn.countAll<number>().as("count"))
          .whereRef("crawl_checkpoints.run_id", "=", "crawl_runs.id")
          .as("checkpoint_count"),
      ])
      .orderBy("crawl_runs.id", "desc")
      .limit(limit)
      .execute();

    return rows.map((row) => ({
      ...row,
      last_page: row.last_page ?? null,
      checkpoint_count: Number(row.checkpoint_count ?? 0),
    }));
  }
}

// ============================================================================
// Checkpointer
// ============================================================================

export interface CheckpointerOptions {
  outputPath: string;
  /** Pages between saves, 0 disables intermediate saves */
  every: number;
  /** Layout the records are written back with */
  dataset: Pick<Dataset, "columns" | "idColumn">;
  service?: CrawlCheckpointService;
  runId?: number;
}

export class Checkpointer {
  constructor(private readonly options: CheckpointerOptions) {}

  get outputPath(): string {
    return this.options.outputPath;
  }

  isDue(pagesProcessed: number): boolean {
    const { every } = this.options;
    return every > 0 && pagesProcessed > 0 && pagesProcessed % every === 0;
  }

  /**
   * Apply the index, overwrite the target file and record the checkpoint
   */
  async write(
    page: number,
    records: readonly CatalogRecord[],
    index: LookupIndex
  ): Promise<ApplyResult> {
    const applied = applyLookup(records, index);
    saveDataset(this.options.outputPath, {
      ...this.options.dataset,
      records: applied.records,
    });

    const resolvedCount = countResolved(applied.records);
    reconcileLogger.info(
      {
        page,
        filled: applied.filled,
        missing: applied.remaining,
        outputPath: this.options.outputPath,
      },
      "Checkpoint saved"
    );

    const { service, runId } = this.options;
    if (service !== undefined && runId !== undefined) {
      await service.saveCheckpoint({
        runId,
        page,
        resolvedCount,
        missingCount: applied.remaining,
        indexSize: index.size,
      });
    }

    return applied;
  }

  async finish(summary: RunSummary): Promise<void> {
    const { service, runId } = this.options;
    if (service !== undefined && runId !== undefined) {
      await service.finishRun(runId, summary);
    }
  }
}
