import type { Generated, Selectable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================

export type CrawlRunStatus = "running" | "completed" | "aborted";

export interface CrawlRunsTable {
  id: Generated<number>;
  profile: string;
  dataset_path: string;
  start_page: number;
  end_page: number;
  status: CrawlRunStatus;
  stop_reason: string | null;
  resolved_count: number;
  missing_count: number;
  started_at: string; // ISO timestamp (SQLite has no date type)
  finished_at: string | null;
}

export interface CrawlCheckpointsTable {
  id: Generated<number>;
  run_id: number;
  page: number;
  resolved_count: number;
  missing_count: number;
  index_size: number;
  created_at: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  crawl_runs: CrawlRunsTable;
  crawl_checkpoints: CrawlCheckpointsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type CrawlRun = Selectable<CrawlRunsTable>;
