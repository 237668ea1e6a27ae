/**
 * Snapshot Collector - scrape recent Bulletin records as full rows
 *
 * Walks results pages newest first in the full-table rendering and keeps
 * every row as displayed. The crawl ends on a page without rows, after the
 * first page whose newest year predates `sinceYear`, or at the last page.
 * The result is an incremental dataset for the merge command.
 */

import { COLUMNS, recordFromCells } from "../../dataset/store.js";
import { catalogLogger } from "../../logger.js";
import { SNAPSHOT_ID_COLUMN, extractTable } from "../../scraper/table.js";

import type {
  CatalogRecord,
  Dataset,
  SnapshotConfig,
  StopReason,
} from "../../types/index.js";
import type { PageSource } from "../reconcile/orchestrator.js";

export interface SnapshotProgress {
  page: number;
  endPage: number;
  rowsOnPage: number;
  rowsCollected: number;
  newestYear: number | null;
  failed: boolean;
}

export interface SnapshotReport {
  dataset: Dataset;
  pagesProcessed: number;
  pagesFailed: number;
  lastPage: number | null;
  stopReason: StopReason | null;
}

type ProgressCallback = (progress: SnapshotProgress) => void;

function maxYear(years: readonly number[]): number | null {
  return years.length === 0 ? null : Math.max(...years);
}

export class SnapshotCollector {
  private onProgress?: ProgressCallback;

  constructor(private readonly source: PageSource) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  async run(config: SnapshotConfig): Promise<SnapshotReport> {
    const columns: string[] = [COLUMNS.name];
    const records: CatalogRecord[] = [];
    let pagesProcessed = 0;
    let pagesFailed = 0;
    let lastPage: number | null = null;
    let stopReason: StopReason | null = null;

    for (let page = config.startPage; page <= config.endPage; page++) {
      lastPage = page;
      const result = await this.source.fetchPage(page, config.pageSize);
      pagesProcessed++;

      if (!result.ok) {
        pagesFailed++;
        catalogLogger.warn(
          { page, kind: result.kind, error: result.message },
          "Skipping snapshot page after failed request"
        );
        this.report(page, config, 0, records.length, null, true);
        continue;
      }

      const table = extractTable(result.body);
      for (const column of table.columns) {
        if (!columns.includes(column)) columns.push(column);
      }
      for (const cells of table.rows) {
        records.push(recordFromCells(cells, SNAPSHOT_ID_COLUMN));
      }

      const newestYear = maxYear(table.years);
      this.report(page, config, table.rows.length, records.length, newestYear, false);

      if (table.rows.length === 0) {
        stopReason = "empty-pages";
        break;
      }
      if (newestYear !== null && newestYear < config.sinceYear) {
        stopReason = "year-floor";
        break;
      }
    }

    if (stopReason === null && lastPage === config.endPage) {
      stopReason = "page-limit";
    }
    if (!columns.includes(SNAPSHOT_ID_COLUMN)) {
      columns.push(SNAPSHOT_ID_COLUMN);
    }

    catalogLogger.info(
      { rows: records.length, pages: pagesProcessed, failedPages: pagesFailed, stopReason },
      "Snapshot collected"
    );

    return {
      dataset: { records, columns, idColumn: SNAPSHOT_ID_COLUMN },
      pagesProcessed,
      pagesFailed,
      lastPage,
      stopReason,
    };
  }

  private report(
    page: number,
    config: SnapshotConfig,
    rowsOnPage: number,
    rowsCollected: number,
    newestYear: number | null,
    failed: boolean
  ): void {
    this.onProgress?.({
      page,
      endPage: config.endPage,
      rowsOnPage,
      rowsCollected,
      newestYear,
      failed,
    });
  }
}
