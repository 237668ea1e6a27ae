/**
 * Reconcile Orchestrator - fill missing Bulletin codes from a crawl
 *
 * Flow, one page at a time:
 * 1. Fetch the results page (failures are logged and skipped)
 * 2. Extract (code, name) pairs and fold them into the session index
 * 3. Evaluate the stop heuristics
 * 4. Save a checkpoint every few pages
 * Then apply the complete index once more and save the final dataset.
 */

import { countMissing, countResolved } from "./apply.js";
import { LookupIndex } from "./lookup-index.js";
import {
  INITIAL_STOP_STATE,
  evaluateFailedPage,
  evaluatePage,
  type StopDecision,
  type StopState,
} from "./stop-conditions.js";
import { CrawlAbortedError } from "../../errors.js";
import { reconcileLogger } from "../../logger.js";
import { parsePage } from "../../scraper/extractor.js";

import type { Checkpointer } from "./checkpoints.js";
import type { PageFetchResult } from "../../scraper/client.js";
import type {
  CatalogRecord,
  CrawlConfig,
  StopReason,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface PageSource {
  fetchPage(page: number, pageSize: number): Promise<PageFetchResult>;
}

/**
 * Everything a run accumulates, passed from stage to stage
 */
export interface CrawlState {
  index: LookupIndex;
  records: CatalogRecord[];
  page: number;
  pagesProcessed: number;
  pagesFailed: number;
  pagesWithData: number;
  entriesIndexed: number;
  oldestYear: number | null;
  stop: StopState;
  stopReason: StopReason | null;
}

export interface CrawlProgress {
  page: number;
  endPage: number;
  indexSize: number;
  entriesOnPage: number;
  oldestYear: number | null;
  failed: boolean;
}

export interface CrawlReport {
  records: CatalogRecord[];
  missingBefore: number;
  missingAfter: number;
  filled: number;
  pagesProcessed: number;
  pagesFailed: number;
  pagesWithData: number;
  indexSize: number;
  nameCollisions: number;
  lastPage: number | null;
  stopReason: StopReason | null;
  /** Nothing to do: every record already had a code */
  upToDate: boolean;
  /** Pages were requested but none produced a single entry */
  totalExtractionFailure: boolean;
}

type ProgressCallback = (progress: CrawlProgress) => void;

function createCrawlState(records: CatalogRecord[]): CrawlState {
  return {
    index: new LookupIndex(),
    records,
    page: -1,
    pagesProcessed: 0,
    pagesFailed: 0,
    pagesWithData: 0,
    entriesIndexed: 0,
    oldestYear: null,
    stop: INITIAL_STOP_STATE,
    stopReason: null,
  };
}

// ============================================================================
// Reconcile Orchestrator
// ============================================================================

export class ReconcileOrchestrator {
  private onProgress?: ProgressCallback;

  constructor(
    private readonly source: PageSource,
    private readonly checkpointer: Checkpointer
  ) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  async run(
    records: CatalogRecord[],
    config: CrawlConfig
  ): Promise<CrawlReport> {
    const missingBefore = countMissing(records);
    const state = createCrawlState(records);

    if (missingBefore === 0) {
      reconcileLogger.info("Every record already has a code, nothing to crawl");
      return this.buildReport(state, missingBefore, 0, true);
    }

    reconcileLogger.info(
      {
        profile: config.profile,
        startPage: config.startPage,
        endPage: config.endPage,
        yearFloor: config.yearFloor,
        missing: missingBefore,
      },
      "Starting crawl"
    );

    for (let page = config.startPage; page <= config.endPage; page++) {
      let decision: StopDecision;

      try {
        decision = await this.processPage(page, state, config);

        if (!decision.stop && this.checkpointer.isDue(state.pagesProcessed)) {
          const applied = await this.checkpointer.write(
            page,
            state.records,
            state.index
          );
          state.records = applied.records;
        }
      } catch (error) {
        reconcileLogger.error(
          { page, error: error instanceof Error ? error.message : String(error) },
          "Crawl aborted"
        );
        try {
          await this.checkpointer.finish({
            status: "aborted",
            stopReason: null,
            resolvedCount: countResolved(state.records),
            missingCount: countMissing(state.records),
          });
        } catch (finishError) {
          reconcileLogger.error(
            {
              page,
              error:
                finishError instanceof Error
                  ? finishError.message
                  : String(finishError),
            },
            "Could not record the aborted run"
          );
        }
        throw new CrawlAbortedError(page, error);
      }

      if (decision.stop) {
        state.stopReason = decision.reason ?? null;
        reconcileLogger.info(
          { page, reason: state.stopReason, oldestYear: decision.oldestYear },
          "Stop condition reached"
        );
        break;
      }
    }

    const applied = await this.checkpointer.write(
      state.page,
      state.records,
      state.index
    );
    state.records = applied.records;

    const missingAfter = applied.remaining;
    await this.checkpointer.finish({
      status: "completed",
      stopReason: state.stopReason,
      resolvedCount: countResolved(state.records),
      missingCount: missingAfter,
    });

    const report = this.buildReport(state, missingBefore, missingAfter, false);
    reconcileLogger.info(
      {
        filled: report.filled,
        missing: missingAfter,
        pages: report.pagesProcessed,
        failedPages: report.pagesFailed,
        indexSize: report.indexSize,
        nameCollisions: report.nameCollisions,
      },
      "Crawl complete"
    );

    return report;
  }

  /**
   * Fetch, extract, index and evaluate one page
   */
  private async processPage(
    page: number,
    state: CrawlState,
    config: CrawlConfig
  ): Promise<StopDecision> {
    state.page = page;
    const result = await this.source.fetchPage(page, config.pageSize);
    state.pagesProcessed++;

    if (!result.ok) {
      state.pagesFailed++;
      reconcileLogger.warn(
        { page, kind: result.kind, error: result.message },
        "Skipping page after failed request"
      );
      this.onProgress?.({
        page,
        endPage: config.endPage,
        indexSize: state.index.size,
        entriesOnPage: 0,
        oldestYear: null,
        failed: true,
      });
      return evaluateFailedPage(page, state.stop, config);
    }

    const parsed = parsePage(result.body);
    const added = state.index.add(parsed.records);
    state.entriesIndexed += added;
    if (added > 0) {
      state.pagesWithData++;
    }

    const decision = evaluatePage(page, parsed, state.stop, config);
    state.stop = decision.state;
    if (decision.oldestYear !== null) {
      state.oldestYear = decision.oldestYear;
    }

    reconcileLogger.debug(
      { page, entries: added, oldestYear: decision.oldestYear },
      added > 0 ? "Indexed page" : "Page had no entries"
    );

    this.onProgress?.({
      page,
      endPage: config.endPage,
      indexSize: state.index.size,
      entriesOnPage: added,
      oldestYear: decision.oldestYear,
      failed: false,
    });

    return decision;
  }

  private buildReport(
    state: CrawlState,
    missingBefore: number,
    missingAfter: number,
    upToDate: boolean
  ): CrawlReport {
    return {
      records: state.records,
      missingBefore,
      missingAfter,
      filled: missingBefore - missingAfter,
      pagesProcessed: state.pagesProcessed,
      pagesFailed: state.pagesFailed,
      pagesWithData: state.pagesWithData,
      indexSize: state.index.size,
      nameCollisions: state.index.collisions,
      lastPage: state.page >= 0 ? state.page : null,
      stopReason: state.stopReason,
      upToDate,
      totalExtractionFailure:
        !upToDate && state.pagesProcessed > 0 && state.pagesWithData === 0,
    };
  }
}

