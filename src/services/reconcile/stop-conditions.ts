/**
 * Crawl stop heuristics.
 *
 * The Bulletin never says "last page", so a session ends when pages come
 * back empty or, since results are sorted newest first, once a page reaches
 * years older than the configured floor.
 */

import { minYear } from "../../scraper/extractor.js";

import type { CrawlConfig, ParsedPage, StopReason } from "../../types/index.js";

export interface StopState {
  consecutiveEmpty: number;
}

export interface StopDecision {
  stop: boolean;
  reason?: StopReason;
  /** Oldest year seen on the page, when any */
  oldestYear: number | null;
  state: StopState;
}

export type StopSettings = Pick<
  CrawlConfig,
  "emptyPageLimit" | "yearFloor" | "endPage"
>;

export const INITIAL_STOP_STATE: StopState = { consecutiveEmpty: 0 };

/**
 * Evaluate a successfully fetched page
 */
export function evaluatePage(
  page: number,
  parsed: ParsedPage,
  state: StopState,
  settings: StopSettings
): StopDecision {
  const oldestYear = minYear(parsed.years);

  if (parsed.records.length === 0) {
    const next = { consecutiveEmpty: state.consecutiveEmpty + 1 };
    if (next.consecutiveEmpty >= settings.emptyPageLimit) {
      return { stop: true, reason: "empty-pages", oldestYear, state: next };
    }
    return pageLimitDecision(page, oldestYear, next, settings);
  }

  const next = { consecutiveEmpty: 0 };

  if (
    settings.yearFloor !== null &&
    oldestYear !== null &&
    oldestYear < settings.yearFloor
  ) {
    return { stop: true, reason: "year-floor", oldestYear, state: next };
  }

  return pageLimitDecision(page, oldestYear, next, settings);
}

/**
 * Evaluate a page whose fetch failed. Failures say nothing about the
 * source, so the empty-page streak is left alone.
 */
export function evaluateFailedPage(
  page: number,
  state: StopState,
  settings: StopSettings
): StopDecision {
  return pageLimitDecision(page, null, state, settings);
}

function pageLimitDecision(
  page: number,
  oldestYear: number | null,
  state: StopState,
  settings: StopSettings
): StopDecision {
  if (page >= settings.endPage) {
    return { stop: true, reason: "page-limit", oldestYear, state };
  }
  return { stop: false, oldestYear, state };
}
