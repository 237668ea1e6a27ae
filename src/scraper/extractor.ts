/**
 * Results page extraction.
 *
 * Bulletin result pages are plain HTML tables. Each meteorite name is an
 * anchor whose href carries the numeric code (`metbull.php?code=12345`).
 * Years sit in their own cells but cannot be tied back to a specific anchor,
 * so they are reported per page.
 */

import * as cheerio from "cheerio";

import { catalogLogger } from "../logger.js";

import type { ParsedPage, ScrapedEntry } from "../types/index.js";

const ANCHOR_PATTERN = /code=(\d+)[^>]*>(.*?)<\/a>/gi;
const YEAR_CELL_PATTERN = /^\d{4}$/;

/**
 * Strip markup and decode entities from a captured anchor body
 */
export function cleanAnchorText(fragment: string): string {
  const text = cheerio.load(fragment, null, false).text();
  return text.replace(/\u00a0/g, " ").trim();
}

/**
 * Extract (code, name) pairs in page order
 */
export function extractRecords(html: string): ScrapedEntry[] {
  const entries: ScrapedEntry[] = [];

  for (const match of html.matchAll(ANCHOR_PATTERN)) {
    const [, code, body] = match;
    if (code === undefined || body === undefined) continue;

    const rawName = cleanAnchorText(body);
    if (rawName === "") continue;

    entries.push({ externalId: Number.parseInt(code, 10), rawName });
  }

  return entries;
}

/**
 * Collect every table cell whose whole text is a 4-digit year
 */
export function extractYearTokens(html: string): number[] {
  const $ = cheerio.load(html);
  const years: number[] = [];

  $("td").each((_, cell) => {
    const $cell = $(cell);
    if ($cell.children().length > 0) return;

    const text = $cell.text().trim();
    if (YEAR_CELL_PATTERN.test(text)) {
      years.push(Number.parseInt(text, 10));
    }
  });

  return years;
}

/**
 * Parse a results page. A body that cannot be parsed counts as a page with
 * no records.
 */
export function parsePage(html: string): ParsedPage {
  try {
    return { records: extractRecords(html), years: extractYearTokens(html) };
  } catch (error) {
    catalogLogger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Could not parse results page, treating it as empty"
    );
    return { records: [], years: [] };
  }
}

export function minYear(years: readonly number[]): number | null {
  return years.length === 0 ? null : Math.min(...years);
}
