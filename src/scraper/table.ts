/**
 * Full results table extraction ("Normal table" rendering).
 *
 * Headers are mapped onto the dataset layout by keyword; columns that match
 * nothing keep their lower-cased header. Cell text is kept as shown, numeric
 * cleanup is left to whoever consumes the snapshot.
 */

import * as cheerio from "cheerio";

import { COLUMNS } from "../dataset/store.js";

export const GEOLOCATION_COLUMN = "GeoLocation";
export const SNAPSHOT_ID_COLUMN = "id";

export interface ResultsTable {
  columns: string[];
  rows: Record<string, string>[];
  /** Year of every row whose year cell starts with four digits */
  years: number[];
}

const HEADER_RULES: { target: string; matches: (header: string) => boolean }[] = [
  { target: COLUMNS.name, matches: (h) => h.includes("name") && !h.includes("type") },
  { target: COLUMNS.recclass, matches: (h) => h.includes("class") || h.includes("type") },
  { target: COLUMNS.mass, matches: (h) => h.includes("mass") },
  { target: COLUMNS.year, matches: (h) => h.includes("year") || h.includes("date") },
  { target: COLUMNS.fall, matches: (h) => h.includes("fall") },
  { target: GEOLOCATION_COLUMN, matches: (h) => h.includes("co-ord") || h.includes("loc") },
];

const CODE_PATTERN = /code=(\d+)/;
const YEAR_PATTERN = /^(\d{4})\b/;

function cellText(text: string): string {
  return text.replace(/\u00a0/g, " ").trim();
}

/**
 * Map lower-cased headers to dataset columns, first matching rule wins and
 * each target is used once
 */
export function mapHeaders(headers: readonly string[]): string[] {
  const used = new Set<string>();

  return headers.map((header) => {
    const rule = HEADER_RULES.find((candidate) => candidate.matches(header));
    if (rule === undefined || used.has(rule.target)) {
      return header;
    }
    used.add(rule.target);
    return rule.target;
  });
}

/**
 * Find the results table (an innermost table whose header has a name and a
 * mass column) and read its rows. The Bulletin code of each row is taken
 * from the link in its name cell.
 */
export function extractTable(html: string): ResultsTable {
  const $ = cheerio.load(html);

  for (const table of $("table").toArray()) {
    const $table = $(table);
    if ($table.find("table").length > 0) continue;

    const [headerRow, ...dataRows] = $table.find("tr").toArray();
    if (headerRow === undefined) continue;

    const headers = $(headerRow)
      .children("th, td")
      .toArray()
      .map((cell) => cellText($(cell).text()).toLowerCase());
    const mapped = mapHeaders(headers);
    if (!mapped.includes(COLUMNS.name) || !mapped.includes(COLUMNS.mass)) {
      continue;
    }

    const nameIndex = mapped.indexOf(COLUMNS.name);
    const rows: Record<string, string>[] = [];
    const years: number[] = [];

    for (const row of dataRows) {
      const cells = $(row).children("td").toArray();
      if (cells.length === 0) continue;

      const values: Record<string, string> = {};
      mapped.forEach((column, i) => {
        const cell = cells[i];
        values[column] = cell === undefined ? "" : cellText($(cell).text());
      });
      if (Object.values(values).every((value) => value === "")) continue;

      const nameCell = cells[nameIndex];
      const href =
        nameCell === undefined
          ? undefined
          : $(nameCell).find('a[href*="code="]').attr("href");
      values[SNAPSHOT_ID_COLUMN] = href?.match(CODE_PATTERN)?.[1] ?? "";

      const year = values[COLUMNS.year]?.match(YEAR_PATTERN)?.[1];
      if (year !== undefined) {
        years.push(Number.parseInt(year, 10));
      }

      rows.push(values);
    }

    const columns = mapped.includes(SNAPSHOT_ID_COLUMN)
      ? mapped
      : [...mapped, SNAPSHOT_ID_COLUMN];
    return { columns, rows, years };
  }

  return { columns: [], rows: [], years: [] };
}
