/**
 * Dataset file I/O.
 *
 * The catalog is a CSV in the layout of the NASA "Meteorite Landings"
 * export. Cells are written back exactly as they were read, in the same
 * column order; only the name and the code column can differ.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { DatasetFormatError, LocalFileMissingError } from "../errors.js";
import { datasetLogger } from "../logger.js";

import type {
  CatalogRecord,
  Dataset,
  FallStatus,
} from "../types/index.js";

// ============================================================================
// Column Layout
// ============================================================================

export const COLUMNS = {
  name: "name",
  recclass: "recclass",
  mass: "mass (g)",
  fall: "fall",
  year: "year",
  lat: "reclat",
  long: "reclong",
} as const;

const ID_COLUMNS = ["id", "externalId"] as const;
const DEFAULT_ID_COLUMN = "id";

/** Written in place of an unresolved code so the file keeps its schema */
export const UNRESOLVED_SENTINEL = "0";

// ============================================================================
// Cell Parsing
// ============================================================================

function parseNumber(cell: string | undefined): number | null {
  if (cell === undefined) return null;
  const trimmed = cell.trim();
  if (trimmed === "") return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * `0`, blank and non-numeric cells all mean "not resolved yet"
 */
export function parseExternalId(cell: string | undefined): number | null {
  const value = parseNumber(cell);
  if (value === null || value <= 0 || !Number.isInteger(value)) {
    return null;
  }
  return value;
}

function parseYear(cell: string | undefined): number | null {
  const numeric = parseNumber(cell);
  if (numeric !== null) {
    return Math.trunc(numeric);
  }
  // Older exports store a timestamp such as "01/01/1880 12:00:00 AM"
  const year = cell?.match(/\b(\d{4})\b/)?.[1];
  return year !== undefined ? Number.parseInt(year, 10) : null;
}

function parseFall(cell: string | undefined): FallStatus {
  return cell?.trim().toLowerCase() === "fell" ? "Fell" : "Found";
}

function formatNumber(value: number | null): string {
  return value === null ? "" : String(value);
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) =>
        Array.isArray(row) && row.every((cell) => typeof cell === "string")
    )
  );
}

// ============================================================================
// Parse / Serialize
// ============================================================================

/**
 * Build a record from one row of cells. The parsed fields are for matching
 * and reporting; `cells` keeps the text that gets written back.
 */
export function recordFromCells(
  cells: Record<string, string>,
  idColumn: string
): CatalogRecord {
  return {
    name: cells[COLUMNS.name]?.trim() ?? "",
    externalId: parseExternalId(cells[idColumn]),
    recclass: cells[COLUMNS.recclass] ?? "",
    mass: parseNumber(cells[COLUMNS.mass]),
    fall: parseFall(cells[COLUMNS.fall]),
    year: parseYear(cells[COLUMNS.year]),
    lat: parseNumber(cells[COLUMNS.lat]),
    long: parseNumber(cells[COLUMNS.long]),
    cells,
  };
}

export function parseDataset(content: string): Dataset {
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!isStringMatrix(parsed)) {
    throw new DatasetFormatError("Dataset is not a CSV table");
  }

  const [header, ...rows] = parsed;
  if (header === undefined) {
    throw new DatasetFormatError("Dataset has no header row");
  }

  const columns = header.map((column) => column.trim());
  if (!columns.includes(COLUMNS.name)) {
    throw new DatasetFormatError(
      `Dataset has no "${COLUMNS.name}" column (found: ${columns.join(", ")})`
    );
  }

  let idColumn = ID_COLUMNS.find((column) => columns.includes(column));
  if (idColumn === undefined) {
    idColumn = DEFAULT_ID_COLUMN;
    columns.push(idColumn);
  }

  // Rows without a name stay in the file; matching skips them
  const records = rows.map((row) => {
    const cells: Record<string, string> = {};
    columns.forEach((column, i) => {
      cells[column] = row[i] ?? "";
    });
    return recordFromCells(cells, idColumn);
  });

  return { records, columns, idColumn };
}

function formattedField(record: CatalogRecord, column: string): string {
  switch (column) {
    case COLUMNS.recclass:
      return record.recclass;
    case COLUMNS.mass:
      return formatNumber(record.mass);
    case COLUMNS.fall:
      return record.fall;
    case COLUMNS.year:
      return formatNumber(record.year);
    case COLUMNS.lat:
      return formatNumber(record.lat);
    case COLUMNS.long:
      return formatNumber(record.long);
    default:
      return "";
  }
}

function cellFor(
  record: CatalogRecord,
  column: string,
  idColumn: string
): string {
  if (column === idColumn) {
    return record.externalId === null
      ? UNRESOLVED_SENTINEL
      : String(record.externalId);
  }

  const raw = record.cells[column];

  if (column === COLUMNS.name) {
    return raw !== undefined && raw.trim() === record.name ? raw : record.name;
  }

  if (raw !== undefined) return raw;
  // Only records built in memory carry no cells at all
  return Object.keys(record.cells).length === 0
    ? formattedField(record, column)
    : "";
}

export function serializeDataset(dataset: Dataset): string {
  const rows = dataset.records.map((record) =>
    dataset.columns.map((column) => cellFor(record, column, dataset.idColumn))
  );
  return stringify([dataset.columns, ...rows]);
}

// ============================================================================
// Files
// ============================================================================

export function loadDataset(filePath: string): Dataset {
  if (!existsSync(filePath)) {
    throw new LocalFileMissingError(filePath);
  }

  const dataset = parseDataset(readFileSync(filePath, "utf-8"));
  datasetLogger.info(
    { filePath, records: dataset.records.length },
    "Loaded dataset"
  );
  return dataset;
}

/**
 * Overwrite the dataset file. Not atomic: a crash mid-write can leave a
 * truncated file behind.
 */
export function saveDataset(filePath: string, dataset: Dataset): void {
  const dir = dirname(filePath);
  if (dir !== "." && !existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(filePath, serializeDataset(dataset), "utf-8");
  datasetLogger.debug(
    { filePath, records: dataset.records.length },
    "Saved dataset"
  );
}
