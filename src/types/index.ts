// Meteorite catalog types
// Column names follow the NASA "Meteorite Landings" export the catalog started from

// =====================
// Catalog Records
// =====================

export type FallStatus = "Fell" | "Found";

/**
 * One physical fall or find.
 *
 * `externalId` is the Meteoritical Bulletin code. `null` means the code has
 * not been resolved yet; once set it is never replaced.
 */
export interface CatalogRecord {
  name: string;
  externalId: number | null;
  recclass: string;
  /** Mass in grams, `null` when the cell is blank or not numeric */
  mass: number | null;
  fall: FallStatus;
  year: number | null;
  lat: number | null;
  long: number | null;
  /**
   * Every cell as read, keyed by header. Saves write these back verbatim so
   * only the name and the code can change.
   */
  cells: Record<string, string>;
}

/**
 * A loaded dataset file: records plus the header layout needed to write it
 * back unchanged.
 */
export interface Dataset {
  records: CatalogRecord[];
  columns: string[];
  /** Header used for the identifier column ("id" or "externalId") */
  idColumn: string;
}

// =====================
// Scraped Data
// =====================

/**
 * One anchor scraped from a Bulletin results page
 */
export interface ScrapedEntry {
  externalId: number;
  rawName: string;
}

export interface ParsedPage {
  records: ScrapedEntry[];
  /** 4-digit years found in table cells anywhere on the page */
  years: number[];
}

// =====================
// Crawl Configuration
// =====================

export interface CrawlConfig {
  profile: string;
  startPage: number;
  /** Inclusive */
  endPage: number;
  pageSize: number;
  /** Stop once the oldest year on a page is below this value */
  yearFloor: number | null;
  /** Consecutive empty pages that end the crawl */
  emptyPageLimit: number;
  delayMs: number;
  /** Pages between intermediate saves, 0 disables them */
  checkpointEvery: number;
}

export type StopReason = "empty-pages" | "year-floor" | "page-limit";

// =====================
// Snapshot Configuration
// =====================

export interface SnapshotConfig {
  startPage: number;
  /** Inclusive */
  endPage: number;
  pageSize: number;
  /** Stop after a page whose newest year is below this value */
  sinceYear: number;
  delayMs: number;
  /** `pnt` value that makes the Bulletin render the full table */
  renderHint: string;
}
