import type { CatalogRecord } from "../../types/index.js";

/** Flag the Bulletin appends to provisional (unapproved) names */
const UNVERIFIED_MARKER = /\*/g;

/**
 * Key for the exact-match tier
 */
export function exactKey(name: string): string {
  return name.trim();
}

/**
 * Key for the case-insensitive tier
 */
export function compareKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Remove unverified-name markers from a stored name
 */
export function cleanDisplayName(name: string): string {
  return name.replace(UNVERIFIED_MARKER, "").trim();
}

/**
 * Clean every name in a dataset. Runs once, before any matching.
 */
export function cleanDatasetNames(records: readonly CatalogRecord[]): {
  records: CatalogRecord[];
  changed: number;
} {
  let changed = 0;

  const cleaned = records.map((record) => {
    const name = cleanDisplayName(record.name);
    if (name === record.name) {
      return record;
    }
    changed++;
    return { ...record, name };
  });

  return { records: cleaned, changed };
}
