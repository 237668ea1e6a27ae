/**
 * Identifier backfill.
 *
 * Only records without a code are looked up, so applying a growing index
 * again and again can fill gaps but never changes a code already present.
 * Rows without a name are carried through untouched.
 */

import type { LookupIndex } from "./lookup-index.js";
import type { CatalogRecord } from "../../types/index.js";

export interface ApplyResult {
  records: CatalogRecord[];
  /** Codes filled by this application */
  filled: number;
  /** Named records still without a code */
  remaining: number;
}

export function isResolved(record: CatalogRecord): boolean {
  return record.externalId !== null;
}

/** Unresolved and matchable by name */
export function needsCode(record: CatalogRecord): boolean {
  return !isResolved(record) && record.name.trim() !== "";
}

export function countResolved(records: readonly CatalogRecord[]): number {
  return records.filter(isResolved).length;
}

export function countMissing(records: readonly CatalogRecord[]): number {
  return records.filter(needsCode).length;
}

export function applyLookup(
  records: readonly CatalogRecord[],
  index: LookupIndex
): ApplyResult {
  let filled = 0;
  let remaining = 0;

  const updated = records.map((record) => {
    if (!needsCode(record)) {
      return record;
    }

    const externalId = index.lookup(record.name);
    if (externalId === undefined) {
      remaining++;
      return record;
    }

    filled++;
    return { ...record, externalId };
  });

  return { records: updated, filled, remaining };
}
