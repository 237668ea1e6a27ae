/**
 * Dataset merge - survivorship by name
 *
 * Base and incremental snapshots are concatenated and one whole record is
 * kept per name. Records are ranked by latitude: one with a latitude beats
 * one without, the lower latitude wins between two that have one, and only
 * equal ranks fall back to the earlier record (base before incremental).
 * Fields of the losing record are dropped, even ones the winner lacks.
 */

import { datasetLogger } from "../../logger.js";

import type { CatalogRecord, Dataset } from "../../types/index.js";

export interface MergeResult {
  records: CatalogRecord[];
  total: number;
  duplicatesCollapsed: number;
  /** Survivors with a latitude */
  withCoordinates: number;
}

export function hasLatitude(record: CatalogRecord): boolean {
  return record.lat !== null && Number.isFinite(record.lat);
}

// Missing latitudes sort last
function latitudeRank(record: CatalogRecord): number {
  return record.lat !== null && Number.isFinite(record.lat)
    ? record.lat
    : Number.POSITIVE_INFINITY;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareLatitude(a: CatalogRecord, b: CatalogRecord): number {
  const left = latitudeRank(a);
  const right = latitudeRank(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Merge two record collections, one survivor per name, sorted by name
 */
export function mergeRecords(
  base: readonly CatalogRecord[],
  incremental: readonly CatalogRecord[]
): MergeResult {
  const ranked = [...base, ...incremental]
    .map((record, order) => ({ record, order, name: record.name.trim() }))
    .filter((entry) => entry.name !== "");

  ranked.sort(
    (a, b) =>
      compareNames(a.name, b.name) ||
      compareLatitude(a.record, b.record) ||
      a.order - b.order
  );

  const survivors: CatalogRecord[] = [];
  let previousName: string | undefined;

  for (const entry of ranked) {
    if (entry.name === previousName) continue;
    previousName = entry.name;
    survivors.push(
      entry.record.name === entry.name
        ? entry.record
        : { ...entry.record, name: entry.name }
    );
  }

  const result: MergeResult = {
    records: survivors,
    total: survivors.length,
    duplicatesCollapsed: ranked.length - survivors.length,
    withCoordinates: survivors.filter(hasLatitude).length,
  };

  datasetLogger.info(
    {
      base: base.length,
      incremental: incremental.length,
      total: result.total,
      duplicatesCollapsed: result.duplicatesCollapsed,
    },
    "Merged datasets"
  );

  return result;
}

/**
 * Merge two loaded files. The output keeps the base layout, with columns
 * only the incremental file has appended at the end.
 */
export function mergeDatasets(
  base: Dataset,
  incremental: Dataset
): { dataset: Dataset; result: MergeResult } {
  const columns = [...base.columns];
  for (const column of incremental.columns) {
    if (column === incremental.idColumn) continue;
    if (!columns.includes(column)) columns.push(column);
  }

  const result = mergeRecords(base.records, incremental.records);
  return {
    dataset: { records: result.records, columns, idColumn: base.idColumn },
    result,
  };
}
