import { needsCode } from "./apply.js";

import type { CatalogRecord } from "../../types/index.js";

export interface MissingSample {
  name: string;
  year: number | null;
  mass: number | null;
}

export interface MissingReport {
  total: number;
  missing: number;
  sample: MissingSample[];
  /** Missing count per year, newest years first */
  byYear: { year: number | null; count: number }[];
}

/**
 * Summarize which records still lack a code, to judge how far back the next
 * crawl has to go.
 */
export function diagnoseMissing(
  records: readonly CatalogRecord[],
  options: { sampleSize?: number; years?: number } = {}
): MissingReport {
  const { sampleSize = 20, years = 10 } = options;
  const missing = records.filter(needsCode);

  const counts = new Map<number | null, number>();
  for (const record of missing) {
    counts.set(record.year, (counts.get(record.year) ?? 0) + 1);
  }

  const byYear = [...counts.entries()]
    .map(([year, count]) => ({ year, count }))
    // Unknown years sort last
    .sort((a, b) => (b.year ?? -Infinity) - (a.year ?? -Infinity))
    .slice(0, years);

  return {
    total: records.length,
    missing: missing.length,
    sample: missing.slice(0, sampleSize).map(({ name, year, mass }) => ({
      name,
      year,
      mass,
    })),
    byYear,
  };
}
