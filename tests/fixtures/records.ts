import type { CatalogRecord } from "../../src/types/index.js";

export function makeRecord(overrides: Partial<CatalogRecord> = {}): CatalogRecord {
  return {
    name: "Aachen",
    externalId: null,
    recclass: "L5",
    mass: 21,
    fall: "Fell",
    year: 1880,
    lat: null,
    long: null,
    cells: {},
    ...overrides,
  };
}
