import { describe, it, expect } from "vitest";

import {
  hasLatitude,
  mergeDatasets,
  mergeRecords,
} from "../../../../src/services/merge/merger.js";
import { makeRecord } from "../../../fixtures/records.js";

describe("services/merge/merger", () => {
  describe("hasLatitude", () => {
    it("should only look at the latitude", () => {
      expect(hasLatitude(makeRecord({ lat: -19.58, long: null }))).toBe(true);
      expect(hasLatitude(makeRecord({ lat: null, long: 17.91667 }))).toBe(false);
    });

    it("should treat zero as a usable latitude", () => {
      expect(hasLatitude(makeRecord({ lat: 0 }))).toBe(true);
    });
  });

  describe("mergeRecords", () => {
    const withoutCoords = makeRecord({ name: "Tissint", externalId: 1, mass: 7000 });
    const withCoords = makeRecord({
      name: "Tissint",
      externalId: 2,
      lat: 29.48,
      long: -7.61,
    });

    it("should prefer the record with coordinates from the incremental file", () => {
      const result = mergeRecords([withoutCoords], [withCoords]);

      expect(result.records).toEqual([withCoords]);
      expect(result.duplicatesCollapsed).toBe(1);
    });

    it("should prefer the record with coordinates from the base file", () => {
      const result = mergeRecords([withCoords], [withoutCoords]);
      expect(result.records).toEqual([withCoords]);
    });

    it("should keep the record with a latitude whichever file it comes from", () => {
      const noLatitude = makeRecord({ name: "Hoba", lat: null });
      const latitude = makeRecord({ name: "Hoba", lat: -19.58 });

      expect(mergeRecords([noLatitude], [latitude]).records[0]?.lat).toBe(-19.58);
      expect(mergeRecords([latitude], [noLatitude]).records[0]?.lat).toBe(-19.58);
    });

    it("should keep the lower latitude whichever file it comes from", () => {
      const north = makeRecord({ name: "Hoba", externalId: 1, lat: 12.5, long: 3 });
      const south = makeRecord({ name: "Hoba", externalId: 2, lat: -19.58, long: 17.91667 });

      expect(mergeRecords([north], [south]).records[0]?.externalId).toBe(2);
      expect(mergeRecords([south], [north]).records[0]?.externalId).toBe(2);
    });

    it("should keep the base record when neither has a latitude", () => {
      const base = makeRecord({ name: "Hoba", externalId: 1 });
      const incremental = makeRecord({ name: "Hoba", externalId: 2 });

      expect(mergeRecords([base], [incremental]).records).toEqual([base]);
    });

    it("should keep the base record when latitudes are equal", () => {
      const base = makeRecord({ name: "Hoba", externalId: 1, lat: -19.58 });
      const incremental = makeRecord({ name: "Hoba", externalId: 2, lat: -19.58 });

      expect(mergeRecords([base], [incremental]).records).toEqual([base]);
    });

    it("should drop fields of the losing record", () => {
      const winner = { ...withCoords, mass: null };
      const result = mergeRecords([withoutCoords], [winner]);

      expect(result.records[0]?.mass).toBeNull();
    });

    it("should collapse duplicates within a single file", () => {
      const result = mergeRecords(
        [makeRecord({ name: "Hoba", externalId: 1 }), makeRecord({ name: "Hoba", externalId: 2 })],
        []
      );

      expect(result.records.map((r) => r.externalId)).toEqual([1]);
    });

    it("should match names after trimming and write the trimmed name", () => {
      const result = mergeRecords(
        [makeRecord({ name: "Gibeon " })],
        [makeRecord({ name: "Gibeon", lat: -25.5, long: 18 })]
      );

      expect(result.total).toBe(1);
      expect(result.records[0]?.name).toBe("Gibeon");
      expect(result.records[0]?.lat).toBe(-25.5);
    });

    it("should sort the output by name and count coordinates", () => {
      const result = mergeRecords(
        [makeRecord({ name: "Zagami", lat: 11.7, long: 7.1 }), makeRecord({ name: "Allende" })],
        [makeRecord({ name: "Murchison" })]
      );

      expect(result.records.map((r) => r.name)).toEqual(["Allende", "Murchison", "Zagami"]);
      expect(result.total).toBe(3);
      expect(result.withCoordinates).toBe(1);
      expect(result.duplicatesCollapsed).toBe(0);
    });

    it("should drop records without a name", () => {
      const result = mergeRecords([makeRecord({ name: "  " })], [makeRecord({ name: "Hoba" })]);
      expect(result.records.map((r) => r.name)).toEqual(["Hoba"]);
    });
  });

  describe("mergeDatasets", () => {
    it("should keep the base layout and append new incremental columns", () => {
      const { dataset } = mergeDatasets(
        {
          records: [makeRecord({ name: "Hoba" })],
          columns: ["name", "id", "year"],
          idColumn: "id",
        },
        {
          records: [makeRecord({ name: "Gibeon" })],
          columns: ["name", "externalId", "year", "GeoLocation"],
          idColumn: "externalId",
        }
      );

      expect(dataset.columns).toEqual(["name", "id", "year", "GeoLocation"]);
      expect(dataset.idColumn).toBe("id");
      expect(dataset.records.map((r) => r.name)).toEqual(["Gibeon", "Hoba"]);
    });
  });
});
