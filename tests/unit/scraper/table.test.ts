import { describe, it, expect } from "vitest";

import { extractTable, mapHeaders } from "../../../src/scraper/table.js";
import { EMPTY_PAGE, fullTablePage } from "../../fixtures/pages.js";

describe("scraper/table", () => {
  describe("mapHeaders", () => {
    it("should map headers onto dataset columns by keyword", () => {
      expect(
        mapHeaders(["name", "status", "year", "place", "type", "mass", "fall", "co-ordinates"])
      ).toEqual(["name", "status", "year", "place", "recclass", "mass (g)", "fall", "GeoLocation"]);
    });

    it("should not treat a name type header as the name", () => {
      expect(mapHeaders(["name type"])).toEqual(["recclass"]);
    });

    it("should map each target once", () => {
      expect(mapHeaders(["class", "type"])).toEqual(["recclass", "type"]);
    });

    it("should map date and location headers", () => {
      expect(mapHeaders(["date", "location"])).toEqual(["year", "GeoLocation"]);
    });
  });

  describe("extractTable", () => {
    it("should read every row of the results table as shown", () => {
      const html = fullTablePage([
        {
          code: 57150,
          name: "Aba Panu",
          year: "2018",
          type: "L3",
          mass: "160 kg",
          fall: "Y",
          coords: "7°58'N, 3°20'E",
        },
        { code: 57165, name: "Northwest Africa 12000", year: "2017", type: "H5", mass: "1.2 g" },
      ]);

      const table = extractTable(html);

      expect(table.columns).toEqual([
        "name",
        "status",
        "year",
        "place",
        "recclass",
        "mass (g)",
        "fall",
        "GeoLocation",
        "id",
      ]);
      expect(table.rows).toEqual([
        {
          name: "Aba Panu",
          status: "Official",
          year: "2018",
          place: "Somewhere",
          recclass: "L3",
          "mass (g)": "160 kg",
          fall: "Y",
          GeoLocation: "7°58'N, 3°20'E",
          id: "57150",
        },
        {
          name: "Northwest Africa 12000",
          status: "Official",
          year: "2017",
          place: "Somewhere",
          recclass: "H5",
          "mass (g)": "1.2 g",
          fall: "",
          GeoLocation: "",
          id: "57165",
        },
      ]);
      expect(table.years).toEqual([2018, 2017]);
    });

    it("should decode entities in cells", () => {
      const table = extractTable(
        fullTablePage([{ code: 1, name: "Kalahari&nbsp;008", year: "2008", type: "Lunar", mass: "13.5 kg" }])
      );
      expect(table.rows[0]?.name).toBe("Kalahari 008");
    });

    it("should return no rows when the page has no results table", () => {
      expect(extractTable(EMPTY_PAGE)).toEqual({ columns: [], rows: [], years: [] });
    });

    it("should return no rows for a results table without data rows", () => {
      const table = extractTable(fullTablePage([]));
      expect(table.rows).toEqual([]);
      expect(table.columns).toContain("id");
    });
  });
});
