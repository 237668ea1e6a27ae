import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { closeDatabase, createDatabase } from "../../../../src/db/connection.js";
import { ensureSchema } from "../../../../src/db/migrate.js";
import {
  Checkpointer,
  CrawlCheckpointService,
} from "../../../../src/services/reconcile/checkpoints.js";
import { LookupIndex } from "../../../../src/services/reconcile/lookup-index.js";
import { makeRecord } from "../../../fixtures/records.js";

import type { Database } from "../../../../src/db/schema.js";
import type { CrawlConfig } from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

const config: CrawlConfig = {
  profile: "recent",
  startPage: 0,
  endPage: 24,
  pageSize: 500,
  yearFloor: null,
  emptyPageLimit: 1,
  delayMs: 0,
  checkpointEvery: 10,
};

const DATASET_FILE = "data/Meteorite_Landings.csv";

describe("services/reconcile/checkpoints", () => {
  let db: Kysely<Database>;
  let service: CrawlCheckpointService;

  beforeEach(async () => {
    db = createDatabase(":memory:");
    await ensureSchema(db);
    service = new CrawlCheckpointService(db);
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  describe("CrawlCheckpointService", () => {
    it("should record a running crawl", async () => {
      const runId = await service.startRun(config, DATASET_FILE);
      const [run] = await service.listRuns();

      expect(run?.id).toBe(runId);
      expect(run?.profile).toBe("recent");
      expect(run?.status).toBe("running");
      expect(run?.start_page).toBe(0);
      expect(run?.end_page).toBe(24);
      expect(run?.finished_at).toBeNull();
      expect(run?.last_page).toBeNull();
      expect(run?.checkpoint_count).toBe(0);
    });

    it("should update run counts with each checkpoint", async () => {
      const runId = await service.startRun(config, DATASET_FILE);
      await service.saveCheckpoint({
        runId,
        page: 9,
        resolvedCount: 40,
        missingCount: 2,
        indexSize: 5000,
      });

      const [run] = await service.listRuns();
      expect(run?.resolved_count).toBe(40);
      expect(run?.missing_count).toBe(2);
      expect(run?.checkpoint_count).toBe(1);
      expect(run?.last_page).toBe(9);
    });

    it("should mark a run as finished", async () => {
      const runId = await service.startRun(config, DATASET_FILE);
      await service.finishRun(runId, {
        status: "completed",
        stopReason: "empty-pages",
        resolvedCount: 42,
        missingCount: 0,
      });

      const [run] = await service.listRuns();
      expect(run?.status).toBe("completed");
      expect(run?.stop_reason).toBe("empty-pages");
      expect(run?.finished_at).not.toBeNull();
    });

    it("should list the newest runs first", async () => {
      const first = await service.startRun(config, DATASET_FILE);
      const second = await service.startRun(config, DATASET_FILE);

      const runs = await service.listRuns(1);
      expect(runs.map((run) => run.id)).toEqual([second]);
      expect(second).toBeGreaterThan(first);
    });

    describe("getResumePoint", () => {
      it("should return null without checkpoints", async () => {
        await service.startRun(config, DATASET_FILE);
        expect(await service.getResumePoint("recent", DATASET_FILE)).toBeNull();
      });

      it("should return the latest checkpoint of an unfinished run", async () => {
        const runId = await service.startRun(config, DATASET_FILE);
        await service.saveCheckpoint({
          runId,
          page: 9,
          resolvedCount: 10,
          missingCount: 5,
          indexSize: 100,
        });
        await service.saveCheckpoint({
          runId,
          page: 19,
          resolvedCount: 12,
          missingCount: 3,
          indexSize: 200,
        });

        const point = await service.getResumePoint("recent", DATASET_FILE);
        expect(point).toMatchObject({
          runId,
          page: 19,
          resolvedCount: 12,
          missingCount: 3,
          indexSize: 200,
        });
      });

      it("should ignore runs that completed since", async () => {
        const runId = await service.startRun(config, DATASET_FILE);
        await service.saveCheckpoint({
          runId,
          page: 9,
          resolvedCount: 10,
          missingCount: 5,
          indexSize: 100,
        });
        await service.finishRun(runId, {
          status: "completed",
          stopReason: "page-limit",
          resolvedCount: 15,
          missingCount: 0,
        });

        expect(await service.getResumePoint("recent", DATASET_FILE)).toBeNull();
      });

      it("should only match the same profile and dataset", async () => {
        const runId = await service.startRun(config, DATASET_FILE);
        await service.saveCheckpoint({
          runId,
          page: 9,
          resolvedCount: 10,
          missingCount: 5,
          indexSize: 100,
        });

        expect(await service.getResumePoint("deep", DATASET_FILE)).toBeNull();
        expect(await service.getResumePoint("recent", "other.csv")).toBeNull();
      });
    });
  });

  describe("Checkpointer", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "metbull-checkpoint-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should be due every N pages", () => {
      const checkpointer = new Checkpointer({
        outputPath: join(dir, "out.csv"),
        every: 10,
        dataset: { columns: ["name", "id"], idColumn: "id" },
      });

      expect(checkpointer.isDue(0)).toBe(false);
      expect(checkpointer.isDue(5)).toBe(false);
      expect(checkpointer.isDue(10)).toBe(true);
      expect(checkpointer.isDue(20)).toBe(true);
    });

    it("should never be due when disabled", () => {
      const checkpointer = new Checkpointer({
        outputPath: join(dir, "out.csv"),
        every: 0,
        dataset: { columns: ["name", "id"], idColumn: "id" },
      });

      expect(checkpointer.isDue(10)).toBe(false);
    });

    it("should write the applied dataset and record the checkpoint", async () => {
      const outputPath = join(dir, "out.csv");
      const runId = await service.startRun(config, outputPath);
      const checkpointer = new Checkpointer({
        outputPath,
        every: 10,
        dataset: { columns: ["name", "id"], idColumn: "id" },
        service,
        runId,
      });
      const index = new LookupIndex();
      index.add([{ externalId: 1234, rawName: "NWA 869" }]);

      const applied = await checkpointer.write(
        9,
        [makeRecord({ name: "NWA 869" }), makeRecord({ name: "Unknown" })],
        index
      );

      expect(applied.filled).toBe(1);
      expect(readFileSync(outputPath, "utf-8")).toBe(
        "name,id\nNWA 869,1234\nUnknown,0\n"
      );

      const point = await service.getResumePoint("recent", outputPath);
      expect(point).toMatchObject({
        runId,
        page: 9,
        resolvedCount: 1,
        missingCount: 1,
        indexSize: 1,
      });
    });

    it("should write without a checkpoint service", async () => {
      const outputPath = join(dir, "nested", "out.csv");
      const checkpointer = new Checkpointer({
        outputPath,
        every: 1,
        dataset: { columns: ["name", "id"], idColumn: "id" },
      });

      await checkpointer.write(0, [makeRecord({ name: "Hoba", externalId: 7 })], new LookupIndex());
      await checkpointer.finish({
        status: "completed",
        stopReason: null,
        resolvedCount: 1,
        missingCount: 0,
      });

      expect(readFileSync(outputPath, "utf-8")).toBe("name,id\nHoba,7\n");
    });
  });
});
