import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { closeDatabase, createDatabase } from "../../../../src/db/connection.js";
import { ensureSchema } from "../../../../src/db/migrate.js";
import { CrawlCheckpointService } from "../../../../src/services/reconcile/checkpoints.js";
import { planResume } from "../../../../src/services/reconcile/resume.js";
import { makeRecord } from "../../../fixtures/records.js";

import type { Database } from "../../../../src/db/schema.js";
import type { CrawlConfig, Dataset } from "../../../../src/types/index.js";
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

const input: Dataset = {
  records: [makeRecord({ name: "Input row" })],
  columns: ["name", "id"],
  idColumn: "id",
};

describe("services/reconcile/resume", () => {
  let db: Kysely<Database>;
  let service: CrawlCheckpointService;
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    db = createDatabase(":memory:");
    await ensureSchema(db);
    service = new CrawlCheckpointService(db);
    dir = mkdtempSync(join(tmpdir(), "metbull-resume-"));
    outputPath = join(dir, "out.csv");
  });

  afterEach(async () => {
    await closeDatabase(db);
    rmSync(dir, { recursive: true, force: true });
  });

  async function checkpointAt(page: number): Promise<number> {
    const runId = await service.startRun(config, outputPath);
    await service.saveCheckpoint({
      runId,
      page,
      resolvedCount: 1,
      missingCount: 0,
      indexSize: 10,
    });
    return runId;
  }

  it("should start from the input without a checkpoint", async () => {
    writeFileSync(outputPath, "name,id\nOutput row,7\n");

    const plan = await planResume(service, config, input, outputPath);

    expect(plan.resumedFrom).toBeNull();
    expect(plan.dataset).toBe(input);
    expect(plan.config.startPage).toBe(0);
  });

  it("should continue from the output file after the checkpoint page", async () => {
    const runId = await checkpointAt(9);
    writeFileSync(outputPath, "name,id\nOutput row,7\n");

    const plan = await planResume(service, config, input, outputPath);

    expect(plan.resumedFrom?.runId).toBe(runId);
    expect(plan.config.startPage).toBe(10);
    expect(plan.config.endPage).toBe(24);
    expect(plan.dataset.records.map((r) => [r.name, r.externalId])).toEqual([
      ["Output row", 7],
    ]);
  });

  it("should start over from the input when the output file is gone", async () => {
    await checkpointAt(9);

    const plan = await planResume(service, config, input, outputPath);

    expect(plan.resumedFrom).toBeNull();
    expect(plan.dataset).toBe(input);
    expect(plan.config.startPage).toBe(0);
  });
});
