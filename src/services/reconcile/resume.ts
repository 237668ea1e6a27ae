import { existsSync } from "node:fs";

import { loadDataset } from "../../dataset/store.js";
import { reconcileLogger } from "../../logger.js";

import type { CheckpointInfo, CrawlCheckpointService } from "./checkpoints.js";
import type { CrawlConfig, Dataset } from "../../types/index.js";

export interface ResumePlan {
  dataset: Dataset;
  config: CrawlConfig;
  /** Checkpoint the crawl continues from, null for a fresh start */
  resumedFrom: CheckpointInfo | null;
}

/**
 * Decide where a resumed crawl starts.
 *
 * With a checkpoint and its output file on disk, the crawl reads the output
 * (it holds the codes found so far) and starts on the page after the
 * checkpoint. Otherwise it starts over from the input dataset. A plan whose
 * `startPage` is past `endPage` means the previous run already covered the
 * whole range.
 */
export async function planResume(
  service: CrawlCheckpointService,
  config: CrawlConfig,
  input: Dataset,
  outputPath: string
): Promise<ResumePlan> {
  const fresh: ResumePlan = { dataset: input, config, resumedFrom: null };

  const checkpoint = await service.getResumePoint(config.profile, outputPath);
  if (checkpoint === null) {
    reconcileLogger.info({ profile: config.profile, outputPath }, "No checkpoint to resume from");
    return fresh;
  }

  if (!existsSync(outputPath)) {
    reconcileLogger.warn(
      { outputPath, page: checkpoint.page },
      "Checkpoint found but its output file is gone, starting over"
    );
    return fresh;
  }

  return {
    dataset: loadDataset(outputPath),
    config: { ...config, startPage: checkpoint.page + 1 },
    resumedFrom: checkpoint,
  };
}
