import ora from "ora";

import { loadDataset, saveDataset } from "../../dataset/store.js";
import { mergeDatasets } from "../../services/merge/merger.js";
import { displayMergeResult, exitCodeFor, printError } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Merge Command
// ============================================================================

export function registerMergeCommand(program: Command): void {
  program
    .command("merge <base> <incremental>")
    .description(
      "Merge a newly scraped snapshot into the base dataset, one record per name"
    )
    .option("-o, --output <path>", "Merged dataset path", "Meteorite_Landings_Updated.csv")
    .action(
      (basePath: string, incrementalPath: string, options: { output: string }) => {
        const spinner = ora("Loading datasets...").start();

        try {
          const base = loadDataset(basePath);
          const incremental = loadDataset(incrementalPath);

          spinner.text = `Merging ${String(base.records.length)} + ${String(incremental.records.length)} records...`;
          const { dataset, result } = mergeDatasets(base, incremental);
          saveDataset(options.output, dataset);

          spinner.succeed("Datasets merged");
          displayMergeResult(result, options.output);
        } catch (error) {
          spinner.fail("Merge failed");
          printError(error);
          process.exitCode = exitCodeFor(error);
        }
      }
    );
}
