import { DATASET_PATH } from "../../config.js";
import { loadDataset } from "../../dataset/store.js";
import { diagnoseMissing } from "../../services/reconcile/diagnose.js";
import {
  displayMissingReport,
  exitCodeFor,
  printError,
} from "../utils/display.js";

import type { Command } from "commander";

export function registerMissingCommand(program: Command): void {
  program
    .command("missing")
    .description("Show which records still lack a Bulletin code")
    .option("-i, --input <path>", "Dataset to inspect", DATASET_PATH)
    .option("-n, --sample <count>", "Sample size", "20")
    .option("-j, --json", "Output as JSON")
    .action((options: { input: string; sample: string; json?: boolean }) => {
      try {
        const dataset = loadDataset(options.input);
        const report = diagnoseMissing(dataset.records, {
          sampleSize: Number.parseInt(options.sample, 10) || 20,
        });

        if (options.json === true) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          displayMissingReport(report);
        }
      } catch (error) {
        printError(error);
        process.exitCode = exitCodeFor(error);
      }
    });
}
