import ora from "ora";

import { DATASET_PATH } from "../../config.js";
import { loadDataset, saveDataset } from "../../dataset/store.js";
import { cleanDatasetNames } from "../../services/reconcile/names.js";
import { exitCodeFor, printError } from "../utils/display.js";

import type { Command } from "commander";

export function registerCleanNamesCommand(program: Command): void {
  program
    .command("clean-names")
    .description("Strip unverified-name markers (*) from dataset names in place")
    .option("-i, --input <path>", "Dataset to clean", DATASET_PATH)
    .option("--dry-run", "Report the count without writing")
    .action((options: { input: string; dryRun?: boolean }) => {
      const spinner = ora("Cleaning names...").start();

      try {
        const dataset = loadDataset(options.input);
        const { records, changed } = cleanDatasetNames(dataset.records);

        if (changed === 0) {
          spinner.succeed("No names needed cleaning");
          return;
        }

        if (options.dryRun === true) {
          spinner.info(`${String(changed)} names would be cleaned`);
          return;
        }

        saveDataset(options.input, { ...dataset, records });
        spinner.succeed(`Cleaned ${String(changed)} names in ${options.input}`);
      } catch (error) {
        spinner.fail("Cleaning failed");
        printError(error);
        process.exitCode = exitCodeFor(error);
      }
    });
}
