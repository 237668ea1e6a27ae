import ora from "ora";

import { resolveSnapshotConfig } from "../../config.js";
import { saveDataset } from "../../dataset/store.js";
import { EXIT_NO_DATA } from "../../errors.js";
import { CatalogClient } from "../../scraper/client.js";
import { SnapshotCollector } from "../../services/snapshot/collector.js";
import {
  displaySnapshotReport,
  exitCodeFor,
  printError,
} from "../utils/display.js";
import { parseInteger } from "../utils/options.js";

import type { Command } from "commander";

interface SnapshotOptions {
  output: string;
  start?: number;
  end?: number;
  sinceYear?: number;
  delay?: number;
}

// ============================================================================
// Snapshot Command
// ============================================================================

export function registerSnapshotCommand(program: Command): void {
  program
    .command("snapshot")
    .description("Scrape recent Bulletin records as full rows, ready for merge")
    .option(
      "-o, --output <path>",
      "Snapshot file to write",
      "Meteorite_Landings_Incremental.csv"
    )
    .option("--start <page>", "First page (zero-based)", parseInteger)
    .option("--end <page>", "Last page, inclusive", parseInteger)
    .option("--since-year <year>", "Stop after a page with no record this recent", parseInteger)
    .option("--delay <ms>", "Delay between page requests", parseInteger)
    .action(async (options: SnapshotOptions) => {
      const spinner = ora("Starting snapshot...").start();

      try {
        const config = resolveSnapshotConfig({
          startPage: options.start,
          endPage: options.end,
          sinceYear: options.sinceYear,
          delayMs: options.delay,
        });

        const client = new CatalogClient({
          delayMs: config.delayMs,
          renderHint: config.renderHint,
        });
        const collector = new SnapshotCollector(client);
        collector.setProgressCallback((progress) => {
          const status = progress.failed
            ? "failed"
            : `${String(progress.rowsOnPage)} rows`;
          const newest =
            progress.newestYear !== null ? `, newest ${String(progress.newestYear)}` : "";
          spinner.text = `Page ${String(progress.page)}/${String(progress.endPage)}: ${status}${newest} (${String(progress.rowsCollected)} total)`;
        });

        const report = await collector.run(config);

        if (report.dataset.records.length === 0) {
          spinner.fail("No rows collected; the source may be down or its layout changed");
          process.exitCode = EXIT_NO_DATA;
          return;
        }

        saveDataset(options.output, report.dataset);
        spinner.succeed(`Snapshot saved to ${options.output}`);
        displaySnapshotReport(report, options.output);
      } catch (error) {
        spinner.fail("Snapshot failed");
        printError(error);
        process.exitCode = exitCodeFor(error);
      }
    });
}
