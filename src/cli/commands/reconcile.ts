import ora from "ora";

import { CRAWL_PROFILES, DATASET_PATH, resolveCrawlConfig } from "../../config.js";
import { loadDataset, saveDataset } from "../../dataset/store.js";
import { closeDatabase, createDatabase } from "../../db/connection.js";
import { ensureSchema } from "../../db/migrate.js";
import { EXIT_NO_DATA } from "../../errors.js";
import { CatalogClient } from "../../scraper/client.js";
import {
  Checkpointer,
  CrawlCheckpointService,
  ReconcileOrchestrator,
  cleanDatasetNames,
  countResolved,
  planResume,
} from "../../services/reconcile/index.js";
import {
  displayCrawlReport,
  exitCodeFor,
  printError,
  printWarning,
} from "../utils/display.js";
import { parseInteger } from "../utils/options.js";

import type { Database } from "../../db/schema.js";
import type { Command } from "commander";
import type { Kysely } from "kysely";

interface ReconcileOptions {
  profile: string;
  input: string;
  output?: string;
  start?: number;
  end?: number;
  yearFloor?: number;
  emptyLimit?: number;
  delay?: number;
  checkpointEvery?: number;
  resume?: boolean;
  cleanNames: boolean;
}

// ============================================================================
// Reconcile Command
// ============================================================================

export function registerReconcileCommand(program: Command): void {
  program
    .command("reconcile")
    .description("Crawl the Bulletin and fill missing meteorite codes")
    .option(
      "-p, --profile <name>",
      `Crawl profile (${Object.keys(CRAWL_PROFILES).join(", ")})`,
      "recent"
    )
    .option("-i, --input <path>", "Dataset to read", DATASET_PATH)
    .option("-o, --output <path>", "Dataset to write (defaults to --input)")
    .option("--start <page>", "First page (zero-based)", parseInteger)
    .option("--end <page>", "Last page, inclusive", parseInteger)
    .option("--year-floor <year>", "Stop once pages reach older years", parseInteger)
    .option("--empty-limit <pages>", "Consecutive empty pages before stopping", parseInteger)
    .option("--delay <ms>", "Delay between page requests", parseInteger)
    .option("--checkpoint-every <pages>", "Pages between intermediate saves (0 = off)", parseInteger)
    .option("--resume", "Continue after the last checkpoint of an unfinished run")
    .option("--no-clean-names", "Keep unverified-name markers in names")
    .addHelpText(
      "after",
      `
PROFILES:
  recent    pages 0-24, newest records
  deep      pages 0-100, stops once records predate 2012
  history   pages 100-180, stops after 3 empty pages
  rescan    pages 0-60 with a shorter delay
`
    )
    .action(async (options: ReconcileOptions) => {
      const spinner = ora("Loading dataset...").start();
      let db: Kysely<Database> | undefined;

      try {
        const outputPath = options.output ?? options.input;
        const resolved = resolveCrawlConfig(options.profile, {
          startPage: options.start,
          endPage: options.end,
          yearFloor: options.yearFloor,
          emptyPageLimit: options.emptyLimit,
          delayMs: options.delay,
          checkpointEvery: options.checkpointEvery,
        });
        const input = loadDataset(options.input);

        db = createDatabase();
        await ensureSchema(db);
        const checkpoints = new CrawlCheckpointService(db);

        let dataset = input;
        let config = resolved;
        if (options.resume === true) {
          const plan = await planResume(checkpoints, resolved, input, outputPath);
          if (plan.resumedFrom === null) {
            printWarning("No unfinished run to resume, starting from the profile start");
          } else if (plan.config.startPage > plan.config.endPage) {
            spinner.succeed(
              `Previous run already reached page ${String(plan.resumedFrom.page)}`
            );
            return;
          }
          dataset = plan.dataset;
          config = plan.config;
        }

        let records = dataset.records;
        let namesCleaned = 0;
        if (options.cleanNames) {
          const cleaned = cleanDatasetNames(records);
          records = cleaned.records;
          namesCleaned = cleaned.changed;
          if (namesCleaned > 0) {
            spinner.info(`Cleaned ${String(namesCleaned)} names`);
            spinner.start();
          }
        }

        const runId = await checkpoints.startRun(config, outputPath);
        const checkpointer = new Checkpointer({
          outputPath,
          every: config.checkpointEvery,
          dataset,
          service: checkpoints,
          runId,
        });
        const client = new CatalogClient({ delayMs: config.delayMs });
        const orchestrator = new ReconcileOrchestrator(client, checkpointer);

        orchestrator.setProgressCallback((progress) => {
          const status = progress.failed
            ? "failed"
            : `${String(progress.entriesOnPage)} names`;
          const oldest =
            progress.oldestYear !== null ? `, oldest ${String(progress.oldestYear)}` : "";
          spinner.text = `Page ${String(progress.page)}/${String(progress.endPage)}: ${status}${oldest} (index ${String(progress.indexSize)})`;
        });

        spinner.text = `Crawling pages ${String(config.startPage)}-${String(config.endPage)} (${config.profile})...`;
        const report = await orchestrator.run(records, config);

        if (report.upToDate) {
          if (namesCleaned > 0 || outputPath !== options.input) {
            saveDataset(outputPath, { ...dataset, records });
          }
          await checkpointer.finish({
            status: "completed",
            stopReason: null,
            resolvedCount: countResolved(records),
            missingCount: 0,
          });
          spinner.succeed("No missing codes, dataset is complete");
          return;
        }

        if (report.totalExtractionFailure) {
          spinner.fail("No page returned any records; the source may be down or its layout changed");
          process.exitCode = EXIT_NO_DATA;
        } else {
          spinner.succeed(`Filled ${String(report.filled)} codes, saved to ${outputPath}`);
        }
        displayCrawlReport(report);
      } catch (error) {
        spinner.fail("Reconcile failed");
        printError(error);
        process.exitCode = exitCodeFor(error);
      } finally {
        if (db !== undefined) {
          await closeDatabase(db);
        }
      }
    });
}
