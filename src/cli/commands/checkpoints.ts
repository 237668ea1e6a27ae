import { closeDatabase, createDatabase } from "../../db/connection.js";
import { ensureSchema } from "../../db/migrate.js";
import { CrawlCheckpointService } from "../../services/reconcile/checkpoints.js";
import {
  displayRunsTable,
  exitCodeFor,
  printError,
} from "../utils/display.js";

import type { Command } from "commander";

export function registerCheckpointsCommand(program: Command): void {
  program
    .command("checkpoints")
    .description("List recent crawl runs and their progress")
    .option("-l, --limit <count>", "Number of runs to show", "20")
    .option("-j, --json", "Output as JSON")
    .action(async (options: { limit: string; json?: boolean }) => {
      const db = createDatabase();

      try {
        await ensureSchema(db);
        const service = new CrawlCheckpointService(db);
        const runs = await service.listRuns(
          Number.parseInt(options.limit, 10) || 20
        );

        if (options.json === true) {
          console.log(JSON.stringify(runs, null, 2));
        } else {
          displayRunsTable(runs);
        }
      } catch (error) {
        printError(error);
        process.exitCode = exitCodeFor(error);
      } finally {
        await closeDatabase(db);
      }
    });
}
