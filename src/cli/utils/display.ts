/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { isOperatorError } from "../../errors.js";

import type { MergeResult } from "../../services/merge/merger.js";
import type { RunOverview } from "../../services/reconcile/checkpoints.js";
import type { SnapshotReport } from "../../services/snapshot/collector.js";
import type { MissingReport } from "../../services/reconcile/diagnose.js";
import type { CrawlReport } from "../../services/reconcile/orchestrator.js";

function formatMass(grams: number | null): string {
  if (grams === null) return chalk.gray("N/A");
  if (grams >= 1000) return `${(grams / 1000).toFixed(1)} kg`;
  return `${String(grams)} g`;
}

/**
 * Display the outcome of a crawl
 */
export function displayCrawlReport(report: CrawlReport): void {
  console.log(chalk.bold("\nCrawl summary:"));
  console.log(`  Pages processed:  ${String(report.pagesProcessed)}`);
  if (report.pagesFailed > 0) {
    console.log(`  Pages failed:     ${chalk.yellow(String(report.pagesFailed))}`);
  }
  console.log(`  Names indexed:    ${String(report.indexSize)}`);
  if (report.nameCollisions > 0) {
    console.log(
      `  Name collisions:  ${chalk.yellow(String(report.nameCollisions))} (later code kept)`
    );
  }
  console.log(`  Stopped because:  ${report.stopReason ?? "finished page range"}`);
  console.log(`  Codes filled:     ${chalk.green(String(report.filled))}`);
  console.log(`  Still missing:    ${String(report.missingAfter)}`);
  console.log();
}

/**
 * Display the outcome of a snapshot scrape
 */
export function displaySnapshotReport(report: SnapshotReport, outputPath: string): void {
  console.log(chalk.bold("\nSnapshot summary:"));
  console.log(`  Pages processed:  ${String(report.pagesProcessed)}`);
  if (report.pagesFailed > 0) {
    console.log(`  Pages failed:     ${chalk.yellow(String(report.pagesFailed))}`);
  }
  console.log(`  Rows collected:   ${chalk.green(String(report.dataset.records.length))}`);
  console.log(`  Stopped because:  ${report.stopReason ?? "-"}`);
  console.log(`  Saved to:         ${outputPath}`);
  console.log();
}

/**
 * Display missing-code diagnosis
 */
export function displayMissingReport(report: MissingReport): void {
  console.log(
    chalk.bold(
      `\nMissing codes: ${String(report.missing)} of ${String(report.total)} records\n`
    )
  );

  if (report.missing === 0) {
    return;
  }

  const sample = new CliTable3({
    head: [chalk.cyan("Name"), chalk.cyan("Year"), chalk.cyan("Mass")],
    colWidths: [40, 8, 14],
    wordWrap: true,
  });
  for (const row of report.sample) {
    sample.push([row.name, row.year === null ? "?" : String(row.year), formatMass(row.mass)]);
  }
  console.log(chalk.bold("Sample:"));
  console.log(sample.toString());

  const years = new CliTable3({
    head: [chalk.cyan("Year"), chalk.cyan("Missing")],
    colWidths: [10, 10],
  });
  for (const row of report.byYear) {
    years.push([row.year === null ? "?" : String(row.year), String(row.count)]);
  }
  console.log(chalk.bold("\nBy year (newest first):"));
  console.log(years.toString());
}

/**
 * Display a merge summary
 */
export function displayMergeResult(result: MergeResult, outputPath: string): void {
  console.log(chalk.bold("\nMerge summary:"));
  console.log(`  Total records:         ${String(result.total)}`);
  console.log(`  Duplicates collapsed:  ${String(result.duplicatesCollapsed)}`);
  console.log(`  With coordinates:      ${String(result.withCoordinates)}`);
  console.log(`  Without coordinates:   ${String(result.total - result.withCoordinates)}`);
  console.log(`  Saved to:              ${outputPath}`);
  console.log();
}

/**
 * Display recent crawl runs
 */
export function displayRunsTable(runs: RunOverview[]): void {
  if (runs.length === 0) {
    console.log(chalk.yellow("No crawl runs recorded"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("#"),
      chalk.cyan("Profile"),
      chalk.cyan("Pages"),
      chalk.cyan("Status"),
      chalk.cyan("Stop"),
      chalk.cyan("Checkpoint"),
      chalk.cyan("Resolved"),
      chalk.cyan("Missing"),
      chalk.cyan("Started"),
    ],
  });

  for (const run of runs) {
    const status =
      run.status === "completed"
        ? chalk.green(run.status)
        : run.status === "aborted"
          ? chalk.red(run.status)
          : chalk.yellow(run.status);

    table.push([
      String(run.id),
      run.profile,
      `${String(run.start_page)}-${String(run.end_page)}`,
      status,
      run.stop_reason ?? chalk.gray("-"),
      run.last_page === null
        ? chalk.gray("-")
        : `page ${String(run.last_page)} (${String(run.checkpoint_count)})`,
      String(run.resolved_count),
      String(run.missing_count),
      run.started_at.replace("T", " ").slice(0, 19),
    ]);
  }

  console.log(table.toString());
}

/**
 * Print an error, with details for the errors the tool raises itself
 */
export function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red("Error:"), message);

  if (isOperatorError(error) && error.code === "INVALID_CONFIG") {
    for (const detail of error.details) {
      console.error(chalk.gray(`  ${detail}`));
    }
  }
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}

/**
 * Exit code for an error raised during a command
 */
export function exitCodeFor(error: unknown): number {
  return isOperatorError(error) ? error.exitCode : 1;
}
