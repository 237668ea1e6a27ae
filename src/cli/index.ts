#!/usr/bin/env node

/**
 * Meteorite catalog sync CLI
 *
 * Keeps a local meteorite landings CSV in step with the Meteoritical
 * Bulletin database: backfills Bulletin codes and merges new snapshots.
 */

import { Command } from "commander";

import { registerCheckpointsCommand } from "./commands/checkpoints.js";
import { registerCleanNamesCommand } from "./commands/clean-names.js";
import { registerMergeCommand } from "./commands/merge.js";
import { registerMissingCommand } from "./commands/missing.js";
import { registerReconcileCommand } from "./commands/reconcile.js";
import { registerSnapshotCommand } from "./commands/snapshot.js";

const program = new Command();

program
  .name("metbull-sync")
  .description("Meteorite catalog reconciliation against the Meteoritical Bulletin")
  .version("0.1.0");

// Register all commands
registerReconcileCommand(program);
registerSnapshotCommand(program);
registerMergeCommand(program);
registerCleanNamesCommand(program);
registerMissingCommand(program);
registerCheckpointsCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
