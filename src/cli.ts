#!/usr/bin/env node

/**
 * @fileoverview Main CLI entry point for statsync.
 * Keeps local JSON snapshots of remote stats sources in sync, re-writing a
 * unit only when its content hash changes.
 */

import { Command } from "commander";
import { createRequire } from "module";
import chalk from "chalk";
import { init } from "./commands/init.js";
import { sync } from "./commands/sync.js";
import { status } from "./commands/status.js";
import { purge } from "./commands/purge.js";
import { collectors } from "./commands/collectors.js";
import { profiles } from "./commands/profiles.js";
import { describeError } from "./sync/errors.js";
import { PROFILE_NAMES } from "./sync/profiles.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json");

const program = new Command();

program
  .name("statsync")
  .description(
    "Hash-gated incremental sync of remote stats sources into local JSON artifacts."
  )
  .version(version);

program
  .command("init")
  .description("Initialize statsync with a data directory and default profile")
  .option("--data-dir <path>", "Directory for hashes, artifacts, and run logs")
  .option("--profile <name>", `Default performance profile (${PROFILE_NAMES.join(", ")})`)
  .action(init);

program
  .command("sync [collector]")
  .description("Fetch units and rewrite artifacts whose content changed")
  .option("--all", "Sync every configured collector")
  .option("--force", "Rewrite every artifact even when its hash is unchanged")
  .option("--workers <n>", "Override the profile's worker count")
  .option("--profile <name>", "Performance profile for this run")
  .option("--status", "Show status instead of syncing")
  .option("--verbose", "Show the outcome of every unit and debug logging")
  .action(sync);

program
  .command("status [collector]")
  .description("Show tracked, missing, and stale units without fetching")
  .option("--check", "Exit with code 1 if any unit is missing or stale")
  .option("--stale-after <hours>", "Age at which a unit counts as stale", "24")
  .action(status);

program
  .command("purge [collector]")
  .description("Delete hash files not refreshed recently")
  .option("--older-than <days>", "Maximum age in days", "30")
  .action(purge);

program
  .command("collectors")
  .description("List configured collectors")
  .action(collectors);

program
  .command("profiles")
  .description("List performance profiles")
  .action(profiles);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(1);
});
