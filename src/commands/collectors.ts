/**
 * @fileoverview Collectors command implementation.
 * Lists the configured collectors with their key layouts and unit counts.
 */

import chalk from "chalk";
import { layoutOf, unitsOf } from "../collectors/index.js";
import { loadConfigOrExplain } from "../utils/config.js";

/**
 * Displays every configured collector.
 * Shows usage examples for the sync command.
 */
export async function collectors(): Promise<void> {
  const config = await loadConfigOrExplain();
  if (!config) {
    process.exit(1);
  }

  console.log(chalk.bold("\nConfigured Collectors\n"));

  const entries = Object.entries(config.collectors);
  if (entries.length === 0) {
    console.log(chalk.dim("No collectors configured."));
    console.log();
    return;
  }

  for (const [name, collector] of entries) {
    const layout = layoutOf(collector);
    console.log(chalk.cyan(name));
    if (collector.description) {
      console.log(`  ${collector.description}`);
    }
    console.log(
      chalk.dim(
        `  Key: ${layout.fields.join("/")}` +
          (layout.partitionBy ? ` (partitioned by ${layout.partitionBy})` : "")
      )
    );
    console.log(chalk.dim(`  Units: ${unitsOf(collector).length}`));
    console.log(
      chalk.dim(
        `  Volatile fields: ${collector.volatileFields.length > 0 ? collector.volatileFields.join(", ") : "none"}`
      )
    );
    console.log(chalk.dim(`  Source: ${collector.url}`));
    if (collector.profile) {
      console.log(chalk.dim(`  Profile: ${collector.profile}`));
    }
    console.log();
  }

  console.log(chalk.bold("Usage:"));
  console.log("  statsync sync <collector>    Sync one collector");
  console.log("  statsync sync --all          Sync every collector");
  console.log("  statsync sync --force        Rewrite artifacts even when unchanged");
  console.log();
}
