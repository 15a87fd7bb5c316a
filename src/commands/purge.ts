import chalk from "chalk";
import { openCollector } from "../collectors/index.js";
import { loadConfigOrExplain } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { parsePositive, selectCollectors } from "./selection.js";

export interface PurgeOptions {
  olderThan?: string;
}

const DEFAULT_MAX_AGE_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Removes hash files not refreshed within the given number of days.
 * Artifacts are left in place; the next sync re-fetches their units.
 */
export async function purge(
  collectorName: string | undefined,
  options: PurgeOptions
): Promise<void> {
  const config = await loadConfigOrExplain();
  if (!config) {
    process.exit(1);
  }

  const names = selectCollectors(config, collectorName);
  if (!names) {
    process.exit(1);
  }

  const days = parsePositive(
    options.olderThan,
    DEFAULT_MAX_AGE_DAYS,
    "older-than days"
  );
  if (days === null) {
    process.exit(1);
  }

  const logger = createLogger();
  let total = 0;
  for (const name of names) {
    const collector = openCollector(config, name, { logger });
    const removed = await collector.hashStore.purgeOlderThan(days * DAY_MS);
    if (removed === 0) {
      console.log(chalk.dim(`${name}: no hash files older than ${days} day(s)`));
    }
    total += removed;
  }

  console.log(chalk.green(`Removed ${total} hash file(s)`));
}
