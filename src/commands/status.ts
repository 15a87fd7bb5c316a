import chalk from "chalk";
import { collectorPaths, openCollector } from "../collectors/index.js";
import { shortHash } from "../hashing/contentHash.js";
import { readRunLog } from "../store/runLog.js";
import type { HashRecord, UnitKey } from "../sync/types.js";
import { formatUnitKey } from "../sync/unitKeys.js";
import { loadConfigOrExplain, type Config } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { parsePositive, selectCollectors } from "./selection.js";

export interface StatusOptions {
  check?: boolean;
  /** Age in hours after which a sidecar counts as stale. */
  staleAfter?: string;
}

const DEFAULT_STALE_AFTER_HOURS = 24;
const MAX_LISTED = 10;

/**
 * Tracked, missing, and stale units of one collector.
 */
export interface CollectorStatus {
  tracked: number;
  missing: UnitKey[];
  stale: HashRecord[];
  invalid: UnitKey[];
}

/**
 * Compares configured units against the sidecars on disk.
 */
export async function collectorStatus(
  config: Config,
  name: string,
  staleAfterMs: number,
  now: Date = new Date()
): Promise<CollectorStatus> {
  const collector = openCollector(config, name, { logger: createLogger() });
  const records = await collector.hashStore.listAll();

  const byPath = new Map<string, HashRecord>();
  for (const record of records) {
    byPath.set(collector.hashStore.pathFor(record.unitKey), record);
  }

  const result: CollectorStatus = {
    tracked: records.length,
    missing: [],
    stale: [],
    invalid: [],
  };
  const cutoff = now.getTime() - staleAfterMs;

  for (const unitKey of collector.units) {
    let sidecarPath: string;
    try {
      sidecarPath = collector.hashStore.pathFor(unitKey);
    } catch {
      result.invalid.push(unitKey);
      continue;
    }
    const record = byPath.get(sidecarPath);
    if (!record) {
      result.missing.push(unitKey);
    } else if (Date.parse(record.computedAt) < cutoff) {
      result.stale.push(record);
    }
  }

  return result;
}

function printList(items: string[]): void {
  for (const item of items.slice(0, MAX_LISTED)) {
    console.log(chalk.dim(`      ${item}`));
  }
  if (items.length > MAX_LISTED) {
    console.log(chalk.dim(`      ... and ${items.length - MAX_LISTED} more`));
  }
}

/**
 * Prints sync status per collector without fetching anything.
 * With `check`, exits with code 1 when a configured unit is missing or stale.
 */
export async function status(
  collectorName: string | undefined,
  options: StatusOptions
): Promise<void> {
  const config = await loadConfigOrExplain();
  if (!config) {
    process.exit(1);
  }

  const names = selectCollectors(config, collectorName);
  if (!names) {
    process.exit(1);
  }

  const staleAfterHours = parsePositive(
    options.staleAfter,
    DEFAULT_STALE_AFTER_HOURS,
    "stale-after hours"
  );
  if (staleAfterHours === null) {
    process.exit(1);
  }

  console.log(chalk.bold("\nstatsync Status\n"));
  console.log(`Data directory: ${config.dataDir}`);
  console.log(`Profile: ${config.profile}`);
  console.log();

  let problems = 0;

  for (const name of names) {
    const result = await collectorStatus(
      config,
      name,
      staleAfterHours * 60 * 60 * 1000
    );
    const runs = await readRunLog(collectorPaths(config, name).logFile);
    const lastRun = runs.at(-1);

    console.log(chalk.cyan(`${name}:`));
    console.log(`  Tracked: ${result.tracked}`);

    const missingLabel = `  Missing: ${result.missing.length}`;
    console.log(result.missing.length > 0 ? chalk.yellow(missingLabel) : missingLabel);
    printList(result.missing.map(formatUnitKey));

    const staleLabel = `  Stale (>${staleAfterHours}h): ${result.stale.length}`;
    console.log(result.stale.length > 0 ? chalk.yellow(staleLabel) : staleLabel);
    printList(
      result.stale.map(
        (record) =>
          `${formatUnitKey(record.unitKey)} ${shortHash(record.contentHash)} ${record.computedAt}`
      )
    );

    if (result.invalid.length > 0) {
      console.log(chalk.red(`  Invalid unit keys: ${result.invalid.length}`));
      printList(result.invalid.map(formatUnitKey));
    }

    if (lastRun) {
      console.log(
        `  Last run: ${lastRun.finishedAt} (${lastRun.updated} updated, ${lastRun.skipped} skipped, ${lastRun.failed} failed${lastRun.cancelled ? ", cancelled" : ""})`
      );
    } else {
      console.log(chalk.dim("  Last run: never"));
    }
    console.log();

    problems += result.missing.length + result.stale.length;
  }

  if (options.check && problems > 0) {
    console.log(chalk.red(`${problems} unit(s) missing or stale`));
    process.exit(1);
  }
}
