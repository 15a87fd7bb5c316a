/**
 * @fileoverview Sync command implementation.
 * Runs the worker pool for one or more collectors and reports per-unit outcomes.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";
import { openCollector } from "../collectors/index.js";
import { appendRunLog, toRunEntry } from "../store/runLog.js";
import { describeError } from "../sync/errors.js";
import { buildSyncOptions, resolveProfile } from "../sync/profiles.js";
import type { BatchOutcome, UnitOutcome } from "../sync/types.js";
import { formatUnitKey } from "../sync/unitKeys.js";
import { loadConfigOrExplain, type Config } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import { createSpinnerLogger } from "../utils/spinnerLogger.js";
import { parsePositive, selectCollectors } from "./selection.js";
import { status } from "./status.js";

/**
 * Options for the sync command.
 */
export interface SyncCommandOptions {
  all?: boolean;
  force?: boolean;
  workers?: string;
  profile?: string;
  status?: boolean;
  verbose?: boolean;
}

const STATUS_SYMBOLS: Record<UnitOutcome["status"], string> = {
  updated: chalk.green("↑"),
  skipped: chalk.dim("="),
  failed: chalk.red("✖"),
};

function summarize(outcome: BatchOutcome): string {
  const parts = [
    `${outcome.updated} updated`,
    `${outcome.skipped} skipped`,
    `${outcome.failed} failed`,
  ];
  if (outcome.cancelled) {
    parts.push(`${outcome.pending} pending (cancelled)`);
  }
  return `${outcome.collector}: ${parts.join(", ")}`;
}

function printUnits(outcome: BatchOutcome, verbose: boolean): void {
  for (const unit of outcome.units) {
    const label = formatUnitKey(unit.unitKey);
    if (unit.status === "failed") {
      const kind = unit.error?.transient ? "transient" : "non-transient";
      console.log(
        `  ${STATUS_SYMBOLS.failed} ${label}: ${unit.reason} ` +
          chalk.dim(`(${kind}, ${unit.attempts} attempt(s))`)
      );
    } else if (verbose) {
      console.log(`  ${STATUS_SYMBOLS[unit.status]} ${label}: ${unit.reason}`);
    }
    for (const warning of unit.warnings) {
      console.log(chalk.yellow(`    ⚠ ${warning}`));
    }
  }
}

async function syncCollector(
  config: Config,
  name: string,
  options: SyncCommandOptions,
  workers: number | undefined,
  context: { spinner: Ora; logger: Logger; signal: AbortSignal }
): Promise<BatchOutcome | null> {
  const { spinner, logger } = context;
  const collector = openCollector(config, name, { logger });
  const profile = resolveProfile(
    options.profile ?? collector.config.profile ?? config.profile,
    logger
  );
  const total = collector.units.length;

  spinner.start(`Syncing ${name}... 0/${total}`);

  let outcome: BatchOutcome;
  try {
    outcome = await collector.pool.run(
      collector.units,
      collector.fetcher,
      buildSyncOptions({
        settings: profile.settings,
        volatileFields: collector.config.volatileFields,
        force: options.force,
        workers,
        signal: context.signal,
      }),
      {
        onUnitComplete: (_, done) => {
          spinner.text = `Syncing ${name}... ${done}/${total}`;
        },
      }
    );
  } catch (error) {
    spinner.fail(`Failed to sync ${name}: ${describeError(error)}`);
    return null;
  }

  const summary = summarize(outcome);
  if (outcome.failed > 0 || outcome.cancelled) {
    spinner.warn(summary);
  } else {
    spinner.succeed(summary);
  }
  printUnits(outcome, options.verbose ?? false);

  try {
    await appendRunLog(
      collector.paths.logFile,
      toRunEntry(outcome, {
        forced: options.force ?? false,
        profile: profile.name,
      })
    );
  } catch (error) {
    logger.warn(`Could not record run for ${name}: ${describeError(error)}`);
  }

  return outcome;
}

/**
 * Syncs the selected collectors.
 * Exits with code 1 when any unit failed, a collector could not run, or the
 * run was interrupted.
 * @param collectorName - Collector to sync; all collectors with `--all`.
 */
export async function sync(
  collectorName: string | undefined,
  options: SyncCommandOptions
): Promise<void> {
  if (options.status) {
    await status(collectorName, {});
    return;
  }

  const config = await loadConfigOrExplain();
  if (!config) {
    process.exit(1);
  }

  const names = selectCollectors(config, collectorName, {
    all: options.all,
    requireExplicit: true,
  });
  if (!names) {
    process.exit(1);
  }

  let workers: number | undefined;
  if (options.workers !== undefined) {
    const parsed = parsePositive(options.workers, 1, "worker count", {
      integer: true,
    });
    if (parsed === null) {
      process.exit(1);
    }
    workers = parsed;
  }

  const spinner = ora();
  const logger = createSpinnerLogger(
    spinner,
    options.verbose ? "debug" : undefined
  );
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
    spinner.text = "Interrupted, waiting for in-flight units...";
  };
  process.once("SIGINT", onInterrupt);

  let ok = true;
  try {
    for (const name of names) {
      const outcome = await syncCollector(config, name, options, workers, {
        spinner,
        logger,
        signal: controller.signal,
      });
      if (!outcome || outcome.failed > 0 || outcome.cancelled) {
        ok = false;
      }
      if (controller.signal.aborted) {
        break;
      }
    }
  } finally {
    process.off("SIGINT", onInterrupt);
  }

  if (!ok) {
    process.exit(1);
  }
}
