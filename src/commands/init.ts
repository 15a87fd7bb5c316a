/**
 * @fileoverview Init command implementation.
 * Creates the data directory and writes the configuration, prompting for
 * anything not given on the command line.
 */

import fs from "fs/promises";
import path from "path";
import inquirer from "inquirer";
import ora from "ora";
import chalk from "chalk";
import {
  CONFIG_DIR,
  CONFIG_FILE,
  readConfig,
  saveConfig,
  type CollectorConfig,
} from "../utils/config.js";
import {
  DEFAULT_PROFILE,
  PERFORMANCE_PROFILES,
  PROFILE_NAMES,
  isProfileName,
} from "../sync/profiles.js";

/**
 * Options for the init command.
 */
export interface InitOptions {
  dataDir?: string;
  profile?: string;
}

interface InitAnswers {
  dataDir: string;
  profile: string;
}

/**
 * Collector written to a fresh configuration as a starting point.
 */
export const EXAMPLE_COLLECTOR: CollectorConfig = {
  description: "Team rosters by level (edit the URL for your source)",
  url: "https://stats.example.com/api/rosters/{team}?level={level}",
  keyFields: ["team", "level"],
  units: {
    team: ["TEX", "NYY", "LAD"],
    level: ["MLB", "AAA"],
  },
  volatileFields: ["metadata.collection_timestamp", "players[].loaddate"],
  keepSnapshots: false,
};

/**
 * Initializes statsync.
 * Re-running keeps existing collectors and the original creation date.
 * @param options - Data directory and default profile; prompted for when missing.
 */
export async function init(options: InitOptions): Promise<void> {
  console.log(chalk.bold("\n⚾ statsync Setup\n"));

  const existing = await readConfig();
  const current = existing.status === "ok" ? existing.config : null;
  if (existing.status === "invalid") {
    console.log(
      chalk.yellow(`⚠️  Existing config at ${CONFIG_FILE} is invalid and will be replaced`)
    );
  }

  const answers = await inquirer.prompt<InitAnswers>([
    {
      type: "input",
      name: "dataDir",
      message: "Where should synced data be stored?",
      default: current?.dataDir ?? path.join(CONFIG_DIR, "data"),
      when: options.dataDir === undefined,
      validate: (input: string) =>
        input.trim().length > 0 || "Please enter a directory",
    },
    {
      type: "list",
      name: "profile",
      message: "Default performance profile:",
      default: current?.profile ?? DEFAULT_PROFILE,
      when: options.profile === undefined,
      choices: PROFILE_NAMES.map((name) => ({
        name: `${name} - ${PERFORMANCE_PROFILES[name].description}`,
        value: name,
      })),
    },
  ]);

  const dataDir = path.resolve(options.dataDir ?? answers.dataDir);
  const profile = options.profile ?? answers.profile;

  if (!isProfileName(profile)) {
    console.log(
      chalk.red(
        `Error: unknown profile '${profile}'. Valid profiles: ${PROFILE_NAMES.join(", ")}`
      )
    );
    process.exit(1);
  }

  const spinner = ora("Creating data directory...").start();
  try {
    await fs.mkdir(dataDir, { recursive: true });
    spinner.succeed(`Data directory ready: ${dataDir}`);
  } catch (error) {
    spinner.fail(`Failed to create data directory ${dataDir}`);
    throw error;
  }

  const collectors = current?.collectors ?? {};
  const addedExample = Object.keys(collectors).length === 0;

  await saveConfig({
    dataDir,
    profile,
    collectors: addedExample ? { rosters: EXAMPLE_COLLECTOR } : collectors,
    createdAt: current?.createdAt ?? new Date().toISOString(),
  });

  console.log(chalk.green("\n✅ statsync initialized successfully!\n"));
  console.log(chalk.dim(`Configuration: ${CONFIG_FILE}`));
  console.log("Next steps:");
  if (addedExample) {
    console.log(
      chalk.dim("  1. Edit the example ") +
        chalk.cyan("rosters") +
        chalk.dim(" collector to point at your data source")
    );
  } else {
    console.log(chalk.dim("  1. Review your collectors with ") + chalk.cyan("statsync collectors"));
  }
  console.log(
    chalk.dim("  2. Run ") + chalk.cyan("statsync sync --all") + chalk.dim(" to fetch everything\n")
  );
}
