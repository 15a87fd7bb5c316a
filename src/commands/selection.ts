/**
 * @fileoverview Shared argument handling for collector commands.
 */

import chalk from "chalk";
import type { Config } from "../utils/config.js";

/**
 * Resolves which collectors a command applies to.
 * A named collector wins; otherwise `all` (or a lone configured collector)
 * selects everything.
 * @returns The collector names, or null after printing why none apply.
 */
export function selectCollectors(
  config: Config,
  name: string | undefined,
  options: { all?: boolean; requireExplicit?: boolean } = {}
): string[] | null {
  const known = Object.keys(config.collectors);

  if (name !== undefined) {
    if (!Object.hasOwn(config.collectors, name)) {
      console.log(
        chalk.red(
          `Unknown collector: ${name}. Configured collectors: ${known.length > 0 ? known.join(", ") : "(none)"}`
        )
      );
      return null;
    }
    return [name];
  }

  if (known.length === 0) {
    console.log(chalk.red("No collectors configured."));
    return null;
  }

  if (options.all || !options.requireExplicit || known.length === 1) {
    return known;
  }

  console.log(
    chalk.red(
      `Specify a collector or --all. Configured collectors: ${known.join(", ")}`
    )
  );
  return null;
}

/**
 * Parses a positive number option.
 * @returns The value, or null after printing an error.
 */
export function parsePositive(
  value: string | undefined,
  fallback: number,
  label: string,
  { integer = false }: { integer?: boolean } = {}
): number | null {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  const valid =
    value.trim() !== "" &&
    Number.isFinite(parsed) &&
    parsed > 0 &&
    (!integer || Number.isInteger(parsed));
  if (!valid) {
    console.log(
      chalk.red(
        `Invalid ${label}: ${value}. Expected a positive ${integer ? "integer" : "number"}.`
      )
    );
    return null;
  }
  return parsed;
}
