/**
 * @fileoverview Configuration utilities for statsync.
 * Handles loading, validating, and saving the main configuration file.
 */

import fs from "fs/promises";
import path from "path";
import { homedir } from "os";
import chalk from "chalk";
import { z } from "zod";
import { isValidFieldPath } from "../hashing/canonical.js";
import { validateLayout } from "../sync/unitKeys.js";
import { describeError } from "../sync/errors.js";

/** Directory for statsync configuration. */
export const CONFIG_DIR =
  process.env.STATSYNC_HOME ?? path.join(homedir(), ".statsync");
/** Path to the main configuration file. */
export const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;
const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

/**
 * Names of `{placeholder}` fields in a URL template.
 */
export function templateFields(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER_PATTERN), (m) => m[1]);
}

const collectorSchema = z
  .object({
    description: z.string().default(""),
    /** URL template with `{field}` placeholders for key fields. */
    url: z
      .string()
      .regex(/^https?:\/\//, "url must start with http:// or https://"),
    keyFields: z
      .array(z.string().regex(NAME_PATTERN, "invalid key field name"))
      .min(1),
    partitionBy: z.string().optional(),
    /** Per-field value lists (cartesian product) or an explicit key list. */
    units: z.union([
      z.record(z.array(z.string().min(1))),
      z.array(z.record(z.string().min(1))),
    ]),
    volatileFields: z
      .array(
        z.string().refine(isValidFieldPath, {
          message: "invalid volatile field path",
        })
      )
      .default([]),
    headers: z.record(z.string()).optional(),
    profile: z.string().optional(),
    /** Keep a timestamped copy beside each artifact written. */
    keepSnapshots: z.boolean().default(false),
  })
  .superRefine((collector, ctx) => {
    try {
      validateLayout({
        fields: collector.keyFields,
        partitionBy: collector.partitionBy,
      });
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["keyFields"],
        message: describeError(error),
      });
    }
    for (const field of templateFields(collector.url)) {
      if (!collector.keyFields.includes(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["url"],
          message: `placeholder {${field}} is not a key field`,
        });
      }
    }
  });

export const configSchema = z.object({
  /** Root for hash sidecars, artifacts, and run logs. */
  dataDir: z.string().min(1),
  profile: z.string().default("balanced"),
  collectors: z
    .record(
      z.string().regex(NAME_PATTERN, "invalid collector name"),
      collectorSchema
    )
    .default({}),
  /** ISO timestamp of when statsync was initialized. */
  createdAt: z.string(),
});

export type CollectorConfig = z.infer<typeof collectorSchema>;
export type Config = z.infer<typeof configSchema>;

/**
 * Result of reading the configuration file.
 */
export type ConfigReadResult =
  | { status: "ok"; config: Config }
  | { status: "missing" }
  | { status: "invalid"; issues: string[] };

/**
 * Validates parsed JSON as a configuration.
 */
export function parseConfig(json: unknown): ConfigReadResult {
  const parsed = configSchema.safeParse(json);
  if (!parsed.success) {
    return {
      status: "invalid",
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      ),
    };
  }
  return { status: "ok", config: parsed.data };
}

/**
 * Reads the configuration file, distinguishing a missing file from an
 * invalid one.
 */
export async function readConfig(): Promise<ConfigReadResult> {
  let data: string;
  try {
    data = await fs.readFile(CONFIG_FILE, "utf-8");
  } catch {
    return { status: "missing" };
  }

  try {
    return parseConfig(JSON.parse(data));
  } catch (error) {
    return { status: "invalid", issues: [describeError(error)] };
  }
}

/**
 * Saves the configuration to disk.
 * Creates the configuration directory if it does not exist.
 * @param config - The configuration object to save.
 * @returns A promise that resolves when the config is saved.
 */
export async function saveConfig(config: Config): Promise<void> {
  await fs.mkdir(CONFIG_DIR, { recursive: true });
  await fs.writeFile(CONFIG_FILE, JSON.stringify(config, null, 2));
}

/**
 * Loads the configuration from disk.
 * @returns The configuration object, or null if not found or invalid.
 */
export async function loadConfig(): Promise<Config | null> {
  const result = await readConfig();
  return result.status === "ok" ? result.config : null;
}

/**
 * Loads the configuration for a command, printing why it is unusable.
 * @returns The configuration, or null after explaining the problem.
 */
export async function loadConfigOrExplain(): Promise<Config | null> {
  const result = await readConfig();
  if (result.status === "missing") {
    console.log(
      chalk.red("Error: statsync not initialized. Run `statsync init` first.")
    );
    return null;
  }
  if (result.status === "invalid") {
    console.log(chalk.red(`Error: invalid configuration in ${CONFIG_FILE}`));
    for (const issue of result.issues) {
      console.log(chalk.dim(`  ${issue}`));
    }
    return null;
  }
  return result.config;
}
