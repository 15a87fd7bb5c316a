/**
 * @fileoverview Per-collector run history.
 * Keeps a short summary of recent batch outcomes for the status command.
 */

import fs from "fs/promises";
import { z } from "zod";
import type { BatchOutcome } from "../sync/types.js";
import { formatUnitKey } from "../sync/unitKeys.js";
import { writeFileAtomic } from "./atomicWrite.js";

/** Number of runs kept in a log. */
export const MAX_RUN_ENTRIES = 100;

const runEntrySchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  forced: z.boolean(),
  profile: z.string(),
  updated: z.number().int(),
  skipped: z.number().int(),
  failed: z.number().int(),
  pending: z.number().int(),
  cancelled: z.boolean(),
  failures: z.array(
    z.object({
      unit: z.string(),
      error: z.string(),
      transient: z.boolean(),
    })
  ),
});

const runLogSchema = z.object({ runs: z.array(runEntrySchema) });

export type RunEntry = z.infer<typeof runEntrySchema>;

/**
 * Summarizes a batch outcome for the log.
 */
export function toRunEntry(
  outcome: BatchOutcome,
  meta: { forced: boolean; profile: string }
): RunEntry {
  return {
    startedAt: outcome.startedAt,
    finishedAt: outcome.finishedAt,
    forced: meta.forced,
    profile: meta.profile,
    updated: outcome.updated,
    skipped: outcome.skipped,
    failed: outcome.failed,
    pending: outcome.pending,
    cancelled: outcome.cancelled,
    failures: outcome.units
      .filter((unit) => unit.status === "failed")
      .map((unit) => ({
        unit: formatUnitKey(unit.unitKey),
        error: unit.error?.message ?? unit.reason,
        transient: unit.error?.transient ?? false,
      })),
  };
}

/**
 * Reads the run log.
 * @returns The recorded runs, oldest first; empty if the log is missing or unreadable.
 */
export async function readRunLog(logFile: string): Promise<RunEntry[]> {
  try {
    const data = await fs.readFile(logFile, "utf-8");
    const parsed = runLogSchema.safeParse(JSON.parse(data));
    return parsed.success ? parsed.data.runs : [];
  } catch {
    return [];
  }
}

/**
 * Appends a run, keeping only the most recent entries.
 */
export async function appendRunLog(
  logFile: string,
  entry: RunEntry
): Promise<void> {
  const runs = [...(await readRunLog(logFile)), entry].slice(-MAX_RUN_ENTRIES);
  await writeFileAtomic(logFile, JSON.stringify({ runs }, null, 2));
}
