/**
 * @fileoverview Artifact persistence.
 * Each artifact is a single JSON file that is replaced atomically on write.
 * Timestamped snapshots are opt-in and removed by default.
 */

import fs from "fs/promises";
import path from "path";
import { PersistenceError, describeError, errorCode } from "../sync/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { writeFileAtomic } from "./atomicWrite.js";

/**
 * Result of an artifact write.
 */
export interface WrittenArtifact {
  path: string;
  sizeBytes: number;
}

export interface ArtifactStore {
  /**
   * Replaces the artifact at `filePath` with `record` serialized as JSON.
   * @throws PersistenceError if the artifact could not be written.
   */
  write(filePath: string, record: unknown): Promise<WrittenArtifact>;

  /**
   * Reads and parses an artifact.
   * @returns The parsed record, or null if no artifact exists.
   * @throws PersistenceError if the file is unreadable or not valid JSON.
   */
  read(filePath: string): Promise<unknown>;
}

export interface ArtifactStoreOptions {
  /** Keep a timestamped copy next to every artifact written. */
  keepSnapshots?: boolean;
  logger?: Logger;
  now?: () => Date;
}

const SNAPSHOT_STAMP = /^\d{8}_\d{6}$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Formats a UTC timestamp as `YYYYMMDD_HHMMSS`.
 */
export function snapshotStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function snapshotPrefix(filePath: string): string {
  return `${path.basename(filePath, ".json")}_`;
}

function isSnapshotOf(filePath: string, candidate: string): boolean {
  const prefix = snapshotPrefix(filePath);
  if (!candidate.startsWith(prefix) || !candidate.endsWith(".json")) {
    return false;
  }
  return SNAPSHOT_STAMP.test(candidate.slice(prefix.length, -".json".length));
}

/**
 * Creates a filesystem artifact store.
 */
export function createArtifactStore(
  options: ArtifactStoreOptions = {}
): ArtifactStore {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  async function removeSnapshots(filePath: string): Promise<void> {
    const dir = path.dirname(filePath);
    const entries = await fs.readdir(dir).catch(() => []);
    for (const entry of entries) {
      if (!isSnapshotOf(filePath, entry)) {
        continue;
      }
      try {
        await fs.unlink(path.join(dir, entry));
        logger.debug(`Removed old snapshot ${entry}`);
      } catch (error) {
        logger.warn(
          `Could not remove old snapshot ${entry}: ${describeError(error)}`
        );
      }
    }
  }

  return {
    async write(filePath: string, record: unknown): Promise<WrittenArtifact> {
      let data: string | undefined;
      try {
        data = JSON.stringify(record, null, 2);
      } catch (error) {
        throw new PersistenceError("Could not serialize artifact", filePath, error);
      }
      if (data === undefined) {
        throw new PersistenceError("Artifact has no JSON form", filePath);
      }

      try {
        await writeFileAtomic(filePath, data);
      } catch (error) {
        throw new PersistenceError("Could not write artifact", filePath, error);
      }

      if (options.keepSnapshots) {
        const dir = path.dirname(filePath);
        const snapshot = path.join(
          dir,
          `${snapshotPrefix(filePath)}${snapshotStamp(now())}.json`
        );
        await writeFileAtomic(snapshot, data).catch((error: unknown) => {
          logger.warn(
            `Could not write snapshot ${snapshot}: ${describeError(error)}`
          );
        });
      } else {
        await removeSnapshots(filePath);
      }

      return { path: filePath, sizeBytes: Buffer.byteLength(data, "utf-8") };
    },

    async read(filePath: string): Promise<unknown> {
      let data: string;
      try {
        data = await fs.readFile(filePath, "utf-8");
      } catch (error) {
        if (errorCode(error) === "ENOENT") {
          return null;
        }
        throw new PersistenceError("Could not read artifact", filePath, error);
      }

      try {
        return JSON.parse(data);
      } catch (error) {
        throw new PersistenceError("Artifact is not valid JSON", filePath, error);
      }
    },
  };
}
