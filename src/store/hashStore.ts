/**
 * @fileoverview Per-unit hash sidecars.
 * Each sync unit gets one small JSON file under `<root>/<collector>/`
 * recording the content hash of its last persisted artifact.
 */

import fs from "fs/promises";
import path from "path";
import { glob } from "glob";
import { z } from "zod";
import {
  CorruptHashFileError,
  PersistenceError,
  describeError,
  errorCode,
} from "../sync/errors.js";
import { shortHash } from "../hashing/contentHash.js";
import type { HashRecord, KeyLayout, UnitKey } from "../sync/types.js";
import { encodeUnitKey, validateLayout } from "../sync/unitKeys.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { writeFileAtomic } from "./atomicWrite.js";

/**
 * On-disk sidecar shape. Key fields sit alongside these at the top level.
 */
const sidecarSchema = z
  .object({
    content_hash: z.string().regex(/^[0-9a-f]{64}$/, "expected a SHA-256 hex digest"),
    computed_at: z.string().datetime({ offset: true }),
    size_bytes: z.number().int().nonnegative(),
    artifact_path: z.string().min(1),
  })
  .passthrough();

export interface HashStore {
  /** Directory holding this collector's sidecars. */
  readonly namespaceDir: string;

  /**
   * Creates the namespace directory.
   * @throws PersistenceError if the directory cannot be created.
   */
  ensureReady(): Promise<void>;

  /** Sidecar path for a unit. */
  pathFor(unitKey: UnitKey): string;

  /**
   * Loads a unit's sidecar.
   * @returns The record, or null when there is none or it cannot be read.
   */
  load(unitKey: UnitKey): Promise<HashRecord | null>;

  /**
   * Writes a unit's sidecar, replacing any previous one.
   * @throws PersistenceError if the sidecar could not be written.
   */
  save(
    unitKey: UnitKey,
    contentHash: string,
    sizeBytes: number,
    artifactPath: string
  ): Promise<HashRecord>;

  /** All readable sidecars in the namespace. Corrupt files are skipped. */
  listAll(): Promise<HashRecord[]>;

  /**
   * Deletes sidecars last modified more than `maxAgeMs` ago.
   * @returns The number of files removed.
   */
  purgeOlderThan(maxAgeMs: number): Promise<number>;
}

export interface HashStoreOptions {
  /** Root of the hash tree, e.g. `<dataDir>/hash`. */
  root: string;
  collector: string;
  layout: KeyLayout;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Parses sidecar JSON into a HashRecord.
 * @throws CorruptHashFileError if the content is not a valid sidecar.
 */
export function parseSidecar(
  data: string,
  filePath: string,
  layout: KeyLayout
): HashRecord {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (error) {
    throw new CorruptHashFileError(filePath, describeError(error));
  }

  const parsed = sidecarSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CorruptHashFileError(
      filePath,
      `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
  }

  const unitKey: Record<string, string> = {};
  for (const field of layout.fields) {
    const value = parsed.data[field];
    if (typeof value !== "string" || value.length === 0) {
      throw new CorruptHashFileError(filePath, `missing key field "${field}"`);
    }
    unitKey[field] = value;
  }

  return {
    unitKey,
    contentHash: parsed.data.content_hash,
    computedAt: parsed.data.computed_at,
    sizeBytes: parsed.data.size_bytes,
    artifactPath: parsed.data.artifact_path,
  };
}

/**
 * Serializes a HashRecord as flat sidecar JSON.
 */
export function serializeSidecar(record: HashRecord, layout: KeyLayout): string {
  const sidecar: Record<string, string | number> = {};
  for (const field of layout.fields) {
    sidecar[field] = record.unitKey[field];
  }
  sidecar.content_hash = record.contentHash;
  sidecar.computed_at = record.computedAt;
  sidecar.size_bytes = record.sizeBytes;
  sidecar.artifact_path = record.artifactPath;
  return JSON.stringify(sidecar, null, 2);
}

/**
 * Creates a sidecar store for one collector namespace.
 * @throws InvalidUnitKeyError if the layout is invalid.
 */
export function createHashStore(options: HashStoreOptions): HashStore {
  const { layout } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const namespaceDir = path.join(options.root, options.collector);

  validateLayout(layout);

  const pathFor = (unitKey: UnitKey): string =>
    path.join(namespaceDir, `${encodeUnitKey(unitKey, layout)}.json`);

  async function listSidecarFiles(): Promise<string[]> {
    const files = await glob("**/*.json", { cwd: namespaceDir, nodir: true });
    return files.sort().map((file) => path.join(namespaceDir, file));
  }

  return {
    namespaceDir,

    async ensureReady(): Promise<void> {
      try {
        await fs.mkdir(namespaceDir, { recursive: true });
      } catch (error) {
        throw new PersistenceError(
          "Could not create hash directory",
          namespaceDir,
          error
        );
      }
    },

    pathFor,

    async load(unitKey: UnitKey): Promise<HashRecord | null> {
      let filePath = namespaceDir;
      try {
        filePath = pathFor(unitKey);
        const data = await fs.readFile(filePath, "utf-8");
        return parseSidecar(data, filePath, layout);
      } catch (error) {
        // A missing or unreadable sidecar only costs a re-fetch
        if (errorCode(error) !== "ENOENT") {
          logger.warn(
            error instanceof CorruptHashFileError
              ? error.message
              : `Could not read hash file ${filePath}: ${describeError(error)}`
          );
        }
        return null;
      }
    },

    async save(
      unitKey: UnitKey,
      contentHash: string,
      sizeBytes: number,
      artifactPath: string
    ): Promise<HashRecord> {
      const record: HashRecord = {
        unitKey,
        contentHash,
        computedAt: now().toISOString(),
        sizeBytes,
        artifactPath,
      };
      const filePath = pathFor(unitKey);

      try {
        await writeFileAtomic(filePath, serializeSidecar(record, layout));
      } catch (error) {
        throw new PersistenceError("Could not save hash file", filePath, error);
      }
      logger.debug(`Saved hash ${shortHash(contentHash)} to ${filePath}`);
      return record;
    },

    async listAll(): Promise<HashRecord[]> {
      const records: HashRecord[] = [];
      for (const filePath of await listSidecarFiles()) {
        try {
          const data = await fs.readFile(filePath, "utf-8");
          records.push(parseSidecar(data, filePath, layout));
        } catch (error) {
          logger.warn(
            error instanceof CorruptHashFileError
              ? `Skipping ${error.message}`
              : `Skipping unreadable hash file ${filePath}: ${describeError(error)}`
          );
        }
      }
      return records;
    },

    async purgeOlderThan(maxAgeMs: number): Promise<number> {
      const cutoff = now().getTime() - maxAgeMs;
      let removed = 0;

      for (const filePath of await listSidecarFiles()) {
        try {
          const stat = await fs.stat(filePath);
          if (stat.mtimeMs < cutoff) {
            await fs.unlink(filePath);
            removed++;
          }
        } catch (error) {
          logger.warn(
            `Failed to clean up ${filePath}: ${describeError(error)}`
          );
        }
      }

      if (removed > 0) {
        logger.info(
          `Cleaned up ${removed} old hash file(s) from ${options.collector}`
        );
      }
      return removed;
    },
  };
}
