/**
 * @fileoverview Bounded-concurrency sync worker pool.
 * Runs the fetch → hash → decide → persist cycle for every unit of a batch
 * and aggregates per-unit outcomes. A failing unit never aborts the batch.
 */

import { hashRecord, shortHash } from "../hashing/contentHash.js";
import type { ArtifactStore } from "../store/artifactStore.js";
import type { HashStore } from "../store/hashStore.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { decide } from "./decision.js";
import { describeError, isTransient } from "./errors.js";
import { realSleep, retryTransient, withTimeout, type Sleeper } from "./retry.js";
import type {
  BatchOutcome,
  Fetcher,
  SyncHooks,
  SyncOptions,
  UnitError,
  UnitKey,
  UnitOutcome,
} from "./types.js";
import { formatUnitKey } from "./unitKeys.js";

export interface SyncWorkerPoolDeps {
  collector: string;
  hashStore: HashStore;
  artifactStore: ArtifactStore;
  /** Canonical artifact path for a unit. May throw for an invalid key. */
  artifactPathFor: (unitKey: UnitKey) => string;
  logger?: Logger;
  sleep?: Sleeper;
  now?: () => Date;
}

export interface SyncWorkerPool {
  /**
   * Syncs every unit and returns the batch outcome.
   * @throws RangeError for invalid options, PersistenceError if the hash
   * directory cannot be prepared. Unit failures are never thrown.
   */
  run(
    units: readonly UnitKey[],
    fetch: Fetcher,
    options: SyncOptions,
    hooks?: SyncHooks
  ): Promise<BatchOutcome>;
}

function assertOptions(options: SyncOptions): void {
  const { maxConcurrency, interRequestDelayMs, retry, attemptTimeoutMs } =
    options;
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new RangeError(
      `maxConcurrency must be a positive integer, got ${maxConcurrency}`
    );
  }
  if (!Number.isInteger(retry.maxRetries) || retry.maxRetries < 0) {
    throw new RangeError(
      `maxRetries must be a non-negative integer, got ${retry.maxRetries}`
    );
  }
  for (const [name, value] of [
    ["interRequestDelayMs", interRequestDelayMs],
    ["backoffBaseMs", retry.backoffBaseMs],
  ] as const) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`${name} must be >= 0, got ${value}`);
    }
  }
  if (!Number.isFinite(attemptTimeoutMs) || attemptTimeoutMs <= 0) {
    throw new RangeError(
      `attemptTimeoutMs must be > 0, got ${attemptTimeoutMs}`
    );
  }
}

function toUnitError(error: unknown): UnitError {
  return {
    name: error instanceof Error ? error.name : "Error",
    message: describeError(error),
    transient: isTransient(error),
  };
}

/**
 * Creates a worker pool bound to one collector's stores.
 */
export function createSyncWorkerPool(deps: SyncWorkerPoolDeps): SyncWorkerPool {
  const logger = deps.logger ?? silentLogger;
  const sleep = deps.sleep ?? realSleep;
  const now = deps.now ?? (() => new Date());
  const { hashStore, artifactStore } = deps;

  async function syncUnit(
    unitKey: UnitKey,
    fetch: Fetcher,
    options: SyncOptions
  ): Promise<UnitOutcome> {
    const label = `${deps.collector} ${formatUnitKey(unitKey)}`;
    const failed = (error: unknown, attempts: number): UnitOutcome => ({
      unitKey,
      status: "failed",
      reason: describeError(error),
      attempts,
      error: toUnitError(error),
      warnings: [],
    });

    let artifactPath: string;
    try {
      // Both path builders reject invalid keys
      hashStore.pathFor(unitKey);
      artifactPath = deps.artifactPathFor(unitKey);
    } catch (error) {
      return failed(error, 0);
    }

    const fetched = await retryTransient(
      (attempt) =>
        withTimeout(options.attemptTimeoutMs, (signal) =>
          fetch(unitKey, { signal, attempt })
        ),
      {
        policy: options.retry,
        sleep,
        stopped: () => options.signal?.aborted ?? false,
        onRetry: (error, attempt, delayMs) => {
          logger.debug(
            `${label}: attempt ${attempt + 1} failed (${describeError(error)}), retrying in ${delayMs}ms`
          );
        },
      }
    );

    if (!fetched.ok) {
      return failed(fetched.error, fetched.attempts);
    }

    const { attempts } = fetched;
    const record = fetched.value;

    if (record === null || record === undefined) {
      return {
        unitKey,
        status: "skipped",
        reason: "no data available",
        attempts,
        warnings: [],
      };
    }

    let freshHash: string;
    try {
      freshHash = hashRecord(record, options.volatileFields);
    } catch (error) {
      return failed(error, attempts);
    }

    const prior = await hashStore.load(unitKey);
    const decision = decide(freshHash, prior, options.force);

    if (decision.action === "skip") {
      return {
        unitKey,
        status: "skipped",
        reason: decision.reason,
        attempts,
        contentHash: freshHash,
        warnings: [],
      };
    }

    let sizeBytes: number;
    try {
      ({ sizeBytes } = await artifactStore.write(artifactPath, record));
    } catch (error) {
      return failed(error, attempts);
    }

    const warnings: string[] = [];
    try {
      await hashStore.save(unitKey, freshHash, sizeBytes, artifactPath);
    } catch (error) {
      // The artifact is on disk; a stale sidecar only costs a re-fetch next run
      const warning = `hash not saved, next run will re-fetch: ${describeError(error)}`;
      logger.warn(`${label}: ${warning}`);
      warnings.push(warning);
    }

    logger.debug(`${label}: updated (${decision.reason}) ${shortHash(freshHash)}`);
    return {
      unitKey,
      status: "updated",
      reason: decision.reason,
      attempts,
      contentHash: freshHash,
      warnings,
    };
  }

  return {
    async run(
      units: readonly UnitKey[],
      fetch: Fetcher,
      options: SyncOptions,
      hooks: SyncHooks = {}
    ): Promise<BatchOutcome> {
      assertOptions(options);
      await hashStore.ensureReady();

      const startedAt = now().toISOString();
      const outcomes: UnitOutcome[] = [];
      const counts = { updated: 0, skipped: 0, failed: 0 };
      const total = units.length;
      let next = 0;

      // Single aggregation point: every unit is recorded exactly once
      const record = (outcome: UnitOutcome): void => {
        outcomes.push(outcome);
        counts[outcome.status]++;
        hooks.onUnitComplete?.(outcome, outcomes.length, total);
      };

      const cancelled = (): boolean => options.signal?.aborted ?? false;

      const worker = async (): Promise<void> => {
        while (!cancelled() && next < total) {
          const unitKey = units[next++];
          let outcome: UnitOutcome;
          try {
            outcome = await syncUnit(unitKey, fetch, options);
          } catch (error) {
            // Unexpected failures still terminate only this unit
            outcome = {
              unitKey,
              status: "failed",
              reason: describeError(error),
              attempts: 0,
              error: toUnitError(error),
              warnings: [],
            };
          }
          if (outcome.status === "failed") {
            logger.debug(
              `${deps.collector} ${formatUnitKey(unitKey)}: failed (${outcome.reason})`
            );
          }
          record(outcome);

          if (options.interRequestDelayMs > 0 && !cancelled()) {
            await sleep(options.interRequestDelayMs);
          }
        }
      };

      const workerCount = Math.min(options.maxConcurrency, total);
      await Promise.all(Array.from({ length: workerCount }, () => worker()));

      return {
        collector: deps.collector,
        ...counts,
        pending: total - outcomes.length,
        cancelled: cancelled(),
        startedAt,
        finishedAt: now().toISOString(),
        units: outcomes,
      };
    },
  };
}
