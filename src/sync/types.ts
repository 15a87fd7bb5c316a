/**
 * @fileoverview Type definitions for the hash-gated sync engine.
 */

/**
 * Identifies one unit of remote data inside a collector's namespace,
 * e.g. `{ team: "TEX", level: "MLB" }` or `{ role: "hitters", player: "660271" }`.
 */
export type UnitKey = Readonly<Record<string, string>>;

/**
 * Shape of a collector's unit keys.
 */
export interface KeyLayout {
  /** Ordered key field names; their values form the file name. */
  fields: readonly string[];
  /** Field whose value becomes a subdirectory (e.g. player role). */
  partitionBy?: string;
}

/**
 * Persisted sidecar for one unit.
 */
export interface HashRecord {
  unitKey: UnitKey;
  /** Full SHA-256 hex digest of the record's canonical form. */
  contentHash: string;
  /** ISO timestamp of when the hash was recorded */
  computedAt: string;
  /** Byte size of the artifact file written */
  sizeBytes: number;
  artifactPath: string;
}

/**
 * Per-attempt context handed to a fetcher.
 */
export interface FetchContext {
  /** Aborted when the attempt times out. */
  signal: AbortSignal;
  /** 0-based attempt number. */
  attempt: number;
}

/**
 * Fetches the current record for a unit.
 * Resolves `null` when the source has no data for the unit; rejects with a
 * FetchError to signal failure.
 */
export type Fetcher = (unitKey: UnitKey, context: FetchContext) => Promise<unknown>;

/**
 * Exponential backoff policy: the delay before retry `n` (0-based) is
 * `backoffBaseMs * 2^n`.
 */
export interface RetryPolicy {
  maxRetries: number;
  backoffBaseMs: number;
}

/**
 * Options for one pool run.
 */
export interface SyncOptions {
  maxConcurrency: number;
  /** Pause applied by a worker after each completed unit. */
  interRequestDelayMs: number;
  retry: RetryPolicy;
  /** Per fetch attempt. Exceeding it is a transient failure. */
  attemptTimeoutMs: number;
  volatileFields: readonly string[];
  /** Update every unit regardless of stored hashes. */
  force: boolean;
  /** Stops dispatch of new units when aborted. */
  signal?: AbortSignal;
}

export type UnitStatus = "updated" | "skipped" | "failed";

/**
 * Terminal error of a failed unit.
 */
export interface UnitError {
  name: string;
  message: string;
  transient: boolean;
}

/**
 * Terminal state of one unit's cycle.
 */
export interface UnitOutcome {
  unitKey: UnitKey;
  status: UnitStatus;
  reason: string;
  /** Fetch attempts made. */
  attempts: number;
  contentHash?: string;
  error?: UnitError;
  /** Non-fatal problems, e.g. a hash sidecar that could not be saved. */
  warnings: string[];
}

/**
 * Aggregate result of a pool run.
 */
export interface BatchOutcome {
  collector: string;
  updated: number;
  skipped: number;
  failed: number;
  /** Units never dispatched because the run was cancelled. */
  pending: number;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
  units: UnitOutcome[];
}

/**
 * Callbacks invoked during a run.
 */
export interface SyncHooks {
  onUnitComplete?: (outcome: UnitOutcome, done: number, total: number) => void;
}
