/**
 * @fileoverview Library entry point.
 */

export { canonicalize, stripVolatile, parseFieldPath } from "./hashing/canonical.js";
export { hashContent, hashRecord, shortHash } from "./hashing/contentHash.js";
export {
  createHashStore,
  type HashStore,
  type HashStoreOptions,
} from "./store/hashStore.js";
export {
  createArtifactStore,
  type ArtifactStore,
  type ArtifactStoreOptions,
  type WrittenArtifact,
} from "./store/artifactStore.js";
export { writeFileAtomic } from "./store/atomicWrite.js";
export { appendRunLog, readRunLog, type RunEntry } from "./store/runLog.js";
export { decide, type SyncAction, type SyncDecision } from "./sync/decision.js";
export {
  createSyncWorkerPool,
  type SyncWorkerPool,
  type SyncWorkerPoolDeps,
} from "./sync/pool.js";
export { backoffDelay, retryTransient, withTimeout, type Sleeper } from "./sync/retry.js";
export {
  PERFORMANCE_PROFILES,
  buildSyncOptions,
  resolveProfile,
  type ProfileName,
  type ProfileSettings,
} from "./sync/profiles.js";
export { encodeUnitKey, expandUnits, formatUnitKey } from "./sync/unitKeys.js";
export * from "./sync/errors.js";
export type * from "./sync/types.js";
export { createHttpFetcher } from "./collectors/httpFetcher.js";
export { openCollector, type OpenCollector } from "./collectors/index.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./utils/logger.js";
