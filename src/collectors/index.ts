/**
 * @fileoverview Collector registry.
 * Resolves configured collectors into key layouts, unit lists, on-disk paths,
 * and a ready-to-run worker pool.
 */

import path from "path";
import { createArtifactStore } from "../store/artifactStore.js";
import { createHashStore, type HashStore } from "../store/hashStore.js";
import { createSyncWorkerPool, type SyncWorkerPool } from "../sync/pool.js";
import type { Sleeper } from "../sync/retry.js";
import type { Fetcher, KeyLayout, UnitKey } from "../sync/types.js";
import { encodeUnitKey, expandUnits } from "../sync/unitKeys.js";
import type { CollectorConfig, Config } from "../utils/config.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { createHttpFetcher } from "./httpFetcher.js";

/**
 * Where a collector keeps its files under the data directory.
 */
export interface CollectorPaths {
  /** Root of the hash tree shared by all collectors. */
  hashRoot: string;
  dataDir: string;
  logFile: string;
}

/**
 * A collector wired to its stores.
 */
export interface OpenCollector {
  name: string;
  config: CollectorConfig;
  layout: KeyLayout;
  units: UnitKey[];
  paths: CollectorPaths;
  hashStore: HashStore;
  pool: SyncWorkerPool;
  fetcher: Fetcher;
  artifactPathFor(unitKey: UnitKey): string;
}

export function layoutOf(collector: CollectorConfig): KeyLayout {
  return { fields: collector.keyFields, partitionBy: collector.partitionBy };
}

/**
 * Lists a collector's unit keys.
 * Explicit keys are reordered to layout order; unknown fields are kept so the
 * pool reports them as invalid.
 */
export function unitsOf(collector: CollectorConfig): UnitKey[] {
  const layout = layoutOf(collector);
  if (!Array.isArray(collector.units)) {
    return expandUnits(layout, collector.units);
  }
  return collector.units.map((unit) => {
    const ordered: Record<string, string> = {};
    for (const field of layout.fields) {
      if (field in unit) {
        ordered[field] = unit[field];
      }
    }
    return { ...ordered, ...unit };
  });
}

/**
 * Looks up a collector by name.
 * @throws Error naming the configured collectors if there is no match.
 */
export function getCollector(config: Config, name: string): CollectorConfig {
  if (!Object.hasOwn(config.collectors, name)) {
    const known = Object.keys(config.collectors);
    throw new Error(
      `Unknown collector: ${name}. Configured collectors: ${known.length > 0 ? known.join(", ") : "(none)"}`
    );
  }
  return config.collectors[name];
}

export function collectorPaths(config: Config, name: string): CollectorPaths {
  return {
    hashRoot: path.join(config.dataDir, "hash"),
    dataDir: path.join(config.dataDir, "data", name),
    logFile: path.join(config.dataDir, "logs", `${name}.json`),
  };
}

/**
 * Options for opening a collector.
 */
export interface OpenCollectorOptions {
  logger?: Logger;
  /** Replaces the HTTP fetcher, mainly for tests. */
  fetcher?: Fetcher;
  sleep?: Sleeper;
  now?: () => Date;
}

/**
 * Builds the stores, fetcher, and worker pool for a configured collector.
 * @throws Error if the collector is unknown or its key layout is invalid.
 */
export function openCollector(
  config: Config,
  name: string,
  options: OpenCollectorOptions = {}
): OpenCollector {
  const collector = getCollector(config, name);
  const logger = options.logger ?? silentLogger;
  const layout = layoutOf(collector);
  const paths = collectorPaths(config, name);

  const hashStore = createHashStore({
    root: paths.hashRoot,
    collector: name,
    layout,
    logger,
    now: options.now,
  });
  const artifactStore = createArtifactStore({
    keepSnapshots: collector.keepSnapshots,
    logger,
    now: options.now,
  });
  const artifactPathFor = (unitKey: UnitKey): string =>
    path.join(paths.dataDir, `${encodeUnitKey(unitKey, layout)}.json`);

  return {
    name,
    config: collector,
    layout,
    units: unitsOf(collector),
    paths,
    hashStore,
    pool: createSyncWorkerPool({
      collector: name,
      hashStore,
      artifactStore,
      artifactPathFor,
      logger,
      sleep: options.sleep,
      now: options.now,
    }),
    fetcher: options.fetcher ?? createHttpFetcher(collector),
    artifactPathFor,
  };
}
