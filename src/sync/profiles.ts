/**
 * @fileoverview Performance profile presets.
 * The table is only used to build SyncOptions; nothing reads it at run time.
 */

import { silentLogger, type Logger } from "../utils/logger.js";
import type { RetryPolicy, SyncOptions } from "./types.js";

/**
 * Worker count, pacing, and retry settings of a named profile.
 */
export interface ProfileSettings {
  description: string;
  maxConcurrency: number;
  interRequestDelayMs: number;
  retry: RetryPolicy;
  attemptTimeoutMs: number;
}

const DEFAULT_RETRY: RetryPolicy = { maxRetries: 3, backoffBaseMs: 1000 };
const DEFAULT_ATTEMPT_TIMEOUT_MS = 30_000;

export const PERFORMANCE_PROFILES = {
  stealth: {
    description: "Few workers, long pauses; for sources that rate-limit hard",
    maxConcurrency: 2,
    interRequestDelayMs: 500,
    retry: DEFAULT_RETRY,
    attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
  },
  conservative: {
    description: "Polite default for public APIs",
    maxConcurrency: 3,
    interRequestDelayMs: 100,
    retry: DEFAULT_RETRY,
    attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
  },
  balanced: {
    description: "Moderate parallelism",
    maxConcurrency: 5,
    interRequestDelayMs: 50,
    retry: DEFAULT_RETRY,
    attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
  },
  aggressive: {
    description: "Many workers, short pauses",
    maxConcurrency: 8,
    interRequestDelayMs: 20,
    retry: DEFAULT_RETRY,
    attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
  },
  ultra_aggressive: {
    description: "Maximum throughput; only for sources you control",
    maxConcurrency: 12,
    interRequestDelayMs: 10,
    retry: DEFAULT_RETRY,
    attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
  },
} satisfies Record<string, ProfileSettings>;

export type ProfileName = keyof typeof PERFORMANCE_PROFILES;

export const PROFILE_NAMES: ProfileName[] = [
  "stealth",
  "conservative",
  "balanced",
  "aggressive",
  "ultra_aggressive",
];

export const DEFAULT_PROFILE: ProfileName = "balanced";

/**
 * Type guard for profile names.
 */
export function isProfileName(name: string): name is ProfileName {
  return Object.hasOwn(PERFORMANCE_PROFILES, name);
}

/**
 * Looks up a profile, falling back to the default with a warning.
 */
export function resolveProfile(
  name: string | undefined,
  logger: Logger = silentLogger
): { name: ProfileName; settings: ProfileSettings } {
  if (name === undefined) {
    return { name: DEFAULT_PROFILE, settings: PERFORMANCE_PROFILES[DEFAULT_PROFILE] };
  }
  if (!isProfileName(name)) {
    logger.warn(
      `Unknown performance profile '${name}', using '${DEFAULT_PROFILE}'`
    );
    return { name: DEFAULT_PROFILE, settings: PERFORMANCE_PROFILES[DEFAULT_PROFILE] };
  }
  return { name, settings: PERFORMANCE_PROFILES[name] };
}

/**
 * Builds run options from a profile plus per-run overrides.
 */
export function buildSyncOptions(params: {
  settings: ProfileSettings;
  volatileFields: readonly string[];
  force?: boolean;
  /** Overrides the profile's worker count. */
  workers?: number;
  signal?: AbortSignal;
}): SyncOptions {
  const { settings } = params;
  return {
    maxConcurrency: params.workers ?? settings.maxConcurrency,
    interRequestDelayMs: settings.interRequestDelayMs,
    retry: { ...settings.retry },
    attemptTimeoutMs: settings.attemptTimeoutMs,
    volatileFields: params.volatileFields,
    force: params.force ?? false,
    signal: params.signal,
  };
}
