import chalk from "chalk";
import {
  DEFAULT_PROFILE,
  PERFORMANCE_PROFILES,
  PROFILE_NAMES,
} from "../sync/profiles.js";

/**
 * Lists the performance profile presets.
 */
export function profiles(): void {
  console.log(chalk.bold("\nPerformance Profiles\n"));

  for (const name of PROFILE_NAMES) {
    const profile = PERFORMANCE_PROFILES[name];
    const marker = name === DEFAULT_PROFILE ? chalk.dim(" (default)") : "";
    console.log(chalk.cyan(name) + marker);
    console.log(`  ${profile.description}`);
    console.log(
      chalk.dim(
        `  Workers: ${profile.maxConcurrency}, delay: ${profile.interRequestDelayMs}ms, ` +
          `retries: ${profile.retry.maxRetries} (backoff ${profile.retry.backoffBaseMs}ms), ` +
          `timeout: ${profile.attemptTimeoutMs / 1000}s`
      )
    );
    console.log();
  }
}
