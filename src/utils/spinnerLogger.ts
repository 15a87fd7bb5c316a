import { createLogger, type LogLevel, type Logger } from "./logger.js";

/**
 * The parts of an ora spinner the logger needs.
 */
export interface SpinnerLike {
  readonly isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

/**
 * Creates a logger that prints above a running spinner instead of through it.
 */
export function createSpinnerLogger(
  spinner: SpinnerLike,
  level?: LogLevel
): Logger {
  return createLogger({
    level,
    write: (line, at) => {
      const print = at === "warn" || at === "error" ? console.error : console.log;
      if (!spinner.isSpinning) {
        print(line);
        return;
      }
      spinner.clear();
      print(line);
      spinner.render();
    },
  });
}
