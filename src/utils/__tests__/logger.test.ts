import { describe, it, expect, vi, afterEach } from "vitest";

vi.mock("chalk", () => ({
  default: {
    red: vi.fn((s: string) => `red(${s})`),
    yellow: vi.fn((s: string) => `yellow(${s})`),
    dim: vi.fn((s: string) => `dim(${s})`),
  },
}));

import { createLogger, type LogLevel } from "../logger.js";
import { createSpinnerLogger } from "../spinnerLogger.js";

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  function capture(level?: LogLevel) {
    const lines: Array<[string, LogLevel]> = [];
    const logger = createLogger({ level, write: (line, at) => lines.push([line, at]) });
    return { logger, lines };
  }

  it("formats each level", () => {
    const { logger, lines } = capture("debug");

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines).toEqual([
      ["dim(d)", "debug"],
      ["i", "info"],
      ["yellow(⚠ w)", "warn"],
      ["red(✖ e)", "error"],
    ]);
  });

  it("drops lines below the level", () => {
    const { logger, lines } = capture("warn");

    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toEqual([["yellow(⚠ shown)", "warn"]]);
  });

  it("reads the level from STATSYNC_LOG_LEVEL", () => {
    vi.stubEnv("STATSYNC_LOG_LEVEL", "debug");
    const { logger, lines } = capture();

    logger.debug("visible");

    expect(lines).toEqual([["dim(visible)", "debug"]]);
  });

  it("ignores an unknown STATSYNC_LOG_LEVEL", () => {
    vi.stubEnv("STATSYNC_LOG_LEVEL", "constructor");
    const { logger, lines } = capture();

    logger.debug("hidden");
    logger.info("shown");

    expect(lines).toEqual([["shown", "info"]]);
  });

  it("prints around a running spinner", () => {
    const calls: string[] = [];
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      calls.push(line);
    });
    const spinner = {
      isSpinning: true,
      clear: () => calls.push("clear"),
      render: () => calls.push("render"),
    };

    createSpinnerLogger(spinner, "info").warn("careful");

    expect(calls).toEqual(["clear", "yellow(⚠ careful)", "render"]);
  });

  it("prints directly when the spinner is stopped", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const spinner = { isSpinning: false, clear: vi.fn(), render: vi.fn() };

    createSpinnerLogger(spinner, "info").info("done");

    expect(log).toHaveBeenCalledWith("done");
    expect(spinner.clear).not.toHaveBeenCalled();
  });
});
