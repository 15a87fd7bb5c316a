import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";

vi.mock("../../utils/config.js", () => ({
  loadConfigOrExplain: vi.fn(),
}));

// Mock chalk (pass through strings)
vi.mock("chalk", () => ({
  default: {
    red: vi.fn((s: string) => s),
    green: vi.fn((s: string) => s),
    cyan: vi.fn((s: string) => s),
    dim: vi.fn((s: string) => s),
    yellow: vi.fn((s: string) => s),
    bold: vi.fn((s: string) => s),
  },
}));

import { collectorStatus, status } from "../status.js";
import { purge } from "../purge.js";
import { loadConfigOrExplain, type Config } from "../../utils/config.js";
import { createHashStore } from "../../store/hashStore.js";
import { appendRunLog } from "../../store/runLog.js";

const HASH = "d".repeat(64);
const HOUR = 60 * 60 * 1000;
const layout = { fields: ["team", "level"] };

describe("status command", () => {
  const mockConsoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
  const mockExit = vi.spyOn(process, "exit").mockImplementation(() => {
    throw new Error("process.exit called");
  });
  let dataDir: string;
  let config: Config;

  /** Records a sidecar as if computed `ageHours` ago. */
  async function track(team: string, ageHours: number): Promise<void> {
    const store = createHashStore({
      root: path.join(dataDir, "hash"),
      collector: "rosters",
      layout,
      now: () => new Date(Date.now() - ageHours * HOUR),
    });
    await store.save({ team, level: "MLB" }, HASH, 10, `/data/${team}_MLB.json`);
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "statsync-status-"));
    config = {
      dataDir,
      profile: "balanced",
      createdAt: "2024-01-01T00:00:00.000Z",
      collectors: {
        rosters: {
          description: "",
          url: "https://stats.example.com/rosters/{team}?level={level}",
          keyFields: ["team", "level"],
          units: { team: ["TEX", "NYY"], level: ["MLB"] },
          volatileFields: [],
          keepSnapshots: false,
        },
      },
    };
    vi.mocked(loadConfigOrExplain).mockResolvedValue(config);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("classifies units as tracked, missing, and stale", async () => {
    await track("TEX", 48);

    const result = await collectorStatus(config, "rosters", 24 * HOUR);

    expect(result.tracked).toBe(1);
    expect(result.missing).toEqual([{ team: "NYY", level: "MLB" }]);
    expect(result.stale.map((r) => r.unitKey)).toEqual([{ team: "TEX", level: "MLB" }]);
    expect(result.invalid).toEqual([]);
  });

  it("prints counts and the last run", async () => {
    await track("TEX", 48);
    await appendRunLog(path.join(dataDir, "logs", "rosters.json"), {
      startedAt: "2024-05-01T00:00:00.000Z",
      finishedAt: "2024-05-01T00:00:05.000Z",
      forced: false,
      profile: "balanced",
      updated: 1,
      skipped: 0,
      failed: 1,
      pending: 0,
      cancelled: false,
      failures: [],
    });

    await status(undefined, {});

    expect(mockConsoleLog).toHaveBeenCalledWith("rosters:");
    expect(mockConsoleLog).toHaveBeenCalledWith("  Tracked: 1");
    expect(mockConsoleLog).toHaveBeenCalledWith("  Missing: 1");
    expect(mockConsoleLog).toHaveBeenCalledWith("      NYY/MLB");
    expect(mockConsoleLog).toHaveBeenCalledWith("  Stale (>24h): 1");
    expect(mockConsoleLog).toHaveBeenCalledWith(
      "  Last run: 2024-05-01T00:00:05.000Z (1 updated, 0 skipped, 1 failed)"
    );
    expect(mockExit).not.toHaveBeenCalled();
  });

  it("fails the check when units are missing or stale", async () => {
    await track("TEX", 48);

    await expect(status("rosters", { check: true })).rejects.toThrow(
      "process.exit called"
    );

    expect(mockConsoleLog).toHaveBeenCalledWith("  Last run: never");
    expect(mockConsoleLog).toHaveBeenCalledWith("2 unit(s) missing or stale");
    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it("honours --stale-after", async () => {
    await track("TEX", 48);
    await track("NYY", 1);

    await status("rosters", { check: true, staleAfter: "72" });

    expect(mockConsoleLog).toHaveBeenCalledWith("  Stale (>72h): 0");
    expect(mockExit).not.toHaveBeenCalled();
  });

  it("rejects an invalid --stale-after", async () => {
    await expect(status("rosters", { staleAfter: "-1" })).rejects.toThrow(
      "process.exit called"
    );

    expect(mockConsoleLog).toHaveBeenCalledWith(
      "Invalid stale-after hours: -1. Expected a positive number."
    );
  });

  describe("purge", () => {
    it("removes hash files older than the limit", async () => {
      await track("TEX", 1);
      const sidecar = path.join(dataDir, "hash", "rosters", "TEX_MLB.json");
      const old = new Date(Date.now() - 40 * 24 * HOUR);
      await fs.utimes(sidecar, old, old);
      await track("NYY", 1);

      await purge("rosters", { olderThan: "30" });

      expect(mockConsoleLog).toHaveBeenCalledWith("Removed 1 hash file(s)");
      await expect(fs.access(sidecar)).rejects.toThrow();
    });

    it("reports when nothing is old enough", async () => {
      await track("TEX", 1);

      await purge(undefined, {});

      expect(mockConsoleLog).toHaveBeenCalledWith(
        "rosters: no hash files older than 30 day(s)"
      );
      expect(mockConsoleLog).toHaveBeenCalledWith("Removed 0 hash file(s)");
    });
  });
});
