import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";

const spinner = vi.hoisted(() => ({
  start: vi.fn().mockReturnThis(),
  succeed: vi.fn().mockReturnThis(),
  fail: vi.fn().mockReturnThis(),
  warn: vi.fn().mockReturnThis(),
  clear: vi.fn().mockReturnThis(),
  render: vi.fn().mockReturnThis(),
  isSpinning: false,
  text: "",
}));

vi.mock("../../utils/config.js", () => ({
  loadConfigOrExplain: vi.fn(),
}));

// Mock ora spinner
vi.mock("ora", () => ({
  default: vi.fn(() => spinner),
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

import { sync } from "../sync.js";
import { loadConfigOrExplain, type CollectorConfig, type Config } from "../../utils/config.js";
import { readRunLog } from "../../store/runLog.js";

const rosters: CollectorConfig = {
  description: "Team rosters",
  url: "https://stats.example.com/rosters/{team}?level={level}",
  keyFields: ["team", "level"],
  units: { team: ["TEX", "NYY"], level: ["MLB"] },
  volatileFields: ["players[].loaddate"],
  keepSnapshots: false,
};

function roster(team: string, loaddate: string) {
  return { team, players: [{ id: 1, loaddate }] };
}

/** Answers roster requests by team; listed teams get a 404. */
function serve(loaddate: string, missing: string[] = []) {
  const fetchMock = vi.fn(async (url: string) => {
    const team = new URL(url).pathname.split("/").pop() ?? "";
    if (missing.includes(team)) {
      return new Response("not found", { status: 404 });
    }
    return new Response(JSON.stringify(roster(team, loaddate)), { status: 200 });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("sync command", () => {
  const mockConsoleLog = vi.spyOn(console, "log").mockImplementation(() => {});
  const mockExit = vi.spyOn(process, "exit").mockImplementation(() => {
    throw new Error("process.exit called");
  });
  let dataDir: string;
  let config: Config;

  beforeEach(async () => {
    vi.clearAllMocks();
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "statsync-cli-"));
    config = {
      dataDir,
      profile: "balanced",
      collectors: { rosters },
      createdAt: "2024-01-01T00:00:00.000Z",
    };
    vi.mocked(loadConfigOrExplain).mockResolvedValue(config);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("exits when there is no usable config", async () => {
    vi.mocked(loadConfigOrExplain).mockResolvedValue(null);

    await expect(sync("rosters", {})).rejects.toThrow("process.exit called");
    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it("fetches every unit and writes artifacts", async () => {
    const fetchMock = serve("t1");

    await sync("rosters", {});

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(spinner.succeed).toHaveBeenCalledWith(
      "rosters: 2 updated, 0 skipped, 0 failed"
    );
    const artifact = await fs.readFile(
      path.join(dataDir, "data", "rosters", "TEX_MLB.json"),
      "utf-8"
    );
    expect(JSON.parse(artifact)).toEqual(roster("TEX", "t1"));
    expect(mockExit).not.toHaveBeenCalled();

    const runs = await readRunLog(path.join(dataDir, "logs", "rosters.json"));
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ updated: 2, profile: "balanced", forced: false });
  });

  it("skips unchanged units and explains each with --verbose", async () => {
    serve("t1");
    await sync("rosters", {});
    serve("t2");

    await sync("rosters", { verbose: true });

    expect(spinner.succeed).toHaveBeenLastCalledWith(
      "rosters: 0 updated, 2 skipped, 0 failed"
    );
    expect(mockConsoleLog).toHaveBeenCalledWith("  = TEX/MLB: hash unchanged");
    expect(mockConsoleLog).toHaveBeenCalledWith("  = NYY/MLB: hash unchanged");
  });

  it("rewrites everything with --force", async () => {
    serve("t1");
    await sync("rosters", {});

    await sync("rosters", { force: true });

    expect(spinner.succeed).toHaveBeenLastCalledWith(
      "rosters: 2 updated, 0 skipped, 0 failed"
    );
  });

  it("lists failed units and exits with code 1", async () => {
    serve("t1", ["NYY"]);

    await expect(sync("rosters", {})).rejects.toThrow("process.exit called");

    expect(spinner.warn).toHaveBeenCalledWith(
      "rosters: 1 updated, 0 skipped, 1 failed"
    );
    expect(mockConsoleLog).toHaveBeenCalledWith(
      "  ✖ NYY/MLB: https://stats.example.com/rosters/NYY?level=MLB responded 404 (non-transient, 1 attempt(s))"
    );
    expect(mockExit).toHaveBeenCalledWith(1);

    const runs = await readRunLog(path.join(dataDir, "logs", "rosters.json"));
    expect(runs[0].failures).toEqual([
      {
        unit: "NYY/MLB",
        error: "https://stats.example.com/rosters/NYY?level=MLB responded 404",
        transient: false,
      },
    ]);
  });

  it("requires a collector or --all when several are configured", async () => {
    config.collectors.boxscores = { ...rosters, keyFields: ["team", "level"] };

    await expect(sync(undefined, {})).rejects.toThrow("process.exit called");

    expect(mockConsoleLog).toHaveBeenCalledWith(
      "Specify a collector or --all. Configured collectors: rosters, boxscores"
    );
  });

  it("syncs every collector with --all", async () => {
    config.collectors.boxscores = { ...rosters };
    serve("t1");

    await sync(undefined, { all: true });

    expect(spinner.succeed).toHaveBeenCalledWith("rosters: 2 updated, 0 skipped, 0 failed");
    expect(spinner.succeed).toHaveBeenCalledWith("boxscores: 2 updated, 0 skipped, 0 failed");
  });

  it("rejects an unknown collector", async () => {
    await expect(sync("standings", {})).rejects.toThrow("process.exit called");

    expect(mockConsoleLog).toHaveBeenCalledWith(
      "Unknown collector: standings. Configured collectors: rosters"
    );
  });

  it("rejects an invalid worker count", async () => {
    await expect(sync("rosters", { workers: "two" })).rejects.toThrow(
      "process.exit called"
    );

    expect(mockConsoleLog).toHaveBeenCalledWith(
      "Invalid worker count: two. Expected a positive integer."
    );
  });

  it("shows status instead of syncing with --status", async () => {
    const fetchMock = serve("t1");

    await sync("rosters", { status: true });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(mockConsoleLog).toHaveBeenCalledWith("  Missing: 2");
  });
});
