import { describe, it, expect } from "vitest";
import path from "path";
import {
  collectorPaths,
  getCollector,
  layoutOf,
  openCollector,
  unitsOf,
} from "../index.js";
import type { CollectorConfig, Config } from "../../utils/config.js";

const players: CollectorConfig = {
  description: "Rolling windows per player",
  url: "https://stats.example.com/{role}/{player}",
  keyFields: ["role", "player"],
  partitionBy: "role",
  units: [
    { player: "660271", role: "hitters" },
    { role: "pitchers", player: "543037" },
  ],
  volatileFields: [],
  keepSnapshots: false,
};

const config: Config = {
  dataDir: "/srv/stats",
  profile: "balanced",
  collectors: { players },
  createdAt: "2024-01-01T00:00:00.000Z",
};

describe("collectors", () => {
  it("derives the key layout", () => {
    expect(layoutOf(players)).toEqual({
      fields: ["role", "player"],
      partitionBy: "role",
    });
  });

  it("orders explicit unit keys by layout", () => {
    expect(unitsOf(players).map((unit) => Object.keys(unit))).toEqual([
      ["role", "player"],
      ["role", "player"],
    ]);
  });

  it("expands per-field unit values", () => {
    expect(
      unitsOf({ ...players, partitionBy: undefined, units: { role: ["hitters"], player: ["1", "2"] } })
    ).toEqual([
      { role: "hitters", player: "1" },
      { role: "hitters", player: "2" },
    ]);
  });

  it("looks up collectors by name", () => {
    expect(getCollector(config, "players")).toBe(players);
    expect(() => getCollector(config, "toString")).toThrow(
      "Unknown collector: toString. Configured collectors: players"
    );
  });

  it("lays out files under the data directory", () => {
    expect(collectorPaths(config, "players")).toEqual({
      hashRoot: path.join("/srv/stats", "hash"),
      dataDir: path.join("/srv/stats", "data", "players"),
      logFile: path.join("/srv/stats", "logs", "players.json"),
    });
  });

  it("wires artifact and sidecar paths for a unit", () => {
    const collector = openCollector(config, "players", { fetcher: async () => null });
    const unit = { role: "hitters", player: "660271" };

    expect(collector.artifactPathFor(unit)).toBe(
      path.join("/srv/stats", "data", "players", "hitters", "660271.json")
    );
    expect(collector.hashStore.pathFor(unit)).toBe(
      path.join("/srv/stats", "hash", "players", "hitters", "660271.json")
    );
    expect(collector.units).toHaveLength(2);
  });
});
