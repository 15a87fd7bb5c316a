import { describe, it, expect } from "vitest";
import { hashContent, hashRecord, shortHash } from "../contentHash.js";

const roster = (loaddate: string, count = 12) => ({
  team: "TEX",
  level: "MLB",
  metadata: { collection_timestamp: loaddate },
  players: Array.from({ length: count }, (_, i) => ({
    id: 1000 + i,
    name: `Player ${i}`,
    loaddate,
  })),
});

const VOLATILE = ["metadata.collection_timestamp", "players[].loaddate"];

describe("contentHash", () => {
  describe("hashContent", () => {
    it("computes SHA-256 of raw content", () => {
      expect(hashContent("")).toBe(
        "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
      );
      expect(hashContent(Buffer.from("abc"))).toBe(
        "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
      );
    });
  });

  describe("hashRecord", () => {
    it("hashes the canonical form", () => {
      expect(hashRecord({ b: 2, a: 1 })).toBe(hashContent('{"a":1,"b":2}'));
    });

    it("is deterministic across calls and key order", () => {
      const first = hashRecord({ x: [1, { b: 2, a: 1 }] });
      const second = hashRecord({ x: [1, { a: 1, b: 2 }] });

      expect(first).toBe(second);
      expect(first).toMatch(/^[0-9a-f]{64}$/);
    });

    it("ignores volatile fields", () => {
      expect(hashRecord(roster("2024-05-01"), VOLATILE)).toBe(
        hashRecord(roster("2024-05-02"), VOLATILE)
      );
    });

    it("detects changes outside volatile fields", () => {
      expect(hashRecord(roster("2024-05-01", 12), VOLATILE)).not.toBe(
        hashRecord(roster("2024-05-01", 13), VOLATILE)
      );
    });

    it("includes volatile fields when none are configured", () => {
      expect(hashRecord(roster("2024-05-01"))).not.toBe(
        hashRecord(roster("2024-05-02"))
      );
    });
  });

  it("shortHash returns the 8-character prefix", () => {
    expect(shortHash("0123456789abcdef")).toBe("01234567");
  });
});
