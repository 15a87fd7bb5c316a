/**
 * @fileoverview Unit key validation and file-name encoding.
 */

import path from "path";
import { InvalidUnitKeyError } from "./errors.js";
import type { KeyLayout, UnitKey } from "./types.js";

/** Sidecar field names that key fields may not shadow. */
export const RESERVED_SIDECAR_FIELDS: readonly string[] = [
  "content_hash",
  "computed_at",
  "size_bytes",
  "artifact_path",
];

/**
 * Checks a key layout for duplicate, reserved, or unknown field names.
 * @throws InvalidUnitKeyError describing the first problem found.
 */
export function validateLayout(layout: KeyLayout): void {
  if (layout.fields.length === 0) {
    throw new InvalidUnitKeyError("Key layout needs at least one field");
  }
  const seen = new Set<string>();
  for (const field of layout.fields) {
    if (seen.has(field)) {
      throw new InvalidUnitKeyError(`Duplicate key field "${field}"`);
    }
    if (RESERVED_SIDECAR_FIELDS.includes(field)) {
      throw new InvalidUnitKeyError(`Key field "${field}" is reserved`);
    }
    seen.add(field);
  }
  if (layout.partitionBy !== undefined && !seen.has(layout.partitionBy)) {
    throw new InvalidUnitKeyError(
      `partitionBy "${layout.partitionBy}" is not a key field`
    );
  }
  if (layout.partitionBy !== undefined && layout.fields.length === 1) {
    throw new InvalidUnitKeyError(
      "partitionBy needs at least one other key field"
    );
  }
}

/**
 * Percent-encodes every UTF-8 byte outside `[A-Za-z0-9.-]`, so `_` and `/`
 * never appear inside a segment and distinct values give distinct names.
 */
function safeSegment(value: string): string {
  if (value === "." || value === "..") {
    throw new InvalidUnitKeyError(`Key value "${value}" is not a valid name`);
  }
  let encoded: string;
  try {
    encoded = encodeURIComponent(value);
  } catch {
    throw new InvalidUnitKeyError(`Key value "${value}" is not valid UTF-16`);
  }
  // encodeURIComponent leaves these unescaped
  return encoded.replace(
    /[_!~*'()]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Checks that a key has exactly the layout's fields, each non-empty.
 * @throws InvalidUnitKeyError
 */
export function assertUnitKey(unitKey: UnitKey, layout: KeyLayout): void {
  const keys = Object.keys(unitKey);
  for (const field of layout.fields) {
    const value = unitKey[field];
    if (typeof value !== "string" || value.length === 0) {
      throw new InvalidUnitKeyError(
        `Unit key ${formatUnitKey(unitKey)} is missing "${field}"`
      );
    }
  }
  const extra = keys.filter((k) => !layout.fields.includes(k));
  if (extra.length > 0) {
    throw new InvalidUnitKeyError(
      `Unit key ${formatUnitKey(unitKey)} has unknown field(s): ${extra.join(", ")}`
    );
  }
}

/**
 * Encodes a key as a relative path without extension, e.g. `TEX_MLB` or
 * `hitters/660271`.
 * @throws InvalidUnitKeyError if the key does not match the layout.
 */
export function encodeUnitKey(unitKey: UnitKey, layout: KeyLayout): string {
  assertUnitKey(unitKey, layout);

  const name = layout.fields
    .filter((field) => field !== layout.partitionBy)
    .map((field) => safeSegment(unitKey[field]))
    .join("_");

  if (layout.partitionBy === undefined) {
    return name;
  }
  return path.join(safeSegment(unitKey[layout.partitionBy]), name);
}

/**
 * Human-readable key, e.g. `TEX/MLB`. Values are shown in insertion order.
 */
export function formatUnitKey(unitKey: UnitKey): string {
  return Object.values(unitKey).join("/") || "(empty key)";
}

/**
 * Expands per-field value lists into every key combination, in layout order.
 * `{ team: ["TEX", "NYY"], level: ["MLB"] }` yields TEX/MLB, NYY/MLB.
 */
export function expandUnits(
  layout: KeyLayout,
  values: Readonly<Record<string, readonly string[]>>
): UnitKey[] {
  let keys: Record<string, string>[] = [{}];
  for (const field of layout.fields) {
    const options = values[field] ?? [];
    const next: Record<string, string>[] = [];
    for (const key of keys) {
      for (const option of options) {
        next.push({ ...key, [field]: option });
      }
    }
    keys = next;
  }
  return keys;
}
