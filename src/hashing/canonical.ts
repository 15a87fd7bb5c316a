/**
 * @fileoverview Canonical JSON serialization and volatile-field stripping.
 * Produces the exact byte sequence that content hashes are computed over.
 */

import { MalformedRecordError } from "../sync/errors.js";

/**
 * One step of a volatile field path.
 * `key: null` addresses the elements of an array at the current position.
 */
export interface PathSegment {
  key: string | null;
  /** Apply the rest of the path to every element of this array. */
  each: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Parses a dotted field path such as `metadata.collection_timestamp`,
 * `players[].loaddate` or `[].loaddate`.
 * @throws Error if the path is empty, has an empty segment, or ends on an array wildcard.
 */
export function parseFieldPath(path: string): PathSegment[] {
  if (path.length === 0) {
    throw new Error("Field path must not be empty");
  }

  const segments = path.split(".").map((raw): PathSegment => {
    if (raw === "[]") {
      return { key: null, each: true };
    }
    const each = raw.endsWith("[]");
    const key = each ? raw.slice(0, -2) : raw;
    if (key.length === 0 || key.includes("[") || key.includes("]")) {
      throw new Error(`Invalid segment "${raw}" in field path "${path}"`);
    }
    return { key, each };
  });

  if (segments[segments.length - 1].each) {
    throw new Error(`Field path "${path}" must end on a field name`);
  }
  return segments;
}

/**
 * Whether a string is a usable volatile field path.
 */
export function isValidFieldPath(path: string): boolean {
  try {
    parseFieldPath(path);
    return true;
  } catch {
    return false;
  }
}

function removeAt(value: unknown, segments: readonly PathSegment[]): unknown {
  if (segments.length === 0) {
    return value;
  }
  const [head, ...rest] = segments;

  if (head.key === null) {
    return Array.isArray(value)
      ? value.map((item: unknown) => removeAt(item, rest))
      : value;
  }

  if (!isPlainObject(value) || !Object.hasOwn(value, head.key)) {
    return value;
  }

  const copy: Record<string, unknown> = { ...value };

  if (head.each) {
    const child = value[head.key];
    if (Array.isArray(child)) {
      copy[head.key] = child.map((item: unknown) => removeAt(item, rest));
    }
    return copy;
  }

  if (rest.length === 0) {
    delete copy[head.key];
  } else {
    copy[head.key] = removeAt(value[head.key], rest);
  }
  return copy;
}

/**
 * Returns a copy of `record` with every volatile path removed.
 * Paths that do not match anything are ignored. The input is not mutated.
 */
export function stripVolatile(
  record: unknown,
  paths: readonly string[]
): unknown {
  let result = record;
  for (const path of paths) {
    result = removeAt(result, parseFieldPath(path));
  }
  return result;
}

function serialize(
  value: unknown,
  path: string,
  ancestors: Set<object>
): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) {
        throw new MalformedRecordError(`Non-finite number ${value}`, path);
      }
      return JSON.stringify(value);
    case "object":
      break;
    default:
      throw new MalformedRecordError(`Unsupported ${typeof value} value`, path);
  }

  if (value === null) {
    return "null";
  }
  if (ancestors.has(value)) {
    throw new MalformedRecordError("Cyclic reference", path);
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const items: string[] = [];
      for (let i = 0; i < value.length; i++) {
        items.push(serialize(value[i], `${path}[${i}]`, ancestors));
      }
      return `[${items.join(",")}]`;
    }

    if (!isPlainObject(value)) {
      throw new MalformedRecordError("Unsupported non-plain object", path);
    }

    const members: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const child = value[key];
      // Same as JSON.stringify: undefined properties are dropped
      if (child === undefined) {
        continue;
      }
      members.push(
        `${JSON.stringify(key)}:${serialize(child, `${path}.${key}`, ancestors)}`
      );
    }
    return `{${members.join(",")}}`;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Serializes a record with keys sorted at every level and no whitespace.
 * @throws MalformedRecordError for non-finite numbers, cycles, and values
 * that have no JSON form.
 */
export function canonicalize(value: unknown): string {
  return serialize(value, "$", new Set<object>());
}
