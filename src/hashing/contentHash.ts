/**
 * @fileoverview Content hashing for change detection.
 * A record's hash is the SHA-256 of its canonical form after volatile
 * fields (collection timestamps, echoed load dates) are stripped.
 */

import { createHash } from "crypto";
import { canonicalize, stripVolatile } from "./canonical.js";

/** Length of the hash prefix shown in reasons and status output. */
const SHORT_HASH_LENGTH = 8;

/**
 * Compute SHA-256 hash of raw content.
 */
export function hashContent(data: Buffer | string): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Computes the content hash of a structured record.
 * @param record - The fetched record.
 * @param volatileFields - Field paths excluded before hashing.
 * @returns The full SHA-256 hex digest.
 * @throws MalformedRecordError if the record cannot be canonically serialized.
 */
export function hashRecord(
  record: unknown,
  volatileFields: readonly string[] = []
): string {
  const canonical = canonicalize(stripVolatile(record, volatileFields));
  return hashContent(Buffer.from(canonical, "utf-8"));
}

/**
 * Display prefix of a hash. Never use it for comparisons.
 */
export function shortHash(hash: string): string {
  return hash.slice(0, SHORT_HASH_LENGTH);
}
