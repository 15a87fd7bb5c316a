/**
 * @fileoverview Update-or-skip decision for a single unit.
 * The only place that defines what counts as a change.
 */

import { shortHash } from "../hashing/contentHash.js";
import type { HashRecord } from "./types.js";

export type SyncAction = "update" | "skip";

export interface SyncDecision {
  action: SyncAction;
  reason: string;
}

/**
 * Decides whether a freshly fetched record must be persisted.
 * @param freshHash - Content hash of the record just fetched.
 * @param prior - The unit's stored hash record, if any.
 * @param forced - Update regardless of hashes.
 */
export function decide(
  freshHash: string,
  prior: HashRecord | null,
  forced: boolean
): SyncDecision {
  if (forced) {
    return { action: "update", reason: "forced" };
  }
  if (!prior) {
    return { action: "update", reason: "no prior record" };
  }
  if (prior.contentHash === freshHash) {
    return { action: "skip", reason: "hash unchanged" };
  }
  return {
    action: "update",
    reason: `hash changed: ${shortHash(prior.contentHash)} -> ${shortHash(freshHash)}`,
  };
}
