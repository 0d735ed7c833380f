import { createHash } from "node:crypto";

import type { Sha256Ref } from "@vitalgate/contracts";

export const GENESIS_HASH_V1: Sha256Ref = `sha256:${"0".repeat(64)}`;

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

/**
 * JSON with object keys sorted at every depth. Arrays keep their order.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) return x.map(canonicalize);
  if (typeof x === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) out[k] = canonicalize(v);
    return out;
  }
  return x;
}

/**
 * Fields covered by an entry hash, in hashing order.
 */
export interface EntryHashInputV1 {
  prevHash: string;
  proposalId: string;
  decision: string;
  riskBefore: number;
  riskAfter: number;
  timestamp: number;
  policyRefs: ReadonlyArray<string>;
}

/**
 * entryHash = sha256(stableStringify([prevHash, proposalId, decision, riskBefore, riskAfter, timestamp, policyRefs]))
 *
 * Annotations are never part of this input.
 */
export function computeEntryHashV1(input: EntryHashInputV1): Sha256Ref {
  const payload = stableStringify([
    input.prevHash,
    input.proposalId,
    input.decision,
    input.riskBefore,
    input.riskAfter,
    input.timestamp,
    input.policyRefs
  ]);
  return `sha256:${sha256Hex(payload)}`;
}
