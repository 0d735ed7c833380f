// Rebuilds a session's committed kernel state from an existing chain.
//
// The ledger holds decisions and risk; the proposal log holds the tiers and
// epochs. A session resumes only when both agree entry by entry and the chain
// verifies. Envelope hysteresis and overlay history start empty.

import type { LedgerEntryV1, ProposalLogRecordV1 } from "@vitalgate/contracts";
import type { KernelStateInitV1 } from "@vitalgate/control-kernel";
import { ChainCorruption, type HashLinkedLedgerV1 } from "@vitalgate/ledger";

import { SessionResumeRefused } from "./errors";

export interface ResumePointV1 {
  state: Required<KernelStateInitV1>;
  lastEpochIndex: number;
}

function mismatch(entry: Readonly<LedgerEntryV1>, record: ProposalLogRecordV1): string | null {
  if (record.proposalId !== entry.proposalId) return "proposalId";
  if (record.decision !== entry.decision) return "decision";
  if (record.riskBefore !== entry.riskBefore) return "riskBefore";
  if (record.riskAfter !== entry.riskAfter) return "riskAfter";
  if (record.timestamp !== entry.timestamp) return "timestamp";
  return null;
}

/**
 * @returns null for an empty chain.
 * @throws SessionResumeRefused when the chain does not verify or the proposal
 *   log does not account for every entry.
 */
export function resumePointV1(
  subjectId: string,
  ledger: HashLinkedLedgerV1,
  records: ReadonlyArray<ProposalLogRecordV1>
): ResumePointV1 | null {
  try {
    ledger.verifyChain();
  } catch (err: unknown) {
    if (err instanceof ChainCorruption) throw new SessionResumeRefused(subjectId, err.message);
    throw err;
  }

  const entries = ledger.readView().entries();
  if (records.length !== entries.length) {
    throw new SessionResumeRefused(subjectId, `proposal log has ${records.length} records for ${entries.length} entries`);
  }
  if (entries.length === 0) return null;
  entries.forEach((entry, index) => {
    const field = mismatch(entry, records[index]);
    if (field !== null) throw new SessionResumeRefused(subjectId, `proposal log ${field} differs @ index:${index}`);
  });

  const last = records[records.length - 1];
  const accepted = last.decision === "ACCEPT";
  return {
    state: {
      tier: accepted ? last.toState : last.fromState,
      risk: accepted ? last.riskAfter : last.riskBefore,
      acceptedTransitionCount: records.filter((r) => r.decision === "ACCEPT").length
    },
    lastEpochIndex: last.epochIndex
  };
}
