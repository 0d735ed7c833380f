import type { DecisionV1, LedgerEntryV1, TransitionProposalV1 } from "@vitalgate/contracts";

import { HashChainMismatch } from "./errors";
import type { HashLinkedLedgerV1 } from "./ledger";

export interface AppendWithRetryOptionsV1 {
  maxAttempts?: number;
  onRetry?: (err: HashChainMismatch, attempt: number) => void;
}

/**
 * Appends against the freshly read tip, retrying on HashChainMismatch. Any
 * other error, or a mismatch on the last attempt, propagates.
 */
export function appendWithRetryV1(
  ledger: HashLinkedLedgerV1,
  args: { decision: DecisionV1; proposal: Readonly<TransitionProposalV1>; timestamp: number },
  options: AppendWithRetryOptionsV1 = {}
): LedgerEntryV1 {
  const maxAttempts = options.maxAttempts ?? 3;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`invalid maxAttempts: ${maxAttempts}`);
  }

  for (let attempt = 1; ; attempt += 1) {
    try {
      return ledger.append({ ...args, prevHash: ledger.tipHash() });
    } catch (err: unknown) {
      if (!(err instanceof HashChainMismatch) || attempt >= maxAttempts) throw err;
      options.onRetry?.(err, attempt);
    }
  }
}
