// packages/contracts/src/schema/ledger_entry_v1.ts
import { z } from "zod";

import { Sha256RefZ } from "./common_v1";

export const LedgerEntryV1Z = z
  .object({
    proposalId: z.string().min(1),
    decision: z.string().min(1), // encoded, see encodeDecisionV1
    riskBefore: z.number().finite(),
    riskAfter: z.number().finite(),
    prevHash: Sha256RefZ,
    entryHash: Sha256RefZ,
    timestamp: z.number().int().nonnegative(), // ms since epoch
    policyRefs: z.array(z.string().min(1))
  })
  .strict();

export type LedgerEntryV1 = z.infer<typeof LedgerEntryV1Z>;

export function parseLedgerEntryV1(input: unknown): LedgerEntryV1 {
  return LedgerEntryV1Z.parse(input);
}
