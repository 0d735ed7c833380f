// packages/contracts/src/schema/proposal_log_record_v1.ts
import { z } from "zod";

import { CapabilityTierV1Z } from "./capability_v1";
import { DenyReasonV1Z } from "./decision_v1";

// One line of the proposal log. Every decision produces exactly one record.
export const ProposalLogRecordV1Z = z
  .object({
    epochIndex: z.number().int().nonnegative(),
    proposalId: z.string().min(1),
    fromState: CapabilityTierV1Z,
    toState: CapabilityTierV1Z,
    riskBefore: z.number(),
    riskAfter: z.number(),
    decision: z.string().min(1),
    reason: DenyReasonV1Z.nullable(),
    timestamp: z.number().int().nonnegative(),
    policyRefs: z.array(z.string().min(1))
  })
  .strict();

export type ProposalLogRecordV1 = z.infer<typeof ProposalLogRecordV1Z>;
