// packages/contracts/src/schema/transition_v1.ts
import { z } from "zod";

import { CapabilityTierV1Z, ConsentStateV1Z, ReversalEvidenceV1Z, SignerRoleV1Z } from "./capability_v1";

/**
 * The externally supplied half of a proposal. The runtime completes it with
 * kernel-owned fields (fromState, risk pair, epoch, evaluation time).
 */
export const TransitionRequestV1Z = z
  .object({
    proposalId: z.string().min(1),
    toState: CapabilityTierV1Z,
    consent: ConsentStateV1Z,
    role: SignerRoleV1Z,
    jurisdiction: z.string().min(1),
    policyRefs: z.array(z.string().min(1)),
    reversal: ReversalEvidenceV1Z.optional()
  })
  .strict();

export type TransitionRequestV1 = z.infer<typeof TransitionRequestV1Z>;

export const TransitionProposalV1Z = TransitionRequestV1Z.extend({
  fromState: CapabilityTierV1Z,
  riskBefore: z.number(),
  riskAfter: z.number(),
  epochIndex: z.number().int().nonnegative(),
  evaluatedAtMs: z.number().int().nonnegative()
}).strict();

export type TransitionProposalV1 = z.infer<typeof TransitionProposalV1Z>;

export function parseTransitionRequestV1(input: unknown): TransitionRequestV1 {
  return TransitionRequestV1Z.parse(input);
}
