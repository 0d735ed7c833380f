// Control Kernel - Reversal conditions (v1)
//
// A downgrade is denied unless every condition below holds. Checked in order;
// the first unmet condition is reported.

import type { PolicyConfigV1, SignerRoleV1 } from "@vitalgate/contracts";

import type { KernelInputV1 } from "../inputs/projector";

export const REVERSAL_CONDITIONS_V1 = Object.freeze([
  "REVERSAL_ALLOWED",
  "EXPLICIT_ORDER",
  "NO_SAFER_ALTERNATIVE",
  "QUORUM"
] as const);

export type ReversalConditionV1 = (typeof REVERSAL_CONDITIONS_V1)[number];

type ReversalPolicyV1 = PolicyConfigV1["reversal"];

/**
 * An empty quorum policy is unmet: there is no signer set that authorizes a
 * downgrade without one.
 */
export function quorumSatisfiedV1(
  signerRoles: ReadonlyArray<SignerRoleV1>,
  quorum: ReversalPolicyV1["quorum"]
): boolean {
  if (quorum.length === 0) return false;
  return quorum.every(({ role, count }) => signerRoles.filter((r) => r === role).length >= count);
}

export function firstUnmetReversalConditionV1(
  input: KernelInputV1,
  reversalPolicy: ReversalPolicyV1
): ReversalConditionV1 | null {
  if (!reversalPolicy.allowReversal) return "REVERSAL_ALLOWED";

  const evidence = input.reversal;
  if (evidence === null || !evidence.explicitOrder) return "EXPLICIT_ORDER";
  if (!evidence.noSaferAlternative) return "NO_SAFER_ALTERNATIVE";
  if (!quorumSatisfiedV1(evidence.signerRoles, reversalPolicy.quorum)) return "QUORUM";
  return null;
}
