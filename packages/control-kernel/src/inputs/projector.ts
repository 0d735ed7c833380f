// Control Kernel - Proposal projector
//
// Single choke point between a TransitionProposalV1 and the kernel. Copies only
// allowlisted fields into a frozen KernelInputV1, so the kernel cannot read a
// field it was not meant to see and cannot be handed a reference it could mutate.

import type { CapabilityTierV1, SignerRoleV1, TransitionProposalV1 } from "@vitalgate/contracts";

import { isAllowedKernelInputFieldV1 } from "./allowed_input_paths";

export interface KernelConsentV1 {
  readonly token: string;
  readonly scope: ReadonlyArray<CapabilityTierV1>;
  readonly validFromMs: number;
  readonly validUntilMs: number;
  readonly revoked: boolean;
}

export interface KernelReversalV1 {
  readonly explicitOrder: boolean;
  readonly noSaferAlternative: boolean;
  readonly signerRoles: ReadonlyArray<SignerRoleV1>;
}

/**
 * The only structure the kernel reads.
 */
export interface KernelInputV1 {
  readonly proposalId: string;
  readonly fromState: CapabilityTierV1;
  readonly toState: CapabilityTierV1;
  readonly riskBefore: number;
  readonly riskAfter: number;
  readonly consent: KernelConsentV1;
  readonly role: SignerRoleV1;
  readonly jurisdiction: string;
  readonly policyRefs: ReadonlyArray<string>;
  /** null when the proposal carries no reversal evidence. */
  readonly reversal: KernelReversalV1 | null;
  readonly evaluatedAtMs: number;
}

export function projectProposalV1(proposal: Readonly<TransitionProposalV1>): KernelInputV1 {
  const { consent, reversal } = proposal;

  const out: KernelInputV1 = {
    proposalId: proposal.proposalId,
    fromState: proposal.fromState,
    toState: proposal.toState,
    riskBefore: proposal.riskBefore,
    riskAfter: proposal.riskAfter,
    consent: Object.freeze({
      token: consent.token,
      scope: Object.freeze([...consent.scope]),
      validFromMs: consent.validFromMs,
      validUntilMs: consent.validUntilMs,
      revoked: consent.revoked === true
    }),
    role: proposal.role,
    jurisdiction: proposal.jurisdiction,
    policyRefs: Object.freeze([...proposal.policyRefs]),
    reversal:
      reversal === undefined
        ? null
        : Object.freeze({
            explicitOrder: reversal.explicitOrder,
            noSaferAlternative: reversal.noSaferAlternative,
            signerRoles: Object.freeze([...reversal.signerRoles])
          }),
    evaluatedAtMs: proposal.evaluatedAtMs
  };

  // Catches a field added here without being added to the allowlist.
  for (const key of Object.keys(out)) {
    if (!isAllowedKernelInputFieldV1(key)) {
      throw new Error(`INTERNAL_BUG_UNALLOWED_KEY_EMITTED: ${key}`);
    }
  }

  return Object.freeze(out);
}
