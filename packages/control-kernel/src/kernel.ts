// Control Kernel - Pure evaluation entrypoint (v1)
//
// evaluateTransitionV1:
// 1) Projects the proposal into a frozen KernelInputV1 (strict allowlist).
// 2) Checks, in order: risk invariant, consent, policy stack, reversal conditions.
// 3) Returns a frozen DecisionV1.
//
// No IO. No clock. No state between calls. The caller commits state only after
// an ACCEPT (see KernelStateCell).

import type {
  DecisionV1,
  PolicyConfigV1,
  RiskConfigV1,
  TransitionProposalV1
} from "@vitalgate/contracts";

import { projectProposalV1, type KernelInputV1 } from "./inputs/projector";
import { firstFailingPolicyV1 } from "./policy/predicates";
import { firstUnmetReversalConditionV1 } from "./reversal/reversal_conditions";
import { isDowngradeV1 } from "./taxonomy/capability_tiers";

/**
 * Session configuration slice the kernel reads.
 */
export interface KernelConfigV1 {
  readonly risk: RiskConfigV1;
  readonly policy: PolicyConfigV1;
}

/**
 * Decides one capability transition.
 *
 * @returns ACCEPT, or DENY with the first failing check as reason/detail.
 */
export function evaluateTransitionV1(
  proposal: Readonly<TransitionProposalV1>,
  config: KernelConfigV1
): DecisionV1 {
  const input = projectProposalV1(proposal);
  return Object.freeze(decideV1(input, config));
}

function decideV1(input: KernelInputV1, config: KernelConfigV1): DecisionV1 {
  const riskDetail = checkRiskInvariantV1(input, config.risk);
  if (riskDetail !== null) return { verdict: "DENY", reason: "RISK_INVARIANT", detail: riskDetail };

  const consentDetail = checkConsentV1(input);
  if (consentDetail !== null) return { verdict: "DENY", reason: "CONSENT_INVALID", detail: consentDetail };

  const failedPredicate = firstFailingPolicyV1(input, config.policy);
  if (failedPredicate !== null) return { verdict: "DENY", reason: "POLICY_VIOLATION", detail: failedPredicate };

  if (isDowngradeV1(input.fromState, input.toState)) {
    const unmet = firstUnmetReversalConditionV1(input, config.policy.reversal);
    if (unmet !== null) return { verdict: "DENY", reason: "REVERSAL_CONDITIONS_UNMET", detail: unmet };
  }

  return { verdict: "ACCEPT" };
}

function checkRiskInvariantV1(input: KernelInputV1, risk: RiskConfigV1): string | null {
  const { riskBefore, riskAfter } = input;
  if (!Number.isFinite(riskBefore) || !Number.isFinite(riskAfter)) return "NON_FINITE";
  if (riskAfter < riskBefore) return "MONOTONICITY";
  if (riskAfter > risk.tierCeilings[input.toState]) return "CEILING";
  return null;
}

function checkConsentV1(input: KernelInputV1): string | null {
  const { consent } = input;
  if (consent.revoked) return "REVOKED";
  if (input.evaluatedAtMs < consent.validFromMs) return "NOT_YET_VALID";
  if (input.evaluatedAtMs >= consent.validUntilMs) return "EXPIRED";
  if (!consent.scope.includes(input.toState)) return "OUT_OF_SCOPE";
  return null;
}
