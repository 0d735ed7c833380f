// Control Kernel - Committed state
//
// The only holder of a session's capability tier and risk score. Nothing else
// writes them; the overlay side sees the frozen KernelStateViewV1 only.

import type {
  CapabilityTierV1,
  DecisionV1,
  KernelStateViewV1,
  RiskConfigV1,
  TransitionProposalV1
} from "@vitalgate/contracts";

import { StaleProposalError } from "../errors";

export interface KernelStateInitV1 {
  tier: CapabilityTierV1;
  risk: number;
  /** Carried over when a session resumes an existing chain. */
  acceptedTransitionCount?: number;
}

export class KernelStateCell {
  private tier: CapabilityTierV1;
  private risk: number;
  private acceptedTransitionCount = 0;
  private riskConfig: RiskConfigV1;

  constructor(riskConfig: RiskConfigV1, init: KernelStateInitV1 = { tier: "MODEL_ONLY", risk: 0 }) {
    this.riskConfig = riskConfig;
    this.tier = init.tier;
    this.risk = init.risk;
    this.acceptedTransitionCount = init.acceptedTransitionCount ?? 0;
  }

  view(): KernelStateViewV1 {
    return Object.freeze({
      tier: this.tier,
      risk: this.risk,
      riskCeiling: this.riskConfig.tierCeilings[this.tier],
      acceptedTransitionCount: this.acceptedTransitionCount
    });
  }

  /**
   * Applies a decided proposal. Only ACCEPT changes state; a DENY is still
   * checked against the cell so a decision made on stale inputs is caught.
   *
   * @throws StaleProposalError when the proposal was built from another state.
   */
  commit(decision: DecisionV1, proposal: Readonly<TransitionProposalV1>): KernelStateViewV1 {
    if (proposal.fromState !== this.tier) {
      throw new StaleProposalError(`fromState ${proposal.fromState} != ${this.tier} @ ${proposal.proposalId}`);
    }
    if (proposal.riskBefore !== this.risk) {
      throw new StaleProposalError(`riskBefore ${proposal.riskBefore} != ${this.risk} @ ${proposal.proposalId}`);
    }

    if (decision.verdict === "ACCEPT") {
      this.tier = proposal.toState;
      this.risk = proposal.riskAfter;
      this.acceptedTransitionCount += 1;
    }
    return this.view();
  }

  /** Ceilings may change on a (non-relaxing) reload; committed values do not. */
  reconfigure(riskConfig: RiskConfigV1): void {
    this.riskConfig = riskConfig;
  }
}
