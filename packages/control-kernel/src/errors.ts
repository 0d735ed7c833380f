// Control Kernel - typed errors.
//
// Deny outcomes are values (DecisionV1), not exceptions. The classes below are
// protocol errors raised around the kernel: by the accountant before a proposal
// exists, or by the state cell when a commit does not match its proposal.

export class RoHMonotonicityViolation extends Error {
  public readonly code = "ROH_MONOTONICITY_VIOLATION";
  public readonly before: number;
  public readonly rawAfter: number;

  constructor(before: number, rawAfter: number) {
    super(`ROH_MONOTONICITY_VIOLATION: raw risk ${rawAfter} < committed risk ${before}`);
    this.name = "RoHMonotonicityViolation";
    this.before = before;
    this.rawAfter = rawAfter;
  }
}

export class StaleProposalError extends Error {
  public readonly code = "STALE_PROPOSAL";

  constructor(detail: string) {
    super(`STALE_PROPOSAL: ${detail}`);
    this.name = "StaleProposalError";
  }
}
