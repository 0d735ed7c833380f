// Shared inline fixtures for the control-kernel tests.

import type { AxisThresholdsV1, HysteresisConfigV1, TransitionProposalV1 } from "@vitalgate/contracts";

import type { KernelConfigV1 } from "../kernel";

export const kernelConfig: KernelConfigV1 = {
  risk: {
    weights: { warn: 0.2, risk: 0.6 },
    globalCeiling: 1,
    tierCeilings: { MODEL_ONLY: 1, LAB_BENCH: 0.6, CONTROLLED_HUMAN: 0.3, GENERAL_USE: 0.2 }
  },
  policy: {
    allowedJurisdictions: ["ZZ"],
    rolesByTier: {
      MODEL_ONLY: ["OPERATOR", "KERNEL"],
      LAB_BENCH: ["OPERATOR"],
      CONTROLLED_HUMAN: ["OPERATOR", "HOST"],
      GENERAL_USE: ["REGULATOR"]
    },
    multiTierPolicyRefs: ["policy/multi-tier-escalation"],
    reversal: {
      allowReversal: true,
      quorum: [
        { role: "OWNER", count: 1 },
        { role: "REGULATOR", count: 1 }
      ]
    }
  }
};

export const upgrade: TransitionProposalV1 = {
  proposalId: "p-up",
  fromState: "MODEL_ONLY",
  toState: "LAB_BENCH",
  riskBefore: 0.1,
  riskAfter: 0.2,
  epochIndex: 4,
  evaluatedAtMs: 5000,
  consent: { token: "test-consent", scope: ["LAB_BENCH", "CONTROLLED_HUMAN"], validFromMs: 1000, validUntilMs: 10000 },
  role: "OPERATOR",
  jurisdiction: "ZZ",
  policyRefs: []
};

export const downgrade: TransitionProposalV1 = {
  ...upgrade,
  proposalId: "p-down",
  fromState: "CONTROLLED_HUMAN",
  toState: "LAB_BENCH",
  riskBefore: 0.2,
  riskAfter: 0.2,
  reversal: { explicitOrder: true, noSaferAlternative: true, signerRoles: ["OWNER", "REGULATOR"] }
};

export const cardiac: AxisThresholdsV1 = {
  axis: "cardiac",
  channel: "heartRate",
  minSafe: 40,
  minWarn: 50,
  maxWarn: 100,
  maxSafe: 130,
  maxDeltaPerSec: 10
};

export const skin: AxisThresholdsV1 = {
  axis: "skin",
  channel: "eda",
  minSafe: 0,
  minWarn: 0.1,
  maxWarn: 0.8,
  maxSafe: 0.95,
  maxDeltaPerSec: 0.2
};

export const hysteresis: HysteresisConfigV1 = { warnEpochsToFlag: 3, riskEpochsToDowngrade: 2 };

/**
 * Seeded PRNG (mulberry32) so generated cases are reproducible.
 */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
