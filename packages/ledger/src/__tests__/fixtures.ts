import type { DiagnosticAnnotationV1, TransitionProposalV1 } from "@vitalgate/contracts";

export function proposal(id: string, riskBefore: number, riskAfter: number): TransitionProposalV1 {
  return {
    proposalId: id,
    fromState: "MODEL_ONLY",
    toState: "LAB_BENCH",
    riskBefore,
    riskAfter,
    epochIndex: 0,
    evaluatedAtMs: 1000,
    consent: { token: "test-consent", scope: ["LAB_BENCH"], validFromMs: 0, validUntilMs: 10_000 },
    role: "OPERATOR",
    jurisdiction: "ZZ",
    policyRefs: ["policy/base"]
  };
}

export function annotation(proposalId: string, epochIndex: number): DiagnosticAnnotationV1 {
  return {
    proposalId,
    epochIndex,
    tagVocabularyVersion: "1.0.0",
    treeOfLifeView: {
      BLOOD: 0.5, OXYGEN: 0.5, WAVE: 0.5, TIME: 0, DECAY: 0.1, LIFEFORCE: 0.9, BRAIN: 0, SMART: 0,
      EVOLVE: 0, POWER: 0, TECH: 0, FEAR: 0, PAIN: 0, NANO: 0, BREATH: 0.5
    },
    envelopeStates: { cardiac: "INFO" },
    diagnostics: { row: null, rowState: "GAP", gammaWaveState: "NOMINAL", natureTags: [] }
  };
}
