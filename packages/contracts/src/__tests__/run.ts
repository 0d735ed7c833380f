// Test runner for @vitalgate/contracts.
//
// Plain script: throws on the first failure, prints one line on success.

import assert from "node:assert";

import {
  decodeDecisionV1,
  encodeDecisionV1,
  parseDiagnosticAnnotationV1,
  parseLedgerEntryV1,
  parseSignalSnapshotV1,
  parseTransitionRequestV1,
  type AssetVectorV1
} from "../index";

function expectThrows(fn: () => void, contains: string): void {
  let threw = false;
  try {
    fn();
  } catch (err: unknown) {
    threw = true;
    const msg = err instanceof Error ? err.message : String(err);
    assert.ok(msg.includes(contains), `expected error containing "${contains}", got "${msg}"`);
  }
  assert.ok(threw, `expected throw containing "${contains}", but no error was thrown`);
}

// --- Decision encoding ---
assert.equal(encodeDecisionV1({ verdict: "ACCEPT" }), "ACCEPT");
assert.equal(encodeDecisionV1({ verdict: "DENY", reason: "RISK_INVARIANT" }), "DENY:RISK_INVARIANT");
assert.equal(
  encodeDecisionV1({ verdict: "DENY", reason: "POLICY_VIOLATION", detail: "JURISDICTION" }),
  "DENY:POLICY_VIOLATION:JURISDICTION"
);
assert.deepEqual(decodeDecisionV1("ACCEPT"), { verdict: "ACCEPT" });
assert.deepEqual(decodeDecisionV1("DENY:REVERSAL_CONDITIONS_UNMET:QUORUM"), {
  verdict: "DENY",
  reason: "REVERSAL_CONDITIONS_UNMET",
  detail: "QUORUM"
});
assert.deepEqual(decodeDecisionV1("DENY:CONSENT_INVALID"), { verdict: "DENY", reason: "CONSENT_INVALID" });
expectThrows(() => decodeDecisionV1("DENY:SOMETHING_ELSE"), "DECISION_CODE_INVALID");
expectThrows(() => decodeDecisionV1("MAYBE"), "DECISION_CODE_INVALID");

// --- Snapshot admission ---
const snapshot = parseSignalSnapshotV1({
  subjectId: "subject-a",
  epochIndex: 3,
  epochDurationSeconds: 5,
  channels: { heartRate: 72, eda: 0.4 }
});
assert.equal(snapshot.channels.heartRate, 72);
assert.equal(snapshot.channels.motion, undefined);
assert.ok(Object.isFrozen(snapshot));
assert.ok(Object.isFrozen(snapshot.channels));
expectThrows(
  () => parseSignalSnapshotV1({ subjectId: "s", epochIndex: 0, epochDurationSeconds: 0, channels: {} }),
  "epochDurationSeconds"
);
expectThrows(
  () => parseSignalSnapshotV1({ subjectId: "s", epochIndex: 0, epochDurationSeconds: 1, channels: { skinTone: 1 } }),
  "Unrecognized key"
);

// --- Transition request admission ---
const request = parseTransitionRequestV1({
  proposalId: "p-1",
  toState: "LAB_BENCH",
  consent: { token: "test-consent", scope: ["LAB_BENCH"], validFromMs: 0, validUntilMs: 10_000 },
  role: "OPERATOR",
  jurisdiction: "ZZ",
  policyRefs: []
});
assert.equal(request.toState, "LAB_BENCH");
expectThrows(
  () => parseTransitionRequestV1({ ...request, toState: "EVERYTHING" }),
  "toState"
);

// --- Ledger entry shape ---
const zeroHash = "sha256:" + "0".repeat(64);
const entry = parseLedgerEntryV1({
  proposalId: "p-1",
  decision: "ACCEPT",
  riskBefore: 0,
  riskAfter: 0.1,
  prevHash: zeroHash,
  entryHash: "sha256:" + "a".repeat(64),
  timestamp: 1000,
  policyRefs: []
});
assert.equal(entry.prevHash, zeroHash);
expectThrows(() => parseLedgerEntryV1({ ...entry, entryHash: "md5:abc" }), "entryHash");

// --- Annotation is closed: no kernel-authoritative field may ride along ---
const view: AssetVectorV1 = {
  BLOOD: 0.5, OXYGEN: 0.5, WAVE: 0.5, TIME: 0, DECAY: 0, LIFEFORCE: 1, BRAIN: 0, SMART: 0,
  EVOLVE: 0, POWER: 0, TECH: 0, FEAR: 0.5, PAIN: 0.5, NANO: 0, BREATH: 0.5
};
const annotation = {
  proposalId: "p-1",
  epochIndex: 3,
  tagVocabularyVersion: "1.0.0",
  treeOfLifeView: view,
  envelopeStates: { cardiac: "INFO" },
  diagnostics: { row: null, rowState: "GAP", gammaWaveState: "NOMINAL", natureTags: [] }
};
assert.equal(parseDiagnosticAnnotationV1(annotation).diagnostics.row, null);
expectThrows(() => parseDiagnosticAnnotationV1({ ...annotation, entryHash: zeroHash }), "Unrecognized key");
expectThrows(
  () => parseDiagnosticAnnotationV1({ ...annotation, diagnostics: { ...annotation.diagnostics, natureTags: ["PANIC"] } }),
  "natureTags"
);
expectThrows(() => parseDiagnosticAnnotationV1({ ...annotation, tagVocabularyVersion: "2.0.0" }), "tagVocabularyVersion");

console.log("contracts tests ok");
