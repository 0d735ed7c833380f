// Hysteresis evaluator and risk accountant cases.

import assert from "node:assert";

import type { SeverityV1 } from "@vitalgate/contracts";

import {
  computeRiskV1,
  evaluateAxisV1,
  evaluateEnvelopeV1,
  initialAxisStateV1,
  rawRiskV1,
  RoHMonotonicityViolation,
  type AxisStateV1
} from "../index";
import { cardiac, hysteresis, kernelConfig, skin } from "./fixtures";

function run(values: Array<number | undefined>, epochDurationSeconds = 5): SeverityV1[] {
  let state = initialAxisStateV1("cardiac");
  const out: SeverityV1[] = [];
  for (const v of values) {
    state = evaluateAxisV1(state, v, cardiac, hysteresis, epochDurationSeconds);
    out.push(state.severity);
  }
  return out;
}

// Two epochs over the warn bound then back inside: never WARN.
assert.deepEqual(run([110, 110, 80, 80]), ["INFO", "INFO", "INFO", "INFO"]);

// Three consecutive epochs over the warn bound: WARN on the third.
assert.deepEqual(run([110, 110, 110]), ["INFO", "INFO", "WARN"]);

// Outside the safe band for riskEpochsToDowngrade epochs: RISK. Back down one
// step per epoch once inside long enough.
assert.deepEqual(run([140, 140, 80, 80, 80]), ["INFO", "RISK", "RISK", "WARN", "INFO"]);

// Fast transient inside the warn band: 60 -> 99 in 1 s is 39/s > 10/s.
assert.deepEqual(run([60, 99, 99], 1), ["INFO", "WARN", "INFO"]);

// Same jump spread over 5 s is 7.8/s: no spike.
assert.deepEqual(run([60, 99, 99], 5), ["INFO", "INFO", "INFO"]);

// A gap leaves the state untouched, including the consecutive counters.
{
  let state = initialAxisStateV1("cardiac");
  state = evaluateAxisV1(state, 110, cardiac, hysteresis, 5);
  state = evaluateAxisV1(state, 110, cardiac, hysteresis, 5);
  const held = evaluateAxisV1(state, undefined, cardiac, hysteresis, 5);
  assert.strictEqual(held, state);
  assert.strictEqual(evaluateAxisV1(state, Number.NaN, cardiac, hysteresis, 5), state);
  const third = evaluateAxisV1(held, 110, cardiac, hysteresis, 5);
  assert.equal(third.severity, "WARN");
  assert.equal(third.consecutiveAboveCount, 3);
  assert.ok(Object.isFrozen(third));
}

// Envelope: one state per configured axis, absent channel starts at INFO.
{
  const snapshot = { subjectId: "s-1", epochIndex: 0, epochDurationSeconds: 5, channels: { heartRate: 72 } };
  const states = evaluateEnvelopeV1(snapshot, [], [cardiac, skin], hysteresis);
  assert.deepEqual(
    states.map((s) => [s.axis, s.severity, s.lastValue]),
    [
      ["cardiac", "INFO", 72],
      ["skin", "INFO", null]
    ]
  );
  assert.equal(states[0].consecutiveBelowCount, 1);
  assert.equal(states[1].consecutiveBelowCount, 0);
}

// --- Risk accountant ---
function withSeverity(axis: string, severity: SeverityV1): AxisStateV1 {
  return { ...initialAxisStateV1(axis), severity };
}

const mixed = [
  withSeverity("a", "WARN"),
  withSeverity("b", "RISK"),
  withSeverity("c", "INFO"),
  withSeverity("d", "INFO")
];

// 0.2 * 1/4 + 0.6 * 1/4
assert.ok(Math.abs(rawRiskV1(mixed, kernelConfig.risk) - 0.2) < 1e-12);
assert.equal(rawRiskV1([], kernelConfig.risk), 0);
assert.equal(
  rawRiskV1([withSeverity("a", "RISK")], { ...kernelConfig.risk, weights: { warn: 2, risk: 4 } }),
  1
);
assert.ok(Math.abs(computeRiskV1(mixed, kernelConfig.risk, 0.1) - 0.2) < 1e-12);

{
  let caught: unknown = null;
  try {
    computeRiskV1(mixed, kernelConfig.risk, 0.3);
  } catch (err: unknown) {
    caught = err;
  }
  assert.ok(caught instanceof RoHMonotonicityViolation);
  assert.equal(caught.before, 0.3);
  assert.ok(Math.abs(caught.rawAfter - 0.2) < 1e-12);
  assert.ok(caught.message.startsWith("ROH_MONOTONICITY_VIOLATION:"));
}

console.log("control-kernel hysteresis/risk cases ok");
