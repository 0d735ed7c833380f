import assert from "node:assert";
import * as fs from "node:fs";
import * as path from "node:path";

import type { SessionConfigV1 } from "@vitalgate/contracts";
import { ZodError } from "zod";

import {
  ConfigRelaxationRejected,
  SessionConfigHolder,
  assertNonRelaxingReloadV1,
  isSessionConfigV1,
  listRelaxationsV1,
  loadSessionConfigFromFile,
  validateSessionConfigV1
} from "../index";

function fixturePath(name: string): string {
  return path.resolve(__dirname, "../../fixtures", name);
}

function readFixtureJson(name: string): unknown {
  return JSON.parse(fs.readFileSync(fixturePath(name), "utf8"));
}

function expectAdmissionFail(name: string, message: string): void {
  assert.throws(() => validateSessionConfigV1(readFixtureJson(name)), { message });
}

// --- Admission ---
const ok = validateSessionConfigV1(readFixtureJson("session_config_ok_001.json"));
assert.deepEqual(
  ok.axes.map((a) => a.axis),
  ["cardiac", "skin"]
);
assert.equal(isSessionConfigV1(ok), true);

expectAdmissionFail(
  "session_config_bad_threshold_order_001.json",
  "SESSION_CONFIG_ADMISSION_INVALID: axis thresholds out of order: cardiac (40, 35, 100, 130)"
);
expectAdmissionFail(
  "session_config_bad_ceiling_order_001.json",
  "SESSION_CONFIG_ADMISSION_INVALID: tier ceilings must be non-increasing: GENERAL_USE 0.4 > 0.3"
);
expectAdmissionFail(
  "session_config_bad_duplicate_axis_001.json",
  "SESSION_CONFIG_ADMISSION_INVALID: duplicate axis id: cardiac"
);
expectAdmissionFail(
  "session_config_bad_empty_quorum_001.json",
  "SESSION_CONFIG_ADMISSION_INVALID: reversal allowed without a signer quorum"
);
assert.throws(() => validateSessionConfigV1(readFixtureJson("session_config_bad_unknown_field_001.json")), ZodError);
assert.equal(isSessionConfigV1(readFixtureJson("session_config_bad_unknown_field_001.json")), false);

{
  const aboveGlobal = { ...ok, risk: { ...ok.risk, tierCeilings: { ...ok.risk.tierCeilings, MODEL_ONLY: 1.5 } } };
  assert.throws(() => validateSessionConfigV1(aboveGlobal), {
    message: "SESSION_CONFIG_ADMISSION_INVALID: tier ceiling above global ceiling: MODEL_ONLY 1.5 > 1"
  });

  const zeroFear = {
    ...ok,
    assets: { ...ok.assets, weights: { ...ok.assets.weights, fear: { eda: 0, heartRate: 0 } } }
  };
  assert.throws(() => validateSessionConfigV1(zeroFear), {
    message: "SESSION_CONFIG_ADMISSION_INVALID: asset weight group sums to zero: fear"
  });

  const gammaInverted = { ...ok, overlay: { ...ok.overlay, gamma: { elevated: 0.9, overload: 0.8 } } };
  assert.throws(() => validateSessionConfigV1(gammaInverted), {
    message: "SESSION_CONFIG_ADMISSION_INVALID: gamma elevated above overload: 0.9 > 0.8"
  });
}
console.log("[OK] admission");

// --- Non-relaxing reload ---
function withAxes(base: SessionConfigV1, axes: SessionConfigV1["axes"]): SessionConfigV1 {
  return { ...base, axes };
}

const [cardiac, skin] = ok.axes;

{
  const tightened = withAxes(ok, [
    { ...cardiac, minSafe: 45, maxDeltaPerSec: 8 },
    skin,
    { axis: "breath", channel: "respirationRate", minSafe: 6, minWarn: 8, maxWarn: 24, maxSafe: 30, maxDeltaPerSec: 2 }
  ]);
  assert.deepEqual(listRelaxationsV1(ok, tightened), []);
  assertNonRelaxingReloadV1(ok, tightened);

  const relaxed = withAxes(ok, [{ ...cardiac, minSafe: 35, maxSafe: 140 }]);
  assert.deepEqual(listRelaxationsV1(ok, relaxed), [
    "THRESHOLD_LOWERED: cardiac.minSafe 40 -> 35",
    "THRESHOLD_RAISED: cardiac.maxSafe 130 -> 140",
    "AXIS_DROPPED: skin"
  ]);

  try {
    assertNonRelaxingReloadV1(ok, relaxed);
    assert.fail("expected ConfigRelaxationRejected");
  } catch (err: unknown) {
    assert.ok(err instanceof ConfigRelaxationRejected);
    assert.equal(err.code, "CONFIG_RELAXATION_REJECTED");
    assert.equal(err.violations.length, 3);
  }

  const rewired = withAxes(ok, [{ ...cardiac, channel: "heartRateVariability" }, skin]);
  assert.deepEqual(listRelaxationsV1(ok, rewired), ["AXIS_CHANNEL_CHANGED: cardiac heartRate -> heartRateVariability"]);
}
{
  const loosened: SessionConfigV1 = {
    ...ok,
    hysteresis: { warnEpochsToFlag: 50, riskEpochsToDowngrade: 50 },
    risk: {
      weights: { warn: 0, risk: 0 },
      globalCeiling: 1,
      tierCeilings: { MODEL_ONLY: 1, LAB_BENCH: 1, CONTROLLED_HUMAN: 1, GENERAL_USE: 1 }
    },
    policy: { ...ok.policy, allowedJurisdictions: ["ZZ", "YY"] }
  };
  assert.deepEqual(listRelaxationsV1(ok, loosened), [
    "HYSTERESIS_CHANGED: hysteresis.warnEpochsToFlag 3 -> 50",
    "HYSTERESIS_CHANGED: hysteresis.riskEpochsToDowngrade 2 -> 50",
    "RISK_WEIGHT_CHANGED: risk.weights.warn 0.2 -> 0",
    "RISK_WEIGHT_CHANGED: risk.weights.risk 0.6 -> 0",
    "CEILING_RAISED: risk.tierCeilings.LAB_BENCH 0.6 -> 1",
    "CEILING_RAISED: risk.tierCeilings.CONTROLLED_HUMAN 0.3 -> 1",
    "CEILING_RAISED: risk.tierCeilings.GENERAL_USE 0.2 -> 1",
    "POLICY_CHANGED: policy"
  ]);

  // Lower ceilings and retuned advisory sections are allowed.
  const lowered: SessionConfigV1 = {
    ...ok,
    risk: { ...ok.risk, tierCeilings: { ...ok.risk.tierCeilings, LAB_BENCH: 0.5 } },
    overlay: { ...ok.overlay, rowHigh: 0.1 }
  };
  assert.deepEqual(listRelaxationsV1(ok, lowered), []);
}
console.log("[OK] non-relaxing reload");

// --- Holder ---
{
  const holder = new SessionConfigHolder(readFixtureJson("session_config_ok_001.json"));
  assert.ok(Object.isFrozen(holder.current()));
  assert.ok(Object.isFrozen(holder.current().axes[0]));
  assert.ok(Object.isFrozen(holder.current().risk.tierCeilings));

  assert.throws(
    () => holder.reload(withAxes(ok, [{ ...cardiac, maxWarn: 110 }, skin])),
    ConfigRelaxationRejected
  );
  assert.equal(holder.current().axes[0].maxWarn, 100);

  // Admission failures surface before the relaxation check.
  assert.throws(() => holder.reload(withAxes(ok, [cardiac, { ...skin, axis: "cardiac" }])), {
    message: "SESSION_CONFIG_ADMISSION_INVALID: duplicate axis id: cardiac"
  });

  const next = holder.reload(withAxes(ok, [{ ...cardiac, maxWarn: 95 }, skin]));
  assert.equal(next.axes[0].maxWarn, 95);
  assert.strictEqual(holder.current(), next);
}
console.log("[OK] holder");

// --- File loader ---
{
  const applied = loadSessionConfigFromFile(fixturePath("session_config_ok_001.json"));
  assert.equal(applied.status, "APPLIED");
  assert.match(applied.config_ref, /^sha256:[0-9a-f]{64}$/);
  // Same bytes, same ref.
  assert.equal(loadSessionConfigFromFile(fixturePath("session_config_ok_001.json")).config_ref, applied.config_ref);

  assert.deepEqual(loadSessionConfigFromFile(fixturePath("DOES_NOT_EXIST.json")), {
    status: "MISSING",
    config_ref: "MISSING"
  });

  const codes = [
    "session_config_bad_json_001.json",
    "session_config_bad_unknown_field_001.json",
    "session_config_bad_threshold_order_001.json"
  ].map((name) => {
    const r = loadSessionConfigFromFile(fixturePath(name));
    assert.match(r.config_ref, /^sha256:/);
    return r.status === "INVALID" ? r.error_code : r.status;
  });
  assert.deepEqual(codes, [
    "SESSION_CONFIG_JSON_INVALID",
    "SESSION_CONFIG_ZOD_INVALID",
    "SESSION_CONFIG_ADMISSION_INVALID"
  ]);
}
console.log("[OK] file loader");

console.log("session-config tests ok");
