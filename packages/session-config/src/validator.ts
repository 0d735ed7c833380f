// Session config admission (v1)
//
// Gate 1: strict structural parse (no extra fields, every tier keyed).
// Gate 2: cross-field checks the schema cannot express. The first failing
// check throws; a config that returns from here is safe to hand to the kernel,
// the asset engine and the overlay as-is.

import {
  CAPABILITY_TIERS_V1,
  parseSessionConfigV1,
  type AxisThresholdsV1,
  type SessionConfigV1
} from "@vitalgate/contracts";

function admissionError(detail: string): Error {
  return new Error(`SESSION_CONFIG_ADMISSION_INVALID: ${detail}`);
}

function ensureThresholdOrder(a: AxisThresholdsV1): void {
  const ordered = a.minSafe <= a.minWarn && a.minWarn <= a.maxWarn && a.maxWarn <= a.maxSafe;
  if (!ordered || !(a.minSafe < a.maxSafe)) {
    throw admissionError(
      `axis thresholds out of order: ${a.axis} (${a.minSafe}, ${a.minWarn}, ${a.maxWarn}, ${a.maxSafe})`
    );
  }
}

function ensureUniqueAxes(axes: ReadonlyArray<AxisThresholdsV1>): void {
  const seen = new Set<string>();
  for (const a of axes) {
    if (seen.has(a.axis)) throw admissionError(`duplicate axis id: ${a.axis}`);
    seen.add(a.axis);
  }
}

function ensureCeilings(risk: SessionConfigV1["risk"]): void {
  let previous = risk.globalCeiling;
  for (const tier of CAPABILITY_TIERS_V1) {
    const ceiling = risk.tierCeilings[tier];
    if (ceiling > risk.globalCeiling) {
      throw admissionError(`tier ceiling above global ceiling: ${tier} ${ceiling} > ${risk.globalCeiling}`);
    }
    // More exposed tiers tolerate less risk.
    if (ceiling > previous) {
      throw admissionError(`tier ceilings must be non-increasing: ${tier} ${ceiling} > ${previous}`);
    }
    previous = ceiling;
  }
}

function ensureWeightGroups(weights: SessionConfigV1["assets"]["weights"]): void {
  const groups: Array<[string, Record<string, number>]> = [
    ["wave", weights.wave],
    ["fear", weights.fear],
    ["pain", weights.pain],
    ["breath", weights.breath]
  ];
  for (const [name, group] of groups) {
    const sum = Object.values(group).reduce((acc, w) => acc + w, 0);
    if (!(sum > 0)) throw admissionError(`asset weight group sums to zero: ${name}`);
  }
}

function ensureReversalQuorum(reversal: SessionConfigV1["policy"]["reversal"]): void {
  if (reversal.allowReversal && reversal.quorum.length === 0) {
    throw admissionError("reversal allowed without a signer quorum");
  }
}

function ensureOverlayBands(overlay: SessionConfigV1["overlay"]): void {
  if (overlay.gamma.elevated > overlay.gamma.overload) {
    throw admissionError(`gamma elevated above overload: ${overlay.gamma.elevated} > ${overlay.gamma.overload}`);
  }
}

export function validateSessionConfigV1(input: unknown): SessionConfigV1 {
  const parsed = parseSessionConfigV1(input);

  ensureUniqueAxes(parsed.axes);
  parsed.axes.forEach(ensureThresholdOrder);
  ensureCeilings(parsed.risk);
  ensureWeightGroups(parsed.assets.weights);
  ensureReversalQuorum(parsed.policy.reversal);
  ensureOverlayBands(parsed.overlay);

  return parsed;
}

export function isSessionConfigV1(input: unknown): input is SessionConfigV1 {
  try {
    validateSessionConfigV1(input);
    return true;
  } catch {
    return false;
  }
}
