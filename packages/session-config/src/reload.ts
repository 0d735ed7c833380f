// Non-relaxing reload: a running session may only tighten what the kernel path
// reads. Axis lower bounds may rise, upper bounds and rate limits may fall, axes
// may be added; ceilings may fall. Hysteresis counts, risk weights and the policy
// section are fixed for the life of the session. Asset and overlay sections are
// advisory and may change freely. Every violation is reported, all at once.

import { CAPABILITY_TIERS_V1, type AxisThresholdsV1, type SessionConfigV1 } from "@vitalgate/contracts";

import { ConfigRelaxationRejected } from "./errors";

const LOWER_BOUNDS = ["minSafe", "minWarn"] as const;
const UPPER_BOUNDS = ["maxWarn", "maxSafe", "maxDeltaPerSec"] as const;

function axisRelaxations(active: AxisThresholdsV1, next: AxisThresholdsV1): string[] {
  const out: string[] = [];
  if (next.channel !== active.channel) {
    out.push(`AXIS_CHANNEL_CHANGED: ${active.axis} ${active.channel} -> ${next.channel}`);
  }
  for (const key of LOWER_BOUNDS) {
    if (next[key] < active[key]) out.push(`THRESHOLD_LOWERED: ${active.axis}.${key} ${active[key]} -> ${next[key]}`);
  }
  for (const key of UPPER_BOUNDS) {
    if (next[key] > active[key]) out.push(`THRESHOLD_RAISED: ${active.axis}.${key} ${active[key]} -> ${next[key]}`);
  }
  return out;
}

// Each count gates one escalation and one de-escalation, so any change loosens one of them.
function hysteresisChanges(active: SessionConfigV1["hysteresis"], next: SessionConfigV1["hysteresis"]): string[] {
  const out: string[] = [];
  for (const key of ["warnEpochsToFlag", "riskEpochsToDowngrade"] as const) {
    if (next[key] !== active[key]) out.push(`HYSTERESIS_CHANGED: hysteresis.${key} ${active[key]} -> ${next[key]}`);
  }
  return out;
}

function riskRelaxations(active: SessionConfigV1["risk"], next: SessionConfigV1["risk"]): string[] {
  const out: string[] = [];
  for (const key of ["warn", "risk"] as const) {
    if (next.weights[key] !== active.weights[key]) {
      out.push(`RISK_WEIGHT_CHANGED: risk.weights.${key} ${active.weights[key]} -> ${next.weights[key]}`);
    }
  }
  if (next.globalCeiling > active.globalCeiling) {
    out.push(`CEILING_RAISED: risk.globalCeiling ${active.globalCeiling} -> ${next.globalCeiling}`);
  }
  for (const tier of CAPABILITY_TIERS_V1) {
    if (next.tierCeilings[tier] > active.tierCeilings[tier]) {
      out.push(`CEILING_RAISED: risk.tierCeilings.${tier} ${active.tierCeilings[tier]} -> ${next.tierCeilings[tier]}`);
    }
  }
  return out;
}

/**
 * Lists every way `next` relaxes `active`. Empty means the reload is allowed.
 */
export function listRelaxationsV1(active: SessionConfigV1, next: SessionConfigV1): string[] {
  const byId = new Map(next.axes.map((a) => [a.axis, a]));
  const out: string[] = [];
  for (const a of active.axes) {
    const replacement = byId.get(a.axis);
    if (replacement === undefined) {
      out.push(`AXIS_DROPPED: ${a.axis}`);
      continue;
    }
    out.push(...axisRelaxations(a, replacement));
  }
  out.push(...hysteresisChanges(active.hysteresis, next.hysteresis));
  out.push(...riskRelaxations(active.risk, next.risk));
  // Both sides are schema-parsed, so key order is the schema's.
  if (JSON.stringify(next.policy) !== JSON.stringify(active.policy)) out.push("POLICY_CHANGED: policy");
  return out;
}

export function assertNonRelaxingReloadV1(active: SessionConfigV1, next: SessionConfigV1): void {
  const violations = listRelaxationsV1(active, next);
  if (violations.length > 0) throw new ConfigRelaxationRejected(violations);
}
