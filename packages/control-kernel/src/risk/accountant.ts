// Control Kernel - Risk accountant (v1)
//
// Aggregates axis severities into one risk score:
//   raw = weights.warn * (#WARN / #axes) + weights.risk * (#RISK / #axes)
// clamped into [0, globalCeiling]. A score that would fall below the committed
// score is a protocol error, never floored. The tier ceiling is the kernel's
// check, not a clamp here.

import type { RiskConfigV1 } from "@vitalgate/contracts";

import type { AxisStateV1 } from "../envelope/hysteresis";
import { RoHMonotonicityViolation } from "../errors";

export function rawRiskV1(axisStates: ReadonlyArray<AxisStateV1>, risk: RiskConfigV1): number {
  if (axisStates.length === 0) return 0;

  let warn = 0;
  let atRisk = 0;
  for (const s of axisStates) {
    if (s.severity === "WARN") warn += 1;
    else if (s.severity === "RISK") atRisk += 1;
  }

  const n = axisStates.length;
  const raw = risk.weights.warn * (warn / n) + risk.weights.risk * (atRisk / n);
  return Math.min(Math.max(raw, 0), risk.globalCeiling);
}

/**
 * Computes riskAfter for the current epoch.
 *
 * @param before - Committed risk score of the session.
 * @throws RoHMonotonicityViolation when the computed score is below `before`.
 */
export function computeRiskV1(
  axisStates: ReadonlyArray<AxisStateV1>,
  risk: RiskConfigV1,
  before: number
): number {
  const after = rawRiskV1(axisStates, risk);
  if (after < before) {
    throw new RoHMonotonicityViolation(before, after);
  }
  return after;
}
