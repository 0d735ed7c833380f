// Control Kernel - Hysteresis evaluator (v1)
//
// Per-axis threshold state machine. One call per axis per epoch; the returned
// state replaces the prior one. Severity moves at most one step per epoch on the
// way down; on the way up a sustained excursion past the safe band goes straight
// to RISK.
//
//   INFO --(warnEpochsToFlag outside warn band | spike)--> WARN
//   INFO/WARN --(riskEpochsToDowngrade outside safe band)--> RISK
//   RISK --(riskEpochsToDowngrade inside safe band)--> WARN
//   WARN --(warnEpochsToFlag inside warn band)--> INFO
//
// A missing or non-finite channel value leaves the axis untouched: a gap is not
// evidence of recovery.

import type {
  AxisThresholdsV1,
  HysteresisConfigV1,
  SeverityV1,
  SignalSnapshotV1
} from "@vitalgate/contracts";

export interface AxisStateV1 {
  readonly axis: string;
  readonly severity: SeverityV1;
  /** Consecutive epochs outside [minWarn, maxWarn]. */
  readonly consecutiveAboveCount: number;
  /** Consecutive epochs inside [minWarn, maxWarn]. */
  readonly consecutiveBelowCount: number;
  readonly consecutiveOutsideSafeCount: number;
  readonly consecutiveInsideSafeCount: number;
  readonly lastValue: number | null;
}

export function initialAxisStateV1(axis: string): AxisStateV1 {
  return Object.freeze({
    axis,
    severity: "INFO",
    consecutiveAboveCount: 0,
    consecutiveBelowCount: 0,
    consecutiveOutsideSafeCount: 0,
    consecutiveInsideSafeCount: 0,
    lastValue: null
  });
}

/**
 * Advances one axis by one epoch.
 *
 * @param value - Channel reading for this epoch; undefined when the channel is absent.
 * @param epochDurationSeconds - Used to turn the epoch-to-epoch delta into a per-second rate.
 */
export function evaluateAxisV1(
  prior: AxisStateV1,
  value: number | undefined,
  thresholds: AxisThresholdsV1,
  hysteresis: HysteresisConfigV1,
  epochDurationSeconds: number
): AxisStateV1 {
  if (value === undefined || !Number.isFinite(value)) return prior;
  if (!(epochDurationSeconds > 0)) {
    throw new Error(`EPOCH_DURATION_INVALID: ${epochDurationSeconds} @ axis:${prior.axis}`);
  }

  const outsideWarn = value < thresholds.minWarn || value > thresholds.maxWarn;
  const outsideSafe = value < thresholds.minSafe || value > thresholds.maxSafe;

  const counts: AxisCounts = {
    above: outsideWarn ? prior.consecutiveAboveCount + 1 : 0,
    below: outsideWarn ? 0 : prior.consecutiveBelowCount + 1,
    outsideSafe: outsideSafe ? prior.consecutiveOutsideSafeCount + 1 : 0,
    insideSafe: outsideSafe ? 0 : prior.consecutiveInsideSafeCount + 1,
    spike:
      prior.lastValue !== null &&
      Math.abs(value - prior.lastValue) / epochDurationSeconds > thresholds.maxDeltaPerSec
  };

  return Object.freeze({
    axis: prior.axis,
    severity: nextSeverityV1(prior.severity, counts, hysteresis),
    consecutiveAboveCount: counts.above,
    consecutiveBelowCount: counts.below,
    consecutiveOutsideSafeCount: counts.outsideSafe,
    consecutiveInsideSafeCount: counts.insideSafe,
    lastValue: value
  });
}

/**
 * Advances every configured axis against one snapshot. Axes without a prior
 * state start from INFO. Output order follows the configured axis order.
 */
export function evaluateEnvelopeV1(
  snapshot: Readonly<SignalSnapshotV1>,
  prior: ReadonlyArray<AxisStateV1>,
  axes: ReadonlyArray<AxisThresholdsV1>,
  hysteresis: HysteresisConfigV1
): ReadonlyArray<AxisStateV1> {
  const byAxis = new Map(prior.map((s) => [s.axis, s]));
  const next = axes.map((thresholds) =>
    evaluateAxisV1(
      byAxis.get(thresholds.axis) ?? initialAxisStateV1(thresholds.axis),
      snapshot.channels[thresholds.channel],
      thresholds,
      hysteresis,
      snapshot.epochDurationSeconds
    )
  );
  return Object.freeze(next);
}

interface AxisCounts {
  above: number;
  below: number;
  outsideSafe: number;
  insideSafe: number;
  spike: boolean;
}

function nextSeverityV1(current: SeverityV1, c: AxisCounts, h: HysteresisConfigV1): SeverityV1 {
  switch (current) {
    case "INFO":
      if (c.outsideSafe >= h.riskEpochsToDowngrade) return "RISK";
      if (c.above >= h.warnEpochsToFlag || c.spike) return "WARN";
      return "INFO";
    case "WARN":
      if (c.outsideSafe >= h.riskEpochsToDowngrade) return "RISK";
      if (c.below >= h.warnEpochsToFlag) return "INFO";
      return "WARN";
    case "RISK":
      if (c.insideSafe >= h.riskEpochsToDowngrade) return "WARN";
      return "RISK";
    default: {
      const _exhaustive: never = current;
      throw new Error(`UNKNOWN_SEVERITY: ${String(_exhaustive)}`);
    }
  }
}
