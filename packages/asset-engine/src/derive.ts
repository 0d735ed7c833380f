// Asset Derivation Engine (v1)
//
// Pure mapping from one snapshot plus the kernel's published state into fifteen
// scalars in [0, 1]. No history: identical inputs give identical output.
// Missing inputs degrade to the neutral 0.5; nothing here throws on bad data.

import {
  CAPABILITY_TIERS_V1,
  type AssetConfigV1,
  type AssetVectorV1,
  type CapabilityTierV1,
  type SeverityV1,
  type SignalChannelV1,
  type SignalSnapshotV1
} from "@vitalgate/contracts";

import { clamp01, NEUTRAL_V1, normalizeChannelV1, normalizeOrNullV1, weightedMeanV1 } from "./normalize";

/**
 * Severity of one axis together with the channel it watches.
 */
export interface AxisSeverityV1 {
  readonly axis: string;
  readonly channel: SignalChannelV1;
  readonly severity: SeverityV1;
}

export interface AssetContextV1 {
  /** Committed risk score published by the kernel. */
  readonly risk: number;
  /** Ceiling of the current tier. */
  readonly riskCeiling: number;
  readonly tier: CapabilityTierV1;
  readonly envelope: ReadonlyArray<AxisSeverityV1>;
  readonly acceptedTransitionCount: number;
}

export function deriveAssetsV1(
  snapshot: Readonly<SignalSnapshotV1>,
  ctx: AssetContextV1,
  config: AssetConfigV1
): AssetVectorV1 {
  const n = (channel: SignalChannelV1): number => normalizeChannelV1(snapshot, channel, config.channelRanges);
  const w = config.weights;

  const WAVE = weightedMeanV1([
    [n("alphaPower"), w.wave.alpha],
    [n("betaPower"), w.wave.beta],
    [n("gammaPower"), w.wave.gamma],
    [n("alphaCve"), w.wave.alphaCve]
  ]);

  const DECAY = ctx.riskCeiling > 0 ? clamp01(ctx.risk / ctx.riskCeiling) : 0;

  const POWER = powerV1(ctx.envelope, w.power);
  const FEAR = weightedMeanV1([
    [warnRiskFractionV1(ctx.envelope, "eda"), w.fear.eda],
    [warnRiskFractionV1(ctx.envelope, "heartRate"), w.fear.heartRate]
  ]);
  const PAIN = weightedMeanV1([
    [FEAR, w.pain.fear],
    [warnRiskFractionV1(ctx.envelope, "motion"), w.pain.motion]
  ]);

  const BRAIN = clamp01(CAPABILITY_TIERS_V1.indexOf(ctx.tier) / (CAPABILITY_TIERS_V1.length - 1));
  const EVOLVE = clamp01(ctx.acceptedTransitionCount / config.evolveHorizon);

  const raw: AssetVectorV1 = {
    BLOOD: 1 - n("heartRate"),
    OXYGEN: n("heartRateVariability"),
    WAVE,
    TIME: snapshot.epochIndex / config.timeHorizonEpochs,
    DECAY,
    LIFEFORCE: 1 - DECAY,
    BRAIN,
    SMART: (BRAIN + EVOLVE) / 2,
    EVOLVE,
    POWER,
    TECH: (BRAIN + POWER) / 2,
    FEAR,
    PAIN,
    NANO: EVOLVE,
    BREATH: weightedMeanV1([
      [1 - n("respirationRate"), w.breath.respiration],
      [n("gazeFixation"), w.breath.gaze]
    ])
  };

  return Object.freeze(clampAllV1(raw));
}

/**
 * Normalized EEG band loads for the overlay. null marks a band with no reading.
 */
export interface BandLoadsV1 {
  readonly alpha: number | null;
  readonly beta: number | null;
  readonly gamma: number | null;
  readonly theta: number | null;
}

export function deriveBandLoadsV1(snapshot: Readonly<SignalSnapshotV1>, config: AssetConfigV1): BandLoadsV1 {
  const n = (channel: SignalChannelV1): number | null => normalizeOrNullV1(snapshot, channel, config.channelRanges);
  return Object.freeze({
    alpha: n("alphaPower"),
    beta: n("betaPower"),
    gamma: n("gammaPower"),
    theta: n("thetaPower")
  });
}

// Mean per-axis load: INFO 0, WARN weights.warn, RISK weights.risk.
function powerV1(envelope: ReadonlyArray<AxisSeverityV1>, weights: AssetConfigV1["weights"]["power"]): number {
  if (envelope.length === 0) return NEUTRAL_V1;
  let sum = 0;
  for (const a of envelope) {
    if (a.severity === "WARN") sum += weights.warn;
    else if (a.severity === "RISK") sum += weights.risk;
  }
  return sum / envelope.length;
}

// Fraction of the axes on `channel` that are WARN or RISK; neutral with none.
function warnRiskFractionV1(envelope: ReadonlyArray<AxisSeverityV1>, channel: SignalChannelV1): number {
  const onChannel = envelope.filter((a) => a.channel === channel);
  if (onChannel.length === 0) return NEUTRAL_V1;
  return onChannel.filter((a) => a.severity !== "INFO").length / onChannel.length;
}

function clampAllV1(v: AssetVectorV1): AssetVectorV1 {
  return {
    BLOOD: clamp01(v.BLOOD),
    OXYGEN: clamp01(v.OXYGEN),
    WAVE: clamp01(v.WAVE),
    TIME: clamp01(v.TIME),
    DECAY: clamp01(v.DECAY),
    LIFEFORCE: clamp01(v.LIFEFORCE),
    BRAIN: clamp01(v.BRAIN),
    SMART: clamp01(v.SMART),
    EVOLVE: clamp01(v.EVOLVE),
    POWER: clamp01(v.POWER),
    TECH: clamp01(v.TECH),
    FEAR: clamp01(v.FEAR),
    PAIN: clamp01(v.PAIN),
    NANO: clamp01(v.NANO),
    BREATH: clamp01(v.BREATH)
  };
}
