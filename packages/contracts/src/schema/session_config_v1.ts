// packages/contracts/src/schema/session_config_v1.ts
//
// Session configuration record. Shape only: cross-field admission (threshold
// ordering, ceiling ordering, reload rules) lives in @vitalgate/session-config.
import { z } from "zod";

import { SemVerZ } from "./common_v1";
import { SignerRoleV1Z } from "./capability_v1";
import { SignalChannelV1Z } from "./signal_snapshot_v1";

const FiniteZ = z.number().finite();
const WeightZ = z.number().finite().nonnegative();
const UnitZ = z.number().min(0).max(1);
const CountZ = z.number().int().positive();

export const AxisThresholdsV1Z = z
  .object({
    axis: z.string().min(1),
    channel: SignalChannelV1Z,
    minSafe: FiniteZ,
    minWarn: FiniteZ,
    maxWarn: FiniteZ,
    maxSafe: FiniteZ,
    maxDeltaPerSec: z.number().finite().positive()
  })
  .strict();

export type AxisThresholdsV1 = z.infer<typeof AxisThresholdsV1Z>;

export const HysteresisConfigV1Z = z
  .object({
    warnEpochsToFlag: CountZ,
    riskEpochsToDowngrade: CountZ
  })
  .strict();

export type HysteresisConfigV1 = z.infer<typeof HysteresisConfigV1Z>;

// Tier-keyed objects are spelled out so every tier is required.
export const TierCeilingsV1Z = z
  .object({
    MODEL_ONLY: WeightZ,
    LAB_BENCH: WeightZ,
    CONTROLLED_HUMAN: WeightZ,
    GENERAL_USE: WeightZ
  })
  .strict();

export type TierCeilingsV1 = z.infer<typeof TierCeilingsV1Z>;

export const RiskConfigV1Z = z
  .object({
    weights: z.object({ warn: WeightZ, risk: WeightZ }).strict(),
    globalCeiling: z.number().finite().positive(),
    tierCeilings: TierCeilingsV1Z
  })
  .strict();

export type RiskConfigV1 = z.infer<typeof RiskConfigV1Z>;

const RolesZ = z.array(SignerRoleV1Z);

export const PolicyConfigV1Z = z
  .object({
    allowedJurisdictions: z.array(z.string().min(1)).min(1),
    rolesByTier: z
      .object({
        MODEL_ONLY: RolesZ,
        LAB_BENCH: RolesZ,
        CONTROLLED_HUMAN: RolesZ,
        GENERAL_USE: RolesZ
      })
      .strict(),
    multiTierPolicyRefs: z.array(z.string().min(1)), // refs that authorize a jump of more than one tier
    reversal: z
      .object({
        allowReversal: z.boolean(),
        quorum: z.array(z.object({ role: SignerRoleV1Z, count: CountZ }).strict())
      })
      .strict()
  })
  .strict();

export type PolicyConfigV1 = z.infer<typeof PolicyConfigV1Z>;

export const ChannelRangeV1Z = z
  .object({ min: FiniteZ, max: FiniteZ })
  .strict()
  .refine((r) => r.max > r.min, { message: "channel range max must be > min" });

export type ChannelRangeV1 = z.infer<typeof ChannelRangeV1Z>;

export const AssetConfigV1Z = z
  .object({
    channelRanges: z.record(SignalChannelV1Z, ChannelRangeV1Z),
    weights: z
      .object({
        wave: z.object({ alpha: WeightZ, beta: WeightZ, gamma: WeightZ, alphaCve: WeightZ }).strict(),
        fear: z.object({ eda: WeightZ, heartRate: WeightZ }).strict(),
        pain: z.object({ fear: WeightZ, motion: WeightZ }).strict(),
        power: z.object({ warn: UnitZ, risk: UnitZ }).strict(),
        breath: z.object({ respiration: WeightZ, gaze: WeightZ }).strict()
      })
      .strict(),
    timeHorizonEpochs: CountZ,
    evolveHorizon: CountZ
  })
  .strict();

export type AssetConfigV1 = z.infer<typeof AssetConfigV1Z>;

export const OverlayConfigV1Z = z
  .object({
    thetaWave: UnitZ, // ROW activation threshold on WAVE
    rowHigh: z.number().finite().positive(),
    windowEpochs: CountZ,
    gamma: z.object({ elevated: UnitZ, overload: UnitZ }).strict(),
    cognitive: z.object({ powerMin: UnitZ }).strict(),
    calmStable: z.object({ lifeforceMin: UnitZ, fearMax: UnitZ, painMax: UnitZ, decayMax: UnitZ }).strict(),
    overloaded: z.object({ decayMin: UnitZ, fearMin: UnitZ, painMin: UnitZ }).strict(),
    recovery: z
      .object({
        pastEpochs: CountZ,
        gapEpochs: z.number().int().nonnegative(),
        recentEpochs: CountZ,
        minOverloadedFraction: UnitZ,
        deltaDecayMin: UnitZ,
        deltaLifeforceMin: UnitZ,
        deltaFearMin: UnitZ,
        deltaPainMin: UnitZ
      })
      .strict()
  })
  .strict();

export type OverlayConfigV1 = z.infer<typeof OverlayConfigV1Z>;

export const SessionConfigV1Z = z
  .object({
    type: z.literal("session_config_v1"),
    schema_version: SemVerZ,
    axes: z.array(AxisThresholdsV1Z).min(1),
    hysteresis: HysteresisConfigV1Z,
    risk: RiskConfigV1Z,
    policy: PolicyConfigV1Z,
    assets: AssetConfigV1Z,
    overlay: OverlayConfigV1Z
  })
  .strict();

export type SessionConfigV1 = z.infer<typeof SessionConfigV1Z>;

export function parseSessionConfigV1(input: unknown): SessionConfigV1 {
  return SessionConfigV1Z.parse(input);
}
