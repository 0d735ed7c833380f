// packages/contracts/src/schema/signal_snapshot_v1.ts
import { z } from "zod";

/**
 * Channels carried by one epoch snapshot. Every channel is optional: a missing
 * value is a gap, never a zero.
 */
export const SIGNAL_CHANNELS_V1 = Object.freeze([
  "alphaPower",
  "betaPower",
  "gammaPower",
  "thetaPower",
  "alphaCve",
  "heartRate",
  "heartRateVariability",
  "eda",
  "motion",
  "respirationRate",
  "gazeFixation"
] as const);

export const SignalChannelV1Z = z.enum(SIGNAL_CHANNELS_V1);

export type SignalChannelV1 = z.infer<typeof SignalChannelV1Z>;

const ChannelValueZ = z.number().finite().optional();

export const SignalChannelsV1Z = z
  .object({
    alphaPower: ChannelValueZ,
    betaPower: ChannelValueZ,
    gammaPower: ChannelValueZ,
    thetaPower: ChannelValueZ,
    alphaCve: ChannelValueZ,
    heartRate: ChannelValueZ,
    heartRateVariability: ChannelValueZ,
    eda: ChannelValueZ,
    motion: ChannelValueZ,
    respirationRate: ChannelValueZ,
    gazeFixation: ChannelValueZ
  })
  .strict();

export type SignalChannelsV1 = z.infer<typeof SignalChannelsV1Z>;

export const SignalSnapshotV1Z = z
  .object({
    subjectId: z.string().min(1),
    epochIndex: z.number().int().nonnegative(),
    epochDurationSeconds: z.number().positive().finite(),
    channels: SignalChannelsV1Z
  })
  .strict();

export type SignalSnapshotV1 = z.infer<typeof SignalSnapshotV1Z>;

/**
 * Parses and freezes a snapshot. Snapshots are immutable once admitted.
 */
export function parseSignalSnapshotV1(input: unknown): Readonly<SignalSnapshotV1> {
  const parsed = SignalSnapshotV1Z.parse(input);
  return Object.freeze({ ...parsed, channels: Object.freeze({ ...parsed.channels }) });
}
