import type { AssetConfigV1, SignalChannelV1, SignalSnapshotV1 } from "@vitalgate/contracts";

/** Value a missing or unusable input maps to. */
export const NEUTRAL_V1 = 0.5;

/**
 * Clamps into [0, 1]. Non-finite input (NaN, ±Infinity) maps to 0.
 */
export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}

/**
 * Maps a channel through its configured range into [0, 1]. A missing value, a
 * non-finite value, or a channel with no configured range is NEUTRAL_V1.
 */
export function normalizeChannelV1(
  snapshot: Readonly<SignalSnapshotV1>,
  channel: SignalChannelV1,
  ranges: AssetConfigV1["channelRanges"]
): number {
  return normalizeOrNullV1(snapshot, channel, ranges) ?? NEUTRAL_V1;
}

/**
 * Same mapping as normalizeChannelV1, but reports a gap as null.
 */
export function normalizeOrNullV1(
  snapshot: Readonly<SignalSnapshotV1>,
  channel: SignalChannelV1,
  ranges: AssetConfigV1["channelRanges"]
): number | null {
  const value = snapshot.channels[channel];
  const range = ranges[channel];
  if (value === undefined || !Number.isFinite(value) || range === undefined) return null;
  const span = range.max - range.min;
  if (!(span > 0)) return null;
  return clamp01((value - range.min) / span);
}

/**
 * Σ wᵢxᵢ / Σ wᵢ over [x, w] pairs. NEUTRAL_V1 when every weight is zero.
 */
export function weightedMeanV1(pairs: ReadonlyArray<readonly [number, number]>): number {
  let num = 0;
  let den = 0;
  for (const [x, w] of pairs) {
    if (!(w > 0)) continue;
    num += w * x;
    den += w;
  }
  return den > 0 ? num / den : NEUTRAL_V1;
}
