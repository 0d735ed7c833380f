// UNFAIR_DRAIN: advisory, cross-session NATURE label.
//
// A subject is flagged at time t when, over the window [t - windowMs, t], its
// mean budget sits at least deltaUnfair below the median budget of comparable
// samples (same tier and jurisdiction, its own included) and it was OVERLOADED
// in at least overloadFracMin of its own samples. Budget is
// 0.5 * (LIFEFORCE + OXYGEN). Pure: no I/O, and the result never reaches the kernel.

import type { CapabilityTierV1 } from "@vitalgate/contracts";

export interface UnfairDrainConfigV1 {
  readonly windowMs: number;
  readonly deltaUnfair: number;
  readonly overloadFracMin: number;
}

export const UNFAIR_DRAIN_DEFAULTS_V1: UnfairDrainConfigV1 = Object.freeze({
  windowMs: 60_000,
  deltaUnfair: 0.2,
  overloadFracMin: 0.5
});

export interface DrainSampleV1 {
  readonly subjectId: string;
  readonly tMs: number;
  readonly tier: CapabilityTierV1;
  readonly jurisdiction: string;
  readonly lifeforce: number;
  readonly oxygen: number;
  readonly overloaded: boolean;
}

export interface UnfairDrainFlagV1 {
  subjectId: string;
  tMs: number;
  unfairDrain: boolean;
  budget: number;
  peerMedianBudget: number;
  overloadFraction: number;
}

function budgetOf(s: DrainSampleV1): number {
  return 0.5 * (s.lifeforce + s.oxygen);
}

function comparable(a: DrainSampleV1, b: DrainSampleV1): boolean {
  return a.tier === b.tier && a.jurisdiction === b.jurisdiction;
}

function median(sorted: ReadonlyArray<number>): number {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? 0.5 * (sorted[mid - 1] + sorted[mid]) : sorted[mid];
}

/**
 * One flag per sample, ordered by subject id then time.
 */
export function computeUnfairDrainV1(
  config: UnfairDrainConfigV1,
  samples: ReadonlyArray<DrainSampleV1>
): UnfairDrainFlagV1[] {
  const bySubject = new Map<string, DrainSampleV1[]>();
  for (const s of samples) {
    const series = bySubject.get(s.subjectId) ?? [];
    series.push(s);
    bySubject.set(s.subjectId, series);
  }

  const flags: UnfairDrainFlagV1[] = [];
  for (const subjectId of [...bySubject.keys()].sort()) {
    const series = [...(bySubject.get(subjectId) ?? [])].sort((a, b) => a.tMs - b.tMs);

    for (const sample of series) {
      const start = sample.tMs - config.windowMs;
      const inWindow = (s: DrainSampleV1): boolean => s.tMs >= start && s.tMs <= sample.tMs;

      const own = series.filter(inWindow);
      const budget = own.reduce((sum, s) => sum + budgetOf(s), 0) / own.length;
      const overloadFraction = own.filter((s) => s.overloaded).length / own.length;

      const peers = samples
        .filter((s) => inWindow(s) && comparable(sample, s))
        .map(budgetOf)
        .sort((a, b) => a - b);
      const peerMedianBudget = peers.length === 0 ? budget : median(peers);

      flags.push({
        subjectId,
        tMs: sample.tMs,
        unfairDrain:
          peers.length > 0 && peerMedianBudget - budget >= config.deltaUnfair && overloadFraction >= config.overloadFracMin,
        budget,
        peerMedianBudget,
        overloadFraction
      });
    }
  }
  return flags;
}
