// NATURE labels over the asset vector.

import type { AssetVectorV1, OverlayConfigV1 } from "@vitalgate/contracts";

type Assets = Readonly<AssetVectorV1>;

export function isCalmStableV1(a: Assets, cfg: OverlayConfigV1["calmStable"]): boolean {
  return a.LIFEFORCE >= cfg.lifeforceMin && a.FEAR <= cfg.fearMax && a.PAIN <= cfg.painMax && a.DECAY <= cfg.decayMax;
}

export function isOverloadedV1(a: Assets, cfg: OverlayConfigV1["overloaded"]): boolean {
  return a.DECAY >= cfg.decayMin || a.FEAR >= cfg.fearMin || a.PAIN >= cfg.painMin;
}

/**
 * RECOVERY over a history laid out as [past][gap][recent] (oldest first):
 * the past window was mostly OVERLOADED and the recent window improved on it
 * by at least the configured margins.
 *
 * @returns false when the history is shorter than past + gap + recent.
 */
export function recoveryHoldsV1(history: ReadonlyArray<Assets>, config: OverlayConfigV1): boolean {
  const { pastEpochs, gapEpochs, recentEpochs } = config.recovery;
  const span = pastEpochs + gapEpochs + recentEpochs;
  if (history.length < span) return false;

  const tail = history.slice(history.length - span);
  const past = tail.slice(0, pastEpochs);
  const recent = tail.slice(pastEpochs + gapEpochs);

  const overloadedFraction = past.filter((a) => isOverloadedV1(a, config.overloaded)).length / past.length;
  if (overloadedFraction < config.recovery.minOverloadedFraction) return false;

  const mean = (xs: ReadonlyArray<Assets>, pick: (a: Assets) => number): number =>
    xs.reduce((s, a) => s + pick(a), 0) / xs.length;

  const r = config.recovery;
  return (
    mean(past, (a) => a.DECAY) - mean(recent, (a) => a.DECAY) >= r.deltaDecayMin &&
    mean(recent, (a) => a.LIFEFORCE) - mean(past, (a) => a.LIFEFORCE) >= r.deltaLifeforceMin &&
    mean(past, (a) => a.FEAR) - mean(recent, (a) => a.FEAR) >= r.deltaFearMin &&
    mean(past, (a) => a.PAIN) - mean(recent, (a) => a.PAIN) >= r.deltaPainMin
  );
}
