import type { AssetVectorV1, OverlayConfigV1 } from "@vitalgate/contracts";

import type { TagInputFrameV1 } from "../index";

export const overlayConfig: OverlayConfigV1 = {
  thetaWave: 0.5,
  rowHigh: 0.05,
  windowEpochs: 3,
  gamma: { elevated: 0.6, overload: 0.8 },
  cognitive: { powerMin: 0.5 },
  calmStable: { lifeforceMin: 0.7, fearMax: 0.3, painMax: 0.3, decayMax: 0.3 },
  overloaded: { decayMin: 0.7, fearMin: 0.7, painMin: 0.7 },
  recovery: {
    pastEpochs: 3,
    gapEpochs: 1,
    recentEpochs: 2,
    minOverloadedFraction: 0.5,
    deltaDecayMin: 0.2,
    deltaLifeforceMin: 0.2,
    deltaFearMin: 0.2,
    deltaPainMin: 0.2
  }
};

export function assets(patch: Partial<AssetVectorV1> = {}): AssetVectorV1 {
  return {
    BLOOD: 0.5,
    OXYGEN: 0.5,
    WAVE: 0.8,
    TIME: 0,
    DECAY: 0.5,
    LIFEFORCE: 0.5,
    BRAIN: 0,
    SMART: 0,
    EVOLVE: 0,
    POWER: 0.2,
    TECH: 0.1,
    FEAR: 0.2,
    PAIN: 0.2,
    NANO: 0,
    BREATH: 0.5,
    ...patch
  };
}

export function frame(epochIndex: number, patch: Partial<TagInputFrameV1> = {}): TagInputFrameV1 {
  return {
    epochIndex,
    assets: assets(),
    gammaWaveState: "NOMINAL",
    severities: ["INFO"],
    row: null,
    ...patch
  };
}

export const calm = assets({ DECAY: 0.1, LIFEFORCE: 0.9, FEAR: 0.1, PAIN: 0.1 });
export const overloaded = assets({ DECAY: 0.9, LIFEFORCE: 0.1, FEAR: 0.8, PAIN: 0.8 });
export const easing = assets({ DECAY: 0.4, LIFEFORCE: 0.6, FEAR: 0.4, PAIN: 0.4 });
