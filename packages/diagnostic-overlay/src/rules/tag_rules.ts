// Diagnostic tag rule table (vocabulary 1.0.0)
//
// Deterministic: a tag is emitted when its predicate holds over the current
// epoch or over the whole trailing window. Rules are grouped; when several rules
// in one group match, only the most severe survives.
//
//   group  | rules (most severe first)
//   -------+------------------------------------------
//   row    | ROW_HIGH > ROW_RECOVERY
//   load   | COGNITIVE_OVERLOAD > GAMMA_OVERLOAD
//   state  | OVERLOADED > RECOVERY > CALM_STABLE

import {
  DIAGNOSTIC_TAGS_V1,
  type AssetVectorV1,
  type DiagnosticTagV1,
  type GammaWaveStateV1,
  type OverlayConfigV1,
  type SeverityV1
} from "@vitalgate/contracts";

import { isCalmStableV1, isOverloadedV1, recoveryHoldsV1 } from "./nature";

/**
 * An epoch the overlay has already processed, as the rules see it.
 */
export interface TagInputFrameV1 {
  readonly epochIndex: number;
  readonly assets: Readonly<AssetVectorV1>;
  readonly gammaWaveState: GammaWaveStateV1;
  readonly severities: ReadonlyArray<SeverityV1>;
  readonly row: number | null;
}

export type TagGroupV1 = "row" | "load" | "state";

export interface TagRuleV1 {
  readonly tag: DiagnosticTagV1;
  readonly group: TagGroupV1;
  /** Higher wins within a group. */
  readonly severity: number;
  /** `history` is oldest first and ends with the current epoch. */
  matches(history: ReadonlyArray<TagInputFrameV1>, config: OverlayConfigV1): boolean;
}

function current(history: ReadonlyArray<TagInputFrameV1>): TagInputFrameV1 | undefined {
  return history[history.length - 1];
}

function fullWindow(history: ReadonlyArray<TagInputFrameV1>, size: number): ReadonlyArray<TagInputFrameV1> | null {
  return history.length < size ? null : history.slice(history.length - size);
}

function everyInWindow(
  history: ReadonlyArray<TagInputFrameV1>,
  config: OverlayConfigV1,
  pred: (f: TagInputFrameV1) => boolean
): boolean {
  const window = fullWindow(history, config.windowEpochs);
  return window !== null && window.every(pred);
}

const rules: TagRuleV1[] = [
  {
    tag: "ROW_HIGH",
    group: "row",
    severity: 2,
    matches: (h, c) => {
      const row = current(h)?.row ?? null;
      return row !== null && row >= c.rowHigh;
    }
  },
  {
    tag: "ROW_RECOVERY",
    group: "row",
    severity: 1,
    matches: (h, c) => {
      const row = current(h)?.row ?? null;
      return row !== null && row <= -c.rowHigh;
    }
  },
  {
    tag: "COGNITIVE_OVERLOAD",
    group: "load",
    severity: 2,
    matches: (h, c) =>
      everyInWindow(
        h,
        c,
        (f) => f.assets.WAVE >= c.thetaWave && (f.assets.POWER >= c.cognitive.powerMin || f.severities.includes("RISK"))
      )
  },
  {
    tag: "GAMMA_OVERLOAD",
    group: "load",
    severity: 1,
    matches: (h, c) => everyInWindow(h, c, (f) => f.gammaWaveState === "OVERLOAD")
  },
  {
    tag: "OVERLOADED",
    group: "state",
    severity: 3,
    matches: (h, c) => everyInWindow(h, c, (f) => isOverloadedV1(f.assets, c.overloaded))
  },
  {
    tag: "RECOVERY",
    group: "state",
    severity: 2,
    matches: (h, c) =>
      recoveryHoldsV1(
        h.map((f) => f.assets),
        c
      )
  },
  {
    tag: "CALM_STABLE",
    group: "state",
    severity: 1,
    matches: (h, c) => everyInWindow(h, c, (f) => isCalmStableV1(f.assets, c.calmStable))
  }
];

export const TAG_RULES_V1: ReadonlyArray<TagRuleV1> = Object.freeze(rules);

/**
 * Applies the rule table. Output is in vocabulary order.
 */
export function deriveTagsV1(
  history: ReadonlyArray<TagInputFrameV1>,
  config: OverlayConfigV1,
  table: ReadonlyArray<TagRuleV1> = TAG_RULES_V1
): DiagnosticTagV1[] {
  const winners = new Map<TagGroupV1, TagRuleV1>();
  for (const rule of table) {
    if (!rule.matches(history, config)) continue;
    const held = winners.get(rule.group);
    if (held === undefined || rule.severity > held.severity) winners.set(rule.group, rule);
  }

  const tags = new Set([...winners.values()].map((r) => r.tag));
  return DIAGNOSTIC_TAGS_V1.filter((t) => tags.has(t));
}

export function gammaWaveStateV1(gammaLoad: number | null, thresholds: OverlayConfigV1["gamma"]): GammaWaveStateV1 {
  if (gammaLoad === null || !Number.isFinite(gammaLoad)) return "UNKNOWN";
  if (gammaLoad >= thresholds.overload) return "OVERLOAD";
  if (gammaLoad >= thresholds.elevated) return "ELEVATED";
  return "NOMINAL";
}
