// Rate-of-change of DECAY between consecutive annotated epochs:
//
//   ROW(t) = (DECAY(t) - DECAY(t-1)) / Δt,   Δt = (epoch(t) - epoch(t-1)) * epochDurationSeconds(t)
//
// Positive is risk budget being consumed, negative is recovery. Undefined (null)
// is a gap, never zero.

import type { OverlayConfigV1, RowStateV1 } from "@vitalgate/contracts";

export interface RowPointV1 {
  readonly epochIndex: number;
  readonly epochDurationSeconds: number;
  readonly decay: number;
  readonly wave: number;
}

export interface RowResultV1 {
  readonly row: number | null;
  readonly rowState: RowStateV1;
}

/**
 * @param guardHolds - Whether this epoch's ledger entry kept riskAfter ≥ riskBefore
 *   and riskAfter within the ceiling.
 */
export function computeRowV1(
  prev: RowPointV1 | null,
  cur: RowPointV1,
  guardHolds: boolean,
  config: Pick<OverlayConfigV1, "thetaWave" | "rowHigh">
): RowResultV1 {
  if (prev === null || !guardHolds) return GAP;

  const dt = (cur.epochIndex - prev.epochIndex) * cur.epochDurationSeconds;
  if (!(dt > 0)) return GAP;

  if (!(cur.wave >= config.thetaWave)) return { row: null, rowState: "INACTIVE" };

  const row = (cur.decay - prev.decay) / dt;
  if (!Number.isFinite(row)) return GAP;

  return { row, rowState: rowStateV1(row, config.rowHigh) };
}

function rowStateV1(row: number, rowHigh: number): RowStateV1 {
  if (row >= rowHigh) return "HIGH";
  if (row > 0) return "RISING";
  if (row < 0) return "RECOVERING";
  return "FLAT";
}

const GAP: RowResultV1 = Object.freeze({ row: null, rowState: "GAP" });
