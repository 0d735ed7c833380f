import type { AssetVectorV1, KernelStateViewV1, SeverityV1 } from "@vitalgate/contracts";

/**
 * One epoch as published to the overlay. Built by the runtime after the kernel
 * path has committed; every part is a frozen copy.
 */
export interface OverlayFrameV1 {
  readonly proposalId: string;
  /** Hash of the ledger entry committed for this epoch. */
  readonly entryHash: string;
  readonly epochIndex: number;
  readonly epochDurationSeconds: number;
  readonly assets: Readonly<AssetVectorV1>;
  /** Normalized gamma band load; null when the band was not measured. */
  readonly gammaLoad: number | null;
  readonly envelope: ReadonlyArray<{ readonly axis: string; readonly severity: SeverityV1 }>;
  readonly kernel: KernelStateViewV1;
}
