import type { DiagnosticAnnotationV1, LedgerEntryV1, Sha256Ref } from "@vitalgate/contracts";

/**
 * Persistence behind HashLinkedLedgerV1. Append-only: there is no operation
 * that rewrites or removes an entry.
 */
export interface LedgerStoreV1 {
  tipHash(): Sha256Ref;

  /**
   * Commits `entry` only if the current tip still equals `entry.prevHash`.
   * Returns false, without writing, when another writer moved the tip.
   */
  compareAndAppend(entry: LedgerEntryV1): boolean;

  entries(): ReadonlyArray<LedgerEntryV1>;

  /** Side table keyed by proposalId/epochIndex; never read by hashing. */
  insertAnnotation(annotation: DiagnosticAnnotationV1): void;

  annotations(): ReadonlyArray<DiagnosticAnnotationV1>;
}
