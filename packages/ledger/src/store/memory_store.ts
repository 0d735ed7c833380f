import type { DiagnosticAnnotationV1, LedgerEntryV1, Sha256Ref } from "@vitalgate/contracts";

import { GENESIS_HASH_V1 } from "../hash";
import type { LedgerStoreV1 } from "./types";

export class MemoryLedgerStore implements LedgerStoreV1 {
  private readonly rows: LedgerEntryV1[];
  private readonly notes = new Map<string, DiagnosticAnnotationV1>();

  /**
   * @param seed - Entries to start from, taken as-is (no verification). Lets an
   *   audit load a chain of unknown integrity and run verifyChain on it.
   */
  constructor(seed: ReadonlyArray<LedgerEntryV1> = []) {
    this.rows = seed.map((e) => Object.freeze({ ...e, policyRefs: [...e.policyRefs] }));
  }

  tipHash(): Sha256Ref {
    const last = this.rows[this.rows.length - 1];
    return last === undefined ? GENESIS_HASH_V1 : last.entryHash;
  }

  compareAndAppend(entry: LedgerEntryV1): boolean {
    if (entry.prevHash !== this.tipHash()) return false;
    this.rows.push(Object.freeze({ ...entry, policyRefs: [...entry.policyRefs] }));
    return true;
  }

  entries(): ReadonlyArray<LedgerEntryV1> {
    return Object.freeze([...this.rows]);
  }

  insertAnnotation(annotation: DiagnosticAnnotationV1): void {
    const key = `${annotation.proposalId}#${annotation.epochIndex}`;
    if (this.notes.has(key)) {
      throw new Error(`ANNOTATION_ALREADY_ATTACHED: ${key}`);
    }
    this.notes.set(key, annotation);
  }

  annotations(): ReadonlyArray<DiagnosticAnnotationV1> {
    return Object.freeze([...this.notes.values()]);
  }
}
