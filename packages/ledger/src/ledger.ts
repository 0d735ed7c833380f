// Hash-Linked Ledger (v1)
//
// Append-only sequence of kernel decisions. Each entry commits to its
// predecessor through prevHash; the tip is the last committed entryHash (or
// the genesis hash). Writers append through a compare-and-swap on the tip.
//
// Two narrowed capabilities are handed out instead of the ledger itself:
// - LedgerReadViewV1: read-only access to entries, tip and annotations.
// - AnnotationSinkV1: attach-only access to the annotation side table.
// Neither can reach append().

import {
  encodeDecisionV1,
  parseDiagnosticAnnotationV1,
  parseLedgerEntryV1,
  type DecisionV1,
  type DiagnosticAnnotationV1,
  type LedgerEntryV1,
  type Sha256Ref,
  type TransitionProposalV1
} from "@vitalgate/contracts";

import { ChainCorruption, DuplicateProposalId, HashChainMismatch, LedgerRowMalformed } from "./errors";
import { computeEntryHashV1, GENESIS_HASH_V1 } from "./hash";
import type { LedgerStoreV1 } from "./store/types";

export interface LedgerAppendArgsV1 {
  decision: DecisionV1;
  proposal: Readonly<TransitionProposalV1>;
  /** Tip hash the caller observed; must still be the tip at commit time. */
  prevHash: string;
  timestamp: number;
}

export interface LedgerReadViewV1 {
  tipHash(): Sha256Ref;
  length(): number;
  entries(): ReadonlyArray<Readonly<LedgerEntryV1>>;
  entryFor(proposalId: string): Readonly<LedgerEntryV1> | null;
  entryByHash(entryHash: string): Readonly<LedgerEntryV1> | null;
  annotations(): ReadonlyArray<Readonly<DiagnosticAnnotationV1>>;
}

export interface AnnotationSinkV1 {
  attach(annotation: DiagnosticAnnotationV1): void;
}

export class HashLinkedLedgerV1 {
  constructor(private readonly store: LedgerStoreV1) {}

  tipHash(): Sha256Ref {
    return this.store.tipHash();
  }

  /**
   * @throws HashChainMismatch when `prevHash` is not the current tip, either
   *   before hashing or at the compare-and-swap.
   * @throws DuplicateProposalId when the chain already holds an entry for the
   *   proposal's id.
   */
  append(args: LedgerAppendArgsV1): LedgerEntryV1 {
    const tip = this.store.tipHash();
    if (args.prevHash !== tip) {
      throw new HashChainMismatch(args.prevHash, tip);
    }

    const { proposal } = args;
    if (this.store.entries().some((e) => e.proposalId === proposal.proposalId)) {
      throw new DuplicateProposalId(proposal.proposalId);
    }
    const body = {
      prevHash: args.prevHash,
      proposalId: proposal.proposalId,
      decision: encodeDecisionV1(args.decision),
      riskBefore: proposal.riskBefore,
      riskAfter: proposal.riskAfter,
      timestamp: args.timestamp,
      policyRefs: [...proposal.policyRefs]
    };
    const entry = Object.freeze(parseLedgerEntryV1({ ...body, entryHash: computeEntryHashV1(body) }));

    if (!this.store.compareAndAppend(entry)) {
      throw new HashChainMismatch(args.prevHash, this.store.tipHash());
    }
    return entry;
  }

  /**
   * Walks the chain from genesis recomputing every hash.
   *
   * @returns Number of verified entries.
   * @throws ChainCorruption at the first entry that does not verify, including
   *   a stored row that no longer decodes.
   */
  verifyChain(): number {
    let entries: ReadonlyArray<Readonly<LedgerEntryV1>>;
    try {
      entries = this.store.entries();
    } catch (err: unknown) {
      if (err instanceof LedgerRowMalformed) throw new ChainCorruption(err.index, "ROW_MALFORMED");
      throw err;
    }
    let expectedPrev: string = GENESIS_HASH_V1;
    entries.forEach((e, index) => {
      if (e.prevHash !== expectedPrev) {
        throw new ChainCorruption(index, "PREV_HASH_BROKEN");
      }
      if (computeEntryHashV1(e) !== e.entryHash) {
        throw new ChainCorruption(index, "ENTRY_HASH_MISMATCH");
      }
      expectedPrev = e.entryHash;
    });
    return entries.length;
  }

  readView(): LedgerReadViewV1 {
    const store = this.store;
    return Object.freeze({
      tipHash: () => store.tipHash(),
      length: () => store.entries().length,
      entries: () => store.entries(),
      entryFor: (proposalId: string) => store.entries().find((e) => e.proposalId === proposalId) ?? null,
      entryByHash: (entryHash: string) => store.entries().find((e) => e.entryHash === entryHash) ?? null,
      annotations: () => store.annotations()
    });
  }

  annotationSink(): AnnotationSinkV1 {
    const store = this.store;
    return Object.freeze({
      attach: (annotation: DiagnosticAnnotationV1) => {
        const parsed = parseDiagnosticAnnotationV1(annotation);
        if (!store.entries().some((e) => e.proposalId === parsed.proposalId)) {
          throw new Error(`ANNOTATION_TARGET_MISSING: ${parsed.proposalId}`);
        }
        store.insertAnnotation(Object.freeze(parsed));
      }
    });
  }
}
