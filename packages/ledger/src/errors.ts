// Ledger errors. HashChainMismatch is the only retryable one.

export class HashChainMismatch extends Error {
  public readonly code = "HASH_CHAIN_MISMATCH";
  public readonly expectedPrevHash: string;
  public readonly actualTipHash: string;

  constructor(expectedPrevHash: string, actualTipHash: string) {
    super(`HASH_CHAIN_MISMATCH: caller prevHash ${expectedPrevHash} != tip ${actualTipHash}`);
    this.name = "HashChainMismatch";
    this.expectedPrevHash = expectedPrevHash;
    this.actualTipHash = actualTipHash;
  }
}

export class DuplicateProposalId extends Error {
  public readonly code = "PROPOSAL_ID_DUPLICATE";
  public readonly proposalId: string;

  constructor(proposalId: string) {
    super(`PROPOSAL_ID_DUPLICATE: ${proposalId}`);
    this.name = "DuplicateProposalId";
    this.proposalId = proposalId;
  }
}

/** A stored row that no longer decodes into an entry. */
export class LedgerRowMalformed extends Error {
  public readonly code = "LEDGER_ROW_MALFORMED";
  public readonly index: number;

  constructor(index: number, cause: unknown) {
    super(`LEDGER_ROW_MALFORMED: index:${index}`, { cause });
    this.name = "LedgerRowMalformed";
    this.index = index;
  }
}

export type ChainCorruptionKind = "PREV_HASH_BROKEN" | "ENTRY_HASH_MISMATCH" | "ROW_MALFORMED";

export class ChainCorruption extends Error {
  public readonly code = "CHAIN_CORRUPTION";
  public readonly index: number;
  public readonly kind: ChainCorruptionKind;

  constructor(index: number, kind: ChainCorruptionKind) {
    super(`CHAIN_CORRUPTION: ${kind} @ index:${index}`);
    this.name = "ChainCorruption";
    this.index = index;
    this.kind = kind;
  }
}
