import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import {
  DiagnosticAnnotationV1Z,
  LedgerEntryV1Z,
  type DiagnosticAnnotationV1,
  type LedgerEntryV1,
  type Sha256Ref
} from "@vitalgate/contracts";

import { LedgerRowMalformed } from "../errors";
import { GENESIS_HASH_V1 } from "../hash";
import type { LedgerStoreV1 } from "./types";

export type LedgerSqliteConfig = {
  /** File path, or ":memory:" for a throwaway database. */
  filePath: string;
};

const EntryRowZ = z.object({
  proposal_id: z.string(),
  decision: z.string(),
  risk_before: z.number(),
  risk_after: z.number(),
  prev_hash: z.string(),
  entry_hash: z.string(),
  timestamp_ms: z.number(),
  policy_refs_json: z.string()
});

const TipRowZ = z.object({ seq: z.number().int(), entry_hash: z.string() });

const AnnotationRowZ = z.object({ annotation_json: z.string() });

function decodeEntryRow(row: unknown, index: number): LedgerEntryV1 {
  const r = EntryRowZ.safeParse(row);
  if (!r.success) throw new LedgerRowMalformed(index, r.error);
  let policyRefs: unknown;
  try {
    policyRefs = JSON.parse(r.data.policy_refs_json);
  } catch (err: unknown) {
    throw new LedgerRowMalformed(index, err);
  }
  const entry = LedgerEntryV1Z.safeParse({
    proposalId: r.data.proposal_id,
    decision: r.data.decision,
    riskBefore: r.data.risk_before,
    riskAfter: r.data.risk_after,
    prevHash: r.data.prev_hash,
    entryHash: r.data.entry_hash,
    timestamp: r.data.timestamp_ms,
    policyRefs
  });
  if (!entry.success) throw new LedgerRowMalformed(index, entry.error);
  return entry.data;
}

/**
 * One SQLite file shared by every session. Rows are namespaced by subject id.
 */
export class LedgerSqliteDatabase {
  private readonly db: Database.Database;

  constructor(cfg: LedgerSqliteConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // append-only tables
    this.db.exec(`
      create table if not exists ledger_entries (
        subject_id text not null,
        seq integer not null,
        proposal_id text not null,
        decision text not null,
        risk_before real not null,
        risk_after real not null,
        prev_hash text not null,
        entry_hash text not null,
        timestamp_ms integer not null,
        policy_refs_json text not null,
        primary key (subject_id, seq)
      );

      create unique index if not exists idx_ledger_prev on ledger_entries(subject_id, prev_hash);

      create table if not exists ledger_annotations (
        subject_id text not null,
        proposal_id text not null,
        epoch_index integer not null,
        annotation_json text not null,
        primary key (subject_id, proposal_id, epoch_index)
      );
    `);
  }

  storeFor(subjectId: string): SqliteLedgerStore {
    return new SqliteLedgerStore(this.db, subjectId);
  }

  close(): void {
    this.db.close();
  }
}

export class SqliteLedgerStore implements LedgerStoreV1 {
  private readonly selectTip: Database.Statement;
  private readonly insertEntry: Database.Statement;
  private readonly selectEntries: Database.Statement;
  private readonly selectAnnotation: Database.Statement;
  private readonly insertNote: Database.Statement;
  private readonly selectAnnotations: Database.Statement;
  private readonly casAppend: (entry: LedgerEntryV1) => boolean;

  constructor(
    private readonly db: Database.Database,
    private readonly subjectId: string
  ) {
    this.selectTip = db.prepare(
      `select seq, entry_hash from ledger_entries where subject_id = ? order by seq desc limit 1`
    );
    this.insertEntry = db.prepare(
      `insert into ledger_entries
        (subject_id, seq, proposal_id, decision, risk_before, risk_after, prev_hash, entry_hash, timestamp_ms, policy_refs_json)
        values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    this.selectEntries = db.prepare(
      `select proposal_id, decision, risk_before, risk_after, prev_hash, entry_hash, timestamp_ms, policy_refs_json
        from ledger_entries where subject_id = ? order by seq asc`
    );
    this.selectAnnotation = db.prepare(
      `select annotation_json from ledger_annotations where subject_id = ? and proposal_id = ? and epoch_index = ?`
    );
    this.insertNote = db.prepare(
      `insert into ledger_annotations (subject_id, proposal_id, epoch_index, annotation_json) values (?, ?, ?, ?)`
    );
    this.selectAnnotations = db.prepare(
      `select annotation_json from ledger_annotations where subject_id = ? order by epoch_index asc, proposal_id asc`
    );

    // Read-compare-insert inside one transaction is the compare-and-swap.
    this.casAppend = this.db.transaction((entry: LedgerEntryV1): boolean => {
      const tip = this.readTip();
      const tipHash = tip === null ? GENESIS_HASH_V1 : tip.entry_hash;
      if (tipHash !== entry.prevHash) return false;
      this.insertEntry.run(
        this.subjectId,
        tip === null ? 0 : tip.seq + 1,
        entry.proposalId,
        entry.decision,
        entry.riskBefore,
        entry.riskAfter,
        entry.prevHash,
        entry.entryHash,
        entry.timestamp,
        JSON.stringify(entry.policyRefs)
      );
      return true;
    });
  }

  tipHash(): Sha256Ref {
    const tip = this.readTip();
    return tip === null ? GENESIS_HASH_V1 : tip.entry_hash;
  }

  compareAndAppend(entry: LedgerEntryV1): boolean {
    return this.casAppend(entry);
  }

  /**
   * @throws LedgerRowMalformed at the first row that does not decode.
   */
  entries(): ReadonlyArray<LedgerEntryV1> {
    const rows: unknown[] = this.selectEntries.all(this.subjectId);
    return Object.freeze(rows.map((row, index) => Object.freeze(decodeEntryRow(row, index))));
  }

  insertAnnotation(annotation: DiagnosticAnnotationV1): void {
    const existing = this.selectAnnotation.get(this.subjectId, annotation.proposalId, annotation.epochIndex);
    if (existing !== undefined) {
      throw new Error(`ANNOTATION_ALREADY_ATTACHED: ${annotation.proposalId}#${annotation.epochIndex}`);
    }
    this.insertNote.run(this.subjectId, annotation.proposalId, annotation.epochIndex, JSON.stringify(annotation));
  }

  annotations(): ReadonlyArray<DiagnosticAnnotationV1> {
    const rows = z.array(AnnotationRowZ).parse(this.selectAnnotations.all(this.subjectId));
    return Object.freeze(rows.map((r) => DiagnosticAnnotationV1Z.parse(JSON.parse(r.annotation_json))));
  }

  private readTip(): z.infer<typeof TipRowZ> | null {
    const row = this.selectTip.get(this.subjectId);
    return row === undefined ? null : TipRowZ.parse(row);
  }
}
