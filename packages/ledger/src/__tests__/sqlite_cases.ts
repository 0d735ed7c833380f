// Same ledger behaviour on the SQLite store, plus per-subject isolation.

import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import Database from "better-sqlite3";

import {
  ChainCorruption,
  computeEntryHashV1,
  GENESIS_HASH_V1,
  HashLinkedLedgerV1,
  LedgerSqliteDatabase
} from "../index";
import { exerciseStore } from "./ledger_cases";
import { proposal } from "./fixtures";

const db = new LedgerSqliteDatabase({ filePath: ":memory:" });
try {
  const store = db.storeFor("subject-a");
  const entries = exerciseStore(store);
  assert.equal(entries.length, 3);
  assert.deepEqual(entries[0].policyRefs, ["policy/base"]);
  assert.equal(entries[1].riskAfter, 0.1);

  // Annotation JSON survives the round trip.
  const [note] = store.annotations();
  assert.equal(note.treeOfLifeView.LIFEFORCE, 0.9);
  assert.equal(note.diagnostics.row, null);

  // Stale CAS is refused without writing.
  const body = {
    prevHash: GENESIS_HASH_V1,
    proposalId: "p-stale",
    decision: "ACCEPT",
    riskBefore: 0,
    riskAfter: 0,
    timestamp: 1,
    policyRefs: []
  };
  assert.equal(store.compareAndAppend({ ...body, entryHash: computeEntryHashV1(body) }), false);
  assert.equal(store.entries().length, 3);

  // Another subject starts its own chain at genesis.
  const other = new HashLinkedLedgerV1(db.storeFor("subject-b"));
  assert.equal(other.tipHash(), GENESIS_HASH_V1);
  other.append({ decision: { verdict: "ACCEPT" }, proposal: proposal("p-b0", 0, 0), prevHash: GENESIS_HASH_V1, timestamp: 9 });
  assert.equal(other.verifyChain(), 1);
  assert.equal(new HashLinkedLedgerV1(store).verifyChain(), 3);
} finally {
  db.close();
}

// --- Tampering with the durable file ---
function verifyAfter(sql: string): ChainCorruption {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "vitalgate-ledger-"));
  const filePath = path.join(dir, "ledger.sqlite");
  const ledgerDb = new LedgerSqliteDatabase({ filePath });
  try {
    exerciseStore(ledgerDb.storeFor("subject-a"));

    const raw = new Database(filePath);
    try {
      raw.prepare(sql).run();
    } finally {
      raw.close();
    }

    const ledger = new HashLinkedLedgerV1(ledgerDb.storeFor("subject-a"));
    try {
      ledger.verifyChain();
    } catch (err: unknown) {
      assert.ok(err instanceof ChainCorruption, `expected ChainCorruption, got ${String(err)}`);
      return err;
    }
    throw new Error(`expected ChainCorruption after: ${sql}`);
  } finally {
    ledgerDb.close();
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

{
  const blank = verifyAfter(`update ledger_entries set proposal_id = '' where subject_id = 'subject-a' and seq = 1`);
  assert.equal(blank.message, "CHAIN_CORRUPTION: ROW_MALFORMED @ index:1");

  const refs = verifyAfter(`update ledger_entries set policy_refs_json = '[' where subject_id = 'subject-a' and seq = 2`);
  assert.equal(refs.kind, "ROW_MALFORMED");
  assert.equal(refs.index, 2);

  const risk = verifyAfter(`update ledger_entries set risk_after = 0.9 where subject_id = 'subject-a' and seq = 0`);
  assert.equal(risk.message, "CHAIN_CORRUPTION: ENTRY_HASH_MISMATCH @ index:0");
}

console.log("ledger sqlite-store cases ok");
