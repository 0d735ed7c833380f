import fs from "node:fs";
import path from "node:path";

import type {
  CapabilityTierV1,
  DiagnosticAnnotationV1,
  LedgerEntryV1,
  SessionConfigV1,
  SignalChannelsV1,
  SignalSnapshotV1,
  Sha256Ref,
  TransitionRequestV1
} from "@vitalgate/contracts";
import { HashLinkedLedgerV1, MemoryLedgerStore, type LedgerStoreV1 } from "@vitalgate/ledger";
import { SessionConfigHolder, validateSessionConfigV1 } from "@vitalgate/session-config";
import pino, { type Logger } from "pino";

import { MemoryProposalLog } from "../runtime/proposal_log";
import { SessionRuntime } from "../runtime/session_runtime";

export const SUBJECT = "subject-a";

export function sessionConfig(): SessionConfigV1 {
  const fp = path.resolve(__dirname, "../../config/session_config.json");
  return validateSessionConfigV1(JSON.parse(fs.readFileSync(fp, "utf8")));
}

export function snapshot(epochIndex: number, channels: SignalChannelsV1, subjectId = SUBJECT): SignalSnapshotV1 {
  return { subjectId, epochIndex, epochDurationSeconds: 5, channels };
}

export function request(
  proposalId: string,
  toState: CapabilityTierV1,
  patch: Partial<TransitionRequestV1> = {}
): TransitionRequestV1 {
  return {
    proposalId,
    toState,
    consent: {
      token: "test-consent",
      scope: ["MODEL_ONLY", "LAB_BENCH", "CONTROLLED_HUMAN"],
      validFromMs: 0,
      validUntilMs: 1_000_000_000
    },
    role: "OPERATOR",
    jurisdiction: "ZZ",
    policyRefs: [],
    ...patch
  };
}

/** 1000, 2000, 3000, ... one tick per call. */
export function stepClock(start = 1000, step = 1000): () => number {
  let calls = 0;
  return () => start + step * calls++;
}

export type LogLine = { level: number; msg: string; [key: string]: unknown };

export function captureLogger(): { logger: Logger; lines(): LogLine[] } {
  const raw: string[] = [];
  const logger = pino({ level: "debug" }, { write: (line: string) => void raw.push(line) });
  return {
    logger,
    lines: () =>
      raw.map((l) => {
        const line: LogLine = JSON.parse(l);
        return line;
      })
  };
}

/**
 * Memory store whose reads can be made to disagree with what was committed,
 * and whose next compare-and-swap can be made to lose.
 */
export class TamperableStore implements LedgerStoreV1 {
  private readonly inner = new MemoryLedgerStore();
  private corruptIndex: number | null = null;
  private loseNextCas = false;

  tipHash(): Sha256Ref {
    return this.inner.tipHash();
  }

  compareAndAppend(entry: LedgerEntryV1): boolean {
    if (this.loseNextCas) {
      this.loseNextCas = false;
      return false;
    }
    return this.inner.compareAndAppend(entry);
  }

  entries(): ReadonlyArray<LedgerEntryV1> {
    const rows = this.inner.entries();
    const i = this.corruptIndex;
    if (i === null) return rows;
    return rows.map((e, k) => (k === i ? { ...e, riskAfter: e.riskAfter + 0.5 } : e));
  }

  insertAnnotation(annotation: DiagnosticAnnotationV1): void {
    this.inner.insertAnnotation(annotation);
  }

  annotations(): ReadonlyArray<DiagnosticAnnotationV1> {
    return this.inner.annotations();
  }

  tamper(index: number): void {
    this.corruptIndex = index;
  }

  heal(): void {
    this.corruptIndex = null;
  }

  loseNextAppend(): void {
    this.loseNextCas = true;
  }
}

export function newRuntime(store: LedgerStoreV1 = new MemoryLedgerStore()) {
  const capture = captureLogger();
  const ledger = new HashLinkedLedgerV1(store);
  const proposalLog = new MemoryProposalLog();
  const runtime = new SessionRuntime({
    subjectId: SUBJECT,
    config: new SessionConfigHolder(sessionConfig()),
    ledger,
    proposalLog,
    logger: capture.logger,
    clock: stepClock()
  });
  return { runtime, ledger, proposalLog, capture };
}
