// Proposal log: one JSON line per kernel decision, accepted or denied.

import fs from "node:fs";
import path from "node:path";

import { ProposalLogRecordV1Z, type ProposalLogRecordV1 } from "@vitalgate/contracts";

export interface ProposalLogV1 {
  append(record: ProposalLogRecordV1): void;
  records(): ProposalLogRecordV1[];
}

export class MemoryProposalLog implements ProposalLogV1 {
  private readonly lines: string[] = [];

  append(record: ProposalLogRecordV1): void {
    this.lines.push(JSON.stringify(ProposalLogRecordV1Z.parse(record)));
  }

  records(): ProposalLogRecordV1[] {
    return this.lines.map((l) => ProposalLogRecordV1Z.parse(JSON.parse(l)));
  }

  /** Raw JSON Lines, as a file-backed log would hold them. */
  toJsonl(): string {
    return this.lines.map((l) => `${l}\n`).join("");
  }
}

export type JsonlProposalLogConfig = {
  filePath: string;
};

/**
 * Append-only JSON Lines file. Records are validated on the way in and on the
 * way out; the file is never rewritten.
 */
export class JsonlProposalLog implements ProposalLogV1 {
  private readonly filePath: string;

  constructor(cfg: JsonlProposalLogConfig) {
    this.filePath = cfg.filePath;
    fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
  }

  append(record: ProposalLogRecordV1): void {
    const line = JSON.stringify(ProposalLogRecordV1Z.parse(record));
    fs.appendFileSync(this.filePath, `${line}\n`, "utf8");
  }

  records(): ProposalLogRecordV1[] {
    if (!fs.existsSync(this.filePath)) return [];
    return fs
      .readFileSync(this.filePath, "utf8")
      .split("\n")
      .filter((l) => l.trim().length > 0)
      .map((l) => ProposalLogRecordV1Z.parse(JSON.parse(l)));
  }
}
