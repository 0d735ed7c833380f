import fs from "node:fs";
import path from "node:path";

import { listSourceFiles } from "./source_files";

const FORBIDDEN_SQL = /\b(UPDATE\s+ledger_\w+|DELETE\s+FROM\s+ledger_\w+|DROP\s+TABLE|INSERT\s+OR\s+REPLACE)\b/i;
const FORBIDDEN_ROUTE = /\.(put|patch|delete)\s*\(/i;

/**
 * The ledger is append-only in storage and over HTTP: no SQL that rewrites
 * committed rows, and no mutating verbs on the server routes.
 */
export function checkLedgerAppendOnly(repoRoot: string): string[] {
  const hits: string[] = [];

  for (const file of listSourceFiles(path.join(repoRoot, "packages", "ledger", "src"))) {
    const txt = fs.readFileSync(file, "utf-8");
    const m = FORBIDDEN_SQL.exec(txt);
    if (m) hits.push(`${file}: forbidden SQL '${m[0]}'`);
  }

  for (const file of listSourceFiles(path.join(repoRoot, "apps", "server", "src", "routes"))) {
    const txt = fs.readFileSync(file, "utf-8");
    const m = FORBIDDEN_ROUTE.exec(txt);
    if (m) hits.push(`${file}: forbidden route verb '${m[1]}'`);
  }

  return hits;
}
