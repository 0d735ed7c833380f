import fs from "node:fs";
import path from "node:path";

export function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (process.env[key] == null) process.env[key] = val;
  }
}

export interface ServerEnvV1 {
  port: number;
  host: string;
  logLevel: string;
  /** SQLite file holding every session's ledger, or ":memory:". */
  ledgerDbPath: string;
  /** One `<subjectId>.jsonl` proposal log per session. */
  proposalLogDir: string;
  /** Default session config; sessions may also bring their own. */
  sessionConfigPath: string;
}

function parsePort(v: string | undefined, fallback: number): number {
  if (v === undefined || v.trim() === "") return fallback;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new Error(`invalid PORT: ${v}`);
  return n;
}

export function readServerEnvV1(env: NodeJS.ProcessEnv, repoRoot: string): ServerEnvV1 {
  const dataDir = path.join(repoRoot, "apps", "server", "data");
  return {
    port: parsePort(env.PORT, 3100),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
    ledgerDbPath: env.LEDGER_DB_PATH || path.join(dataDir, "ledger.sqlite"),
    proposalLogDir: env.PROPOSAL_LOG_DIR || path.join(dataDir, "proposals"),
    sessionConfigPath: env.SESSION_CONFIG_PATH || path.join(repoRoot, "apps", "server", "config", "session_config.json")
  };
}

export function proposalLogPathFor(dir: string, subjectId: string): string {
  // One-to-one: distinct subject ids never share a file.
  return path.join(dir, `${encodeURIComponent(subjectId)}.jsonl`);
}
