// apps/server/src/server.ts
import path from "node:path";

import { HashLinkedLedgerV1, LedgerSqliteDatabase } from "@vitalgate/ledger";
import { loadSessionConfigFromFile } from "@vitalgate/session-config";

import { buildApp } from "./app";
import { loadDotEnvFile, proposalLogPathFor, readServerEnvV1 } from "./env";
import { JsonlProposalLog } from "./runtime/proposal_log";

const REPO_ROOT = path.resolve(__dirname, "..", "..", "..");

// Load repo root .env first, then package-local .env to allow overrides.
loadDotEnvFile(path.join(REPO_ROOT, ".env"));
loadDotEnvFile(path.join(__dirname, ".env"));

async function main(): Promise<void> {
  const env = readServerEnvV1(process.env, REPO_ROOT);

  const loaded = loadSessionConfigFromFile(env.sessionConfigPath);
  if (loaded.status === "INVALID") {
    throw new Error(`SESSION_CONFIG_INVALID: ${loaded.error_code} @ ${env.sessionConfigPath}`);
  }

  const db = new LedgerSqliteDatabase({ filePath: env.ledgerDbPath });
  const { app } = buildApp({
    logger: { level: env.logLevel },
    ledgerFor: (subjectId) => new HashLinkedLedgerV1(db.storeFor(subjectId)),
    proposalLogFor: (subjectId) => new JsonlProposalLog({ filePath: proposalLogPathFor(env.proposalLogDir, subjectId) }),
    defaultConfig: loaded.status === "APPLIED" ? loaded.config : null
  });
  app.addHook("onClose", async () => db.close());

  if (loaded.status === "APPLIED") {
    app.log.info({ config_ref: loaded.config_ref, path: env.sessionConfigPath }, "default session config applied");
  } else {
    app.log.warn({ path: env.sessionConfigPath }, "no default session config; sessions must bring one");
  }

  await app.listen({ port: env.port, host: env.host });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
