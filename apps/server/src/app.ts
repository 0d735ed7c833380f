import Fastify, { type FastifyInstance } from "fastify";

import type { SessionConfigV1 } from "@vitalgate/contracts";
import type { HashLinkedLedgerV1 } from "@vitalgate/ledger";

import { registerFairnessRoutes } from "./routes/fairness";
import { registerSessionRoutes } from "./routes/sessions";
import type { ProposalLogV1 } from "./runtime/proposal_log";
import { SessionRegistry } from "./runtime/session_registry";

export interface BuildAppOptionsV1 {
  logger: boolean | { level: string };
  ledgerFor(subjectId: string): HashLinkedLedgerV1;
  proposalLogFor(subjectId: string): ProposalLogV1;
  defaultConfig: SessionConfigV1 | null;
  clock?: () => number;
}

export function buildApp(opts: BuildAppOptionsV1): { app: FastifyInstance; registry: SessionRegistry } {
  const app = Fastify({ logger: opts.logger });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  const registry = new SessionRegistry({
    logger: app.log,
    ledgerFor: opts.ledgerFor,
    proposalLogFor: opts.proposalLogFor,
    clock: opts.clock
  });
  registerSessionRoutes(app, registry, { defaultConfig: opts.defaultConfig });
  registerFairnessRoutes(app, registry);

  app.get("/api/health", async () => ({ ok: true, sessions: registry.subjectIds().length }));

  return { app, registry };
}
