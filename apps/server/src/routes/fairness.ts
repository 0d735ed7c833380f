// apps/server/src/routes/fairness.ts
//
// Cross-session diagnostics. Advisory only; nothing here feeds a decision.

import type { FastifyInstance } from "fastify";

import type { SessionRegistry } from "../runtime/session_registry";

export function registerFairnessRoutes(app: FastifyInstance, registry: SessionRegistry): void {
  // GET /api/fairness/unfair-drain
  app.get("/api/fairness/unfair-drain", async (_req, reply) => {
    return reply.send({ ok: true, flags: registry.unfairDrainReport() });
  });
}
