// apps/server/src/routes/sessions.ts
//
// Session endpoints. The ledger is read-only over HTTP: entries are only ever
// written by the kernel path inside POST .../epochs.
//
// Error replies: { ok: false, errors: [{ code, path, message }] }
// 400 malformed input, 404 unknown session, 409 ordering/state conflicts.

import type { FastifyInstance, FastifyReply } from "fastify";
import { ZodError, z } from "zod";

import {
  CapabilityTierV1Z,
  parseSignalSnapshotV1,
  parseTransitionRequestV1,
  type SessionConfigV1
} from "@vitalgate/contracts";
import { ConfigRelaxationRejected } from "@vitalgate/session-config";

import {
  EpochOrderViolation,
  ProposalIdDuplicate,
  SessionAlreadyExists,
  SessionHalted,
  SessionNotFound,
  SessionResumeRefused,
  SubjectMismatch
} from "../runtime/errors";
import type { SessionRegistry } from "../runtime/session_registry";
import type { EpochInputV1 } from "../runtime/session_runtime";

export type RouteErrorV1 = { code: string; path: string; message: string };

export interface SessionRoutesOptionsV1 {
  /** Used when POST /api/sessions carries no config. */
  defaultConfig: SessionConfigV1 | null;
}

const CreateSessionBodyZ = z
  .object({
    subjectId: z.string().min(1),
    config: z.unknown().optional(),
    initialTier: CapabilityTierV1Z.optional()
  })
  .strict();

const EpochBodyZ = z.object({ snapshot: z.unknown(), request: z.unknown() }).strict();

const ReloadBodyZ = z.object({ config: z.unknown() }).strict();

type SubjectParams = { Params: { subjectId: string } };

function zodErrors(err: ZodError, code: string, prefix: string): RouteErrorV1[] {
  return err.issues.map((i) => ({
    code,
    path: [prefix, ...i.path.map(String)].filter((p) => p.length > 0).join("."),
    message: i.message
  }));
}

function parseOr<T>(
  parse: (input: unknown) => T,
  input: unknown,
  prefix: string
): { value: T | null; errors: RouteErrorV1[] } {
  try {
    return { value: parse(input), errors: [] };
  } catch (err: unknown) {
    if (err instanceof ZodError) return { value: null, errors: zodErrors(err, "INVALID_EPOCH_INPUT", prefix) };
    throw err;
  }
}

function fail(reply: FastifyReply, status: number, errors: RouteErrorV1[]): FastifyReply {
  return reply.code(status).send({ ok: false, errors });
}

// Runtime errors that carry a status, with the request field each one points at.
const KNOWN_ERRORS = [
  [EpochOrderViolation, "snapshot.epochIndex"],
  [SubjectMismatch, "snapshot.subjectId"],
  [SessionHalted, "subjectId"],
  [SessionNotFound, "subjectId"],
  [SessionAlreadyExists, "subjectId"],
  [SessionResumeRefused, "subjectId"],
  [ProposalIdDuplicate, "request.proposalId"]
] as const;

// Anything not listed is rethrown to Fastify.
function failKnown(reply: FastifyReply, err: unknown): FastifyReply {
  for (const [K, path] of KNOWN_ERRORS) {
    if (err instanceof K) return fail(reply, err.status, [{ code: err.code, path, message: err.message }]);
  }
  throw err;
}

// "<CODE>: <target> ..." where target is an axis field or a config section path.
function relaxationPath(violation: string): string {
  const target = violation.split(" ")[1] ?? "";
  return /^(hysteresis|risk|policy)\b/.test(target) ? `config.${target}` : "config.axes";
}

function admissionErrors(err: unknown, prefix: string): RouteErrorV1[] | null {
  if (err instanceof ZodError) return zodErrors(err, "SESSION_CONFIG_INVALID", prefix);
  if (err instanceof Error && err.message.startsWith("SESSION_CONFIG_ADMISSION_INVALID")) {
    return [{ code: "SESSION_CONFIG_INVALID", path: prefix, message: err.message }];
  }
  return null;
}

export function registerSessionRoutes(
  app: FastifyInstance,
  registry: SessionRegistry,
  opts: SessionRoutesOptionsV1
): void {
  // POST /api/sessions
  app.post("/api/sessions", async (req, reply) => {
    const body = CreateSessionBodyZ.safeParse(req.body ?? {});
    if (!body.success) return fail(reply, 400, zodErrors(body.error, "INVALID_BODY", ""));

    const config = body.data.config ?? opts.defaultConfig;
    if (config === null) {
      return fail(reply, 400, [
        { code: "SESSION_CONFIG_REQUIRED", path: "config", message: "no config given and no default configured" }
      ]);
    }

    try {
      const runtime = registry.create({ subjectId: body.data.subjectId, config, initialTier: body.data.initialTier });
      return reply.code(201).send({ ok: true, subjectId: runtime.subjectId, state: runtime.state() });
    } catch (err: unknown) {
      const errors = admissionErrors(err, "config");
      if (errors !== null) return fail(reply, 400, errors);
      return failKnown(reply, err);
    }
  });

  // POST /api/sessions/:subjectId/epochs
  // One epoch: kernel decision, ledger entry, committed state. Diagnostics follow asynchronously.
  app.post<SubjectParams>("/api/sessions/:subjectId/epochs", async (req, reply) => {
    const body = EpochBodyZ.safeParse(req.body ?? {});
    if (!body.success) return fail(reply, 400, zodErrors(body.error, "INVALID_BODY", ""));

    const snapshot = parseOr(parseSignalSnapshotV1, body.data.snapshot, "snapshot");
    const request = parseOr(parseTransitionRequestV1, body.data.request, "request");
    const errors = [...snapshot.errors, ...request.errors];
    if (snapshot.value === null || request.value === null) return fail(reply, 400, errors);
    const input: EpochInputV1 = { snapshot: snapshot.value, request: request.value };

    try {
      const runtime = registry.require(req.params.subjectId);
      const out = runtime.ingest(input);
      return reply.send({ ok: true, decision: out.decision, entry: out.entry, state: out.state });
    } catch (err: unknown) {
      return failKnown(reply, err);
    }
  });

  // GET /api/sessions/:subjectId/ledger
  app.get<SubjectParams>("/api/sessions/:subjectId/ledger", async (req, reply) => {
    try {
      const view = registry.require(req.params.subjectId).ledgerView();
      return reply.send({ ok: true, tipHash: view.tipHash(), entries: view.entries() });
    } catch (err: unknown) {
      return failKnown(reply, err);
    }
  });

  // POST /api/sessions/:subjectId/ledger/verify
  app.post<SubjectParams>("/api/sessions/:subjectId/ledger/verify", async (req, reply) => {
    try {
      const result = registry.require(req.params.subjectId).verify();
      if (result.ok) return reply.send({ ok: true, entries: result.entries });
      return fail(reply, 409, [
        { code: "CHAIN_CORRUPTION", path: `entries.${result.index}`, message: result.kind }
      ]);
    } catch (err: unknown) {
      return failKnown(reply, err);
    }
  });

  // GET /api/sessions/:subjectId/annotations
  // Advisory only; never an input to any decision.
  app.get<SubjectParams>("/api/sessions/:subjectId/annotations", async (req, reply) => {
    try {
      const runtime = registry.require(req.params.subjectId);
      const { pending, failures } = runtime.overlayStatus();
      return reply.send({ ok: true, annotations: runtime.ledgerView().annotations(), pending, failures });
    } catch (err: unknown) {
      return failKnown(reply, err);
    }
  });

  // POST /api/sessions/:subjectId/config/reload
  app.post<SubjectParams>("/api/sessions/:subjectId/config/reload", async (req, reply) => {
    const body = ReloadBodyZ.safeParse(req.body ?? {});
    if (!body.success) return fail(reply, 400, zodErrors(body.error, "INVALID_BODY", ""));

    try {
      const runtime = registry.require(req.params.subjectId);
      const active = runtime.reloadConfig(body.data.config);
      return reply.send({ ok: true, axes: active.axes.map((a) => a.axis) });
    } catch (err: unknown) {
      if (err instanceof ConfigRelaxationRejected) {
        const code = err.code;
        return fail(
          reply,
          409,
          err.violations.map((v) => ({ code, path: relaxationPath(v), message: v }))
        );
      }
      const errors = admissionErrors(err, "config");
      if (errors !== null) return fail(reply, 400, errors);
      return failKnown(reply, err);
    }
  });
}
