// packages/contracts/src/schema/decision_v1.ts
import { z } from "zod";

export const DENY_REASONS_V1 = Object.freeze([
  "RISK_INVARIANT",
  "CONSENT_INVALID",
  "POLICY_VIOLATION",
  "REVERSAL_CONDITIONS_UNMET"
] as const);

export const DenyReasonV1Z = z.enum(DENY_REASONS_V1);

export type DenyReasonV1 = z.infer<typeof DenyReasonV1Z>;

export const DecisionV1Z = z.discriminatedUnion("verdict", [
  z.object({ verdict: z.literal("ACCEPT") }).strict(),
  z
    .object({
      verdict: z.literal("DENY"),
      reason: DenyReasonV1Z,
      detail: z.string().min(1).optional() // first failing predicate or condition
    })
    .strict()
]);

export type DecisionV1 = z.infer<typeof DecisionV1Z>;

/**
 * Encodes a decision as the string committed to the ledger:
 * `ACCEPT` or `DENY:<REASON>[:<detail>]`.
 */
export function encodeDecisionV1(decision: DecisionV1): string {
  if (decision.verdict === "ACCEPT") return "ACCEPT";
  return decision.detail === undefined
    ? `DENY:${decision.reason}`
    : `DENY:${decision.reason}:${decision.detail}`;
}

export function decodeDecisionV1(code: string): DecisionV1 {
  if (code === "ACCEPT") return { verdict: "ACCEPT" };

  const parts = code.split(":");
  const reason = DenyReasonV1Z.safeParse(parts[1]);
  if (parts[0] !== "DENY" || !reason.success) {
    throw new Error(`DECISION_CODE_INVALID: ${code}`);
  }
  const detail = parts.slice(2).join(":");
  return detail.length > 0
    ? { verdict: "DENY", reason: reason.data, detail }
    : { verdict: "DENY", reason: reason.data };
}
