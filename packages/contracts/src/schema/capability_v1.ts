// packages/contracts/src/schema/capability_v1.ts
import { z } from "zod";

/**
 * Capability tiers in ascending order of exposure. Order is normative:
 * rank comparisons in the kernel rely on the index into this list.
 */
export const CAPABILITY_TIERS_V1 = Object.freeze([
  "MODEL_ONLY",
  "LAB_BENCH",
  "CONTROLLED_HUMAN",
  "GENERAL_USE"
] as const);

export const CapabilityTierV1Z = z.enum(CAPABILITY_TIERS_V1);

export type CapabilityTierV1 = z.infer<typeof CapabilityTierV1Z>;

export const SIGNER_ROLES_V1 = Object.freeze(["HOST", "OWNER", "KERNEL", "REGULATOR", "OPERATOR"] as const);

export const SignerRoleV1Z = z.enum(SIGNER_ROLES_V1);

export type SignerRoleV1 = z.infer<typeof SignerRoleV1Z>;

export const ConsentStateV1Z = z
  .object({
    token: z.string().min(1), // opaque consent token, audit only
    scope: z.array(CapabilityTierV1Z).min(1), // tiers this consent covers
    validFromMs: z.number().int().nonnegative(),
    validUntilMs: z.number().int().nonnegative(), // exclusive
    revoked: z.boolean().optional()
  })
  .strict();

export type ConsentStateV1 = z.infer<typeof ConsentStateV1Z>;

export const ReversalEvidenceV1Z = z
  .object({
    explicitOrder: z.boolean(),
    noSaferAlternative: z.boolean(),
    signerRoles: z.array(SignerRoleV1Z)
  })
  .strict();

export type ReversalEvidenceV1 = z.infer<typeof ReversalEvidenceV1Z>;
