// Control Kernel - Policy stack (v1)
//
// Conjunction of named predicates, evaluated in declaration order. The first
// failing predicate names the POLICY_VIOLATION.

import type { PolicyConfigV1 } from "@vitalgate/contracts";

import type { KernelInputV1 } from "../inputs/projector";
import { tierDistanceV1 } from "../taxonomy/capability_tiers";

export const POLICY_PREDICATE_NAMES_V1 = Object.freeze(["JURISDICTION", "ROLE", "LATTICE_ADJACENCY"] as const);

export type PolicyPredicateNameV1 = (typeof POLICY_PREDICATE_NAMES_V1)[number];

export interface PolicyPredicateV1 {
  readonly name: PolicyPredicateNameV1;
  holds(input: KernelInputV1, policy: PolicyConfigV1): boolean;
}

const policyStack: PolicyPredicateV1[] = [
  {
    name: "JURISDICTION",
    holds: (input, policy) => policy.allowedJurisdictions.includes(input.jurisdiction)
  },
  {
    name: "ROLE",
    holds: (input, policy) => policy.rolesByTier[input.toState].includes(input.role)
  },
  {
    // One tier per transition unless a multi-tier policy is cited. Holding the
    // current tier is distance 0 and passes.
    name: "LATTICE_ADJACENCY",
    holds: (input, policy) =>
      tierDistanceV1(input.fromState, input.toState) <= 1 ||
      input.policyRefs.some((ref) => policy.multiTierPolicyRefs.includes(ref))
  }
];

export const POLICY_STACK_V1: ReadonlyArray<PolicyPredicateV1> = Object.freeze(policyStack);

export function firstFailingPolicyV1(input: KernelInputV1, policy: PolicyConfigV1): PolicyPredicateNameV1 | null {
  for (const predicate of POLICY_STACK_V1) {
    if (!predicate.holds(input, policy)) return predicate.name;
  }
  return null;
}
