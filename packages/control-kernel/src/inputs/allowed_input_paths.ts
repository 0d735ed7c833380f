// Control Kernel - Allowed input fields (v1)
//
// Executable allowlist of the proposal fields the kernel may read. Anything not
// listed here (epoch index, annotations, asset values, diagnostic tags) is
// outside the kernel's readable surface.

export const KERNEL_INPUT_FIELDS_V1 = Object.freeze([
  "proposalId",
  "fromState",
  "toState",
  "riskBefore",
  "riskAfter",
  "consent",
  "role",
  "jurisdiction",
  "policyRefs",
  "reversal",
  "evaluatedAtMs"
] as const);

export type KernelInputFieldV1 = (typeof KERNEL_INPUT_FIELDS_V1)[number];

export function isAllowedKernelInputFieldV1(field: string): field is KernelInputFieldV1 {
  return KERNEL_INPUT_FIELD_SET_V1.has(field);
}

const KERNEL_INPUT_FIELD_SET_V1: ReadonlySet<string> = new Set<string>(KERNEL_INPUT_FIELDS_V1);
