// packages/contracts/src/schema/kernel_state_view_v1.ts
import { z } from "zod";

import { CapabilityTierV1Z } from "./capability_v1";

// Published, read-only view of the kernel's committed state.
export const KernelStateViewV1Z = z
  .object({
    tier: CapabilityTierV1Z,
    risk: z.number().nonnegative(),
    riskCeiling: z.number().nonnegative(), // ceiling of the current tier
    acceptedTransitionCount: z.number().int().nonnegative()
  })
  .strict();

export type KernelStateViewV1 = z.infer<typeof KernelStateViewV1Z>;
