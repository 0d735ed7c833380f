// packages/contracts/src/schema/common_v1.ts
import { z } from "zod";

export const SemVerZ = z
  .string()
  .regex(/^\d+\.\d+\.\d+$/); // SemVer only, no free text

export const Sha256RefZ = z
  .string()
  .regex(/^sha256:[0-9a-f]{64}$/);

export type Sha256Ref = z.infer<typeof Sha256RefZ>;

export const SEVERITIES_V1 = Object.freeze(["INFO", "WARN", "RISK"] as const);

export const SeverityV1Z = z.enum(SEVERITIES_V1);

export type SeverityV1 = z.infer<typeof SeverityV1Z>;
