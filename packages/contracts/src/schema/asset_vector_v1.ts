// packages/contracts/src/schema/asset_vector_v1.ts
import { z } from "zod";

export const ASSET_NAMES_V1 = Object.freeze([
  "BLOOD",
  "OXYGEN",
  "WAVE",
  "TIME",
  "DECAY",
  "LIFEFORCE",
  "BRAIN",
  "SMART",
  "EVOLVE",
  "POWER",
  "TECH",
  "FEAR",
  "PAIN",
  "NANO",
  "BREATH"
] as const);

export type AssetNameV1 = (typeof ASSET_NAMES_V1)[number];

const UnitZ = z.number().min(0).max(1);

export const AssetVectorV1Z = z
  .object({
    BLOOD: UnitZ,
    OXYGEN: UnitZ,
    WAVE: UnitZ,
    TIME: UnitZ,
    DECAY: UnitZ,
    LIFEFORCE: UnitZ,
    BRAIN: UnitZ,
    SMART: UnitZ,
    EVOLVE: UnitZ,
    POWER: UnitZ,
    TECH: UnitZ,
    FEAR: UnitZ,
    PAIN: UnitZ,
    NANO: UnitZ,
    BREATH: UnitZ
  })
  .strict();

export type AssetVectorV1 = z.infer<typeof AssetVectorV1Z>;
