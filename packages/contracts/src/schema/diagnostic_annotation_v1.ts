// packages/contracts/src/schema/diagnostic_annotation_v1.ts
//
// Advisory output of the diagnostic overlay. Attached beside ledger entries,
// never hashed into them. Consumers must not use any field as a decision input.
import { z } from "zod";

import { AssetVectorV1Z } from "./asset_vector_v1";
import { SeverityV1Z } from "./common_v1";

export const TAG_VOCABULARY_VERSION_V1 = "1.0.0" as const;

/**
 * Closed tag vocabulary. Adding a tag is a vocabulary version bump.
 */
export const DIAGNOSTIC_TAGS_V1 = Object.freeze([
  "ROW_HIGH",
  "ROW_RECOVERY",
  "GAMMA_OVERLOAD",
  "COGNITIVE_OVERLOAD",
  "CALM_STABLE",
  "OVERLOADED",
  "RECOVERY"
] as const);

export const DiagnosticTagV1Z = z.enum(DIAGNOSTIC_TAGS_V1);

export type DiagnosticTagV1 = z.infer<typeof DiagnosticTagV1Z>;

export const ROW_STATES_V1 = Object.freeze(["GAP", "INACTIVE", "HIGH", "RISING", "RECOVERING", "FLAT"] as const);

export const RowStateV1Z = z.enum(ROW_STATES_V1);

export type RowStateV1 = z.infer<typeof RowStateV1Z>;

// UNKNOWN: no gamma reading this epoch.
export const GAMMA_WAVE_STATES_V1 = Object.freeze(["UNKNOWN", "NOMINAL", "ELEVATED", "OVERLOAD"] as const);

export const GammaWaveStateV1Z = z.enum(GAMMA_WAVE_STATES_V1);

export type GammaWaveStateV1 = z.infer<typeof GammaWaveStateV1Z>;

export const DiagnosticAnnotationV1Z = z
  .object({
    proposalId: z.string().min(1), // attachment key into the annotation side table
    epochIndex: z.number().int().nonnegative(),
    tagVocabularyVersion: z.literal(TAG_VOCABULARY_VERSION_V1),
    treeOfLifeView: AssetVectorV1Z,
    envelopeStates: z.record(z.string().min(1), SeverityV1Z), // axis -> severity
    diagnostics: z
      .object({
        row: z.number().nullable(), // null means no valid metric for this epoch
        rowState: RowStateV1Z,
        gammaWaveState: GammaWaveStateV1Z,
        natureTags: z.array(DiagnosticTagV1Z)
      })
      .strict()
  })
  .strict();

export type DiagnosticAnnotationV1 = z.infer<typeof DiagnosticAnnotationV1Z>;

export function parseDiagnosticAnnotationV1(input: unknown): DiagnosticAnnotationV1 {
  return DiagnosticAnnotationV1Z.parse(input);
}
