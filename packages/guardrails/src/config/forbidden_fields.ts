// Hard boundary: a diagnostic annotation must not carry kernel or ledger state.
// If any of these appear as annotation keys, the advisory channel could be
// mistaken for (or replayed as) an authoritative one.
export const FORBIDDEN_ANNOTATION_FIELDS: string[] = [
  "entryHash",
  "prevHash",
  "capabilityState",
  "tier",
  "riskBefore",
  "riskAfter",
  "decision",
  "consent",
];
