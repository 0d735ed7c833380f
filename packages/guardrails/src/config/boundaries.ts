// Package separation. Keys are workspace directories under packages/.
export const FORBIDDEN_PACKAGE_DEPS: Record<string, string[]> = {
  "control-kernel": ["@vitalgate/diagnostic-overlay", "@vitalgate/asset-engine", "@vitalgate/ledger"],
  "diagnostic-overlay": ["@vitalgate/control-kernel", "@vitalgate/asset-engine"],
  "asset-engine": ["@vitalgate/control-kernel", "@vitalgate/diagnostic-overlay", "@vitalgate/ledger"],
  ledger: ["@vitalgate/control-kernel", "@vitalgate/diagnostic-overlay"],
};

// The overlay may name these packages' types but never load their values.
export const TYPE_ONLY_IMPORTS: Record<string, string[]> = {
  "diagnostic-overlay": ["@vitalgate/ledger"],
};
