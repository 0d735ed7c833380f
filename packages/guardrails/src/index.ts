import path from "node:path";

import { checkAnnotationFields } from "./checks/check_annotation_fields";
import { checkLedgerAppendOnly } from "./checks/check_ledger_append_only";
import { checkPackageBoundaries } from "./checks/check_package_boundaries";

export { checkAnnotationFields, checkLedgerAppendOnly, checkPackageBoundaries };

export function runGuardrails(repoRoot: string): string[] {
  return [...checkPackageBoundaries(repoRoot), ...checkLedgerAppendOnly(repoRoot), ...checkAnnotationFields(repoRoot)];
}

function main() {
  const repoRoot = path.resolve(__dirname, "..", "..", "..");
  const hits = runGuardrails(repoRoot);

  if (hits.length) {
    console.error("Guardrails FAILED:");
    for (const h of hits) console.error(" -", h);
    process.exit(1);
  }
  console.log("Guardrails OK");
}

if (require.main === module) main();
