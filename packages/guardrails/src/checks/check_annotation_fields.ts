import fs from "node:fs";
import path from "node:path";

import { FORBIDDEN_ANNOTATION_FIELDS } from "../config/forbidden_fields";

export function checkAnnotationFields(repoRoot: string): string[] {
  const hits: string[] = [];
  const schema = path.join(repoRoot, "packages", "contracts", "src", "schema", "diagnostic_annotation_v1.ts");
  if (!fs.existsSync(schema)) {
    hits.push(`missing annotation schema: ${schema}`);
    return hits;
  }

  const txt = fs.readFileSync(schema, "utf-8");
  for (const field of FORBIDDEN_ANNOTATION_FIELDS) {
    if (new RegExp(`\\b${field}\\s*:`).test(txt)) {
      hits.push(`${schema}: forbidden annotation field '${field}'`);
    }
  }
  return hits;
}
