import fs from "node:fs";
import path from "node:path";

const SKIP_DIR = new Set(["node_modules", "dist", "__tests__", "fixtures"]);

/**
 * Non-test TypeScript sources under `dir`. A missing dir yields nothing.
 */
export function listSourceFiles(dir: string): string[] {
  const out: string[] = [];

  function walk(d: string) {
    for (const ent of fs.readdirSync(d, { withFileTypes: true })) {
      const full = path.join(d, ent.name);
      if (ent.isDirectory()) {
        if (SKIP_DIR.has(ent.name)) continue;
        walk(full);
      } else if (ent.isFile() && ent.name.endsWith(".ts")) {
        out.push(full);
      }
    }
  }

  if (fs.existsSync(dir)) walk(dir);
  return out.sort();
}

export interface ImportStatement {
  specifier: string;
  typeOnly: boolean;
}

const IMPORT_RE = /^\s*(import|export)\s+(type\s+)?[^;]*?from\s+["']([^"']+)["']/gm;

export function readImports(file: string): ImportStatement[] {
  const txt = fs.readFileSync(file, "utf-8");
  const out: ImportStatement[] = [];
  for (const m of txt.matchAll(IMPORT_RE)) {
    out.push({ specifier: m[3], typeOnly: m[2] !== undefined });
  }
  return out;
}
