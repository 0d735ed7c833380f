import fs from "node:fs";
import path from "node:path";

import { FORBIDDEN_PACKAGE_DEPS, TYPE_ONLY_IMPORTS } from "../config/boundaries";
import { listSourceFiles, readImports } from "./source_files";

type PkgJson = {
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
};

function readPkg(p: string): PkgJson {
  const parsed: unknown = JSON.parse(fs.readFileSync(p, "utf-8"));
  if (typeof parsed !== "object" || parsed === null) return {};
  const deps = "dependencies" in parsed ? parsed.dependencies : undefined;
  const devDeps = "devDependencies" in parsed ? parsed.devDependencies : undefined;
  return { dependencies: asDepMap(deps), devDependencies: asDepMap(devDeps) };
}

function asDepMap(v: unknown): Record<string, string> | undefined {
  if (typeof v !== "object" || v === null) return undefined;
  const out: Record<string, string> = {};
  for (const [k, ver] of Object.entries(v)) if (typeof ver === "string") out[k] = ver;
  return out;
}

/**
 * Declared dependencies and actual imports must both respect the package
 * separation: the kernel never sees the overlay, the overlay never sees the
 * kernel, and the overlay only names ledger types.
 */
export function checkPackageBoundaries(repoRoot: string): string[] {
  const hits: string[] = [];

  for (const [dir, forbidden] of Object.entries(FORBIDDEN_PACKAGE_DEPS)) {
    const pkgDir = path.join(repoRoot, "packages", dir);
    const pkgJson = path.join(pkgDir, "package.json");
    if (!fs.existsSync(pkgJson)) {
      hits.push(`missing package.json: ${pkgJson}`);
      continue;
    }

    const pkg = readPkg(pkgJson);
    for (const name of forbidden) {
      if (pkg.dependencies?.[name] !== undefined || pkg.devDependencies?.[name] !== undefined) {
        hits.push(`${pkgJson}: forbidden dependency '${name}'`);
      }
    }

    const typeOnly = TYPE_ONLY_IMPORTS[dir] ?? [];
    for (const file of listSourceFiles(path.join(pkgDir, "src"))) {
      for (const imp of readImports(file)) {
        if (forbidden.includes(imp.specifier)) {
          hits.push(`${file}: forbidden import '${imp.specifier}'`);
        } else if (typeOnly.includes(imp.specifier) && !imp.typeOnly) {
          hits.push(`${file}: value import of '${imp.specifier}' (type-only allowed)`);
        }
      }
    }
  }

  return hits;
}
