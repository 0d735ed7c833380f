import crypto from "node:crypto";
import fs from "node:fs";

import type { SessionConfigV1 } from "@vitalgate/contracts";
import { ZodError } from "zod";

import { validateSessionConfigV1 } from "./validator";

export type SessionConfigLoadResultV1 =
  | { status: "APPLIED"; config_ref: string; config: SessionConfigV1 }
  | { status: "MISSING"; config_ref: "MISSING" }
  | { status: "INVALID"; config_ref: string; error_code: string };

function configRefFromBytes(bytes: Buffer): string {
  return `sha256:${crypto.createHash("sha256").update(bytes).digest("hex")}`;
}

function errorToCode(e: unknown): string {
  if (e instanceof SyntaxError) return "SESSION_CONFIG_JSON_INVALID";
  if (e instanceof ZodError) return "SESSION_CONFIG_ZOD_INVALID";
  return "SESSION_CONFIG_ADMISSION_INVALID";
}

/**
 * Loads exactly the file at `filePath`. No directory scanning, no defaults.
 * The ref is computed over the raw bytes so it can be recomputed offline.
 */
export function loadSessionConfigFromFile(filePath: string): SessionConfigLoadResultV1 {
  if (!fs.existsSync(filePath)) {
    return { status: "MISSING", config_ref: "MISSING" };
  }

  const bytes = fs.readFileSync(filePath);
  const config_ref = configRefFromBytes(bytes);

  try {
    const json: unknown = JSON.parse(bytes.toString("utf8"));
    return { status: "APPLIED", config_ref, config: validateSessionConfigV1(json) };
  } catch (e: unknown) {
    return { status: "INVALID", config_ref, error_code: errorToCode(e) };
  }
}
