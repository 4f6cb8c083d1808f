import { createRequire } from "node:module";

const PACKAGE_NAME = "gridcheck";

// src/version.ts in a checkout, dist/version.js once built.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "./package.json"] as const;

export function readVersionFromPackageJsonForModuleUrl(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      continue;
    }
    if (!parsed || typeof parsed !== "object") {
      continue;
    }
    const name = "name" in parsed ? parsed.name : undefined;
    const version = "version" in parsed ? parsed.version : undefined;
    if (name !== PACKAGE_NAME || typeof version !== "string" || !version.trim()) {
      continue;
    }
    return version.trim();
  }
  return null;
}

// Single source of truth for the CLI's --version output.
export const VERSION = readVersionFromPackageJsonForModuleUrl(import.meta.url) ?? "0.0.0";
