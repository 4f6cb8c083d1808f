import fs from "node:fs";
import os from "node:os";
import JSON5 from "json5";
import type { ZodIssue } from "zod";
import { resolveConfigPath } from "./paths.js";
import type { ConfigFileSnapshot, ConfigValidationIssue, GridcheckConfig } from "./types.js";
import { GridcheckSchema } from "./zod-schema.js";

export class ConfigValidationError extends Error {
  constructor(
    public readonly configPath: string,
    public readonly issues: ConfigValidationIssue[],
  ) {
    super(
      `Invalid config at ${configPath}:\n${issues
        .map((issue) => `- ${issue.path || "<root>"}: ${issue.message}`)
        .join("\n")}`,
    );
    this.name = "ConfigValidationError";
  }
}

export type ConfigIoDeps = {
  fs?: Pick<typeof fs, "existsSync" | "readFileSync">;
  json5?: { parse: (value: string) => unknown };
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  configPath?: string;
};

type ParseConfigJson5Result = { ok: true; parsed: unknown } | { ok: false; error: string };

export function parseConfigJson5(
  raw: string,
  json5: { parse: (value: string) => unknown } = JSON5,
): ParseConfigJson5Result {
  try {
    return { ok: true, parsed: json5.parse(raw) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

function toConfigIssue(issue: ZodIssue): ConfigValidationIssue {
  return { path: issue.path.join("."), message: issue.message };
}

export function validateConfigObject(
  raw: unknown,
): { ok: true; config: GridcheckConfig } | { ok: false; issues: ConfigValidationIssue[] } {
  const result = GridcheckSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, config: result.data };
  }
  return { ok: false, issues: result.error.issues.map(toConfigIssue) };
}

export function createConfigIO(overrides: ConfigIoDeps = {}) {
  const deps = {
    fs: overrides.fs ?? fs,
    json5: overrides.json5 ?? JSON5,
    env: overrides.env ?? process.env,
    homedir: overrides.homedir ?? os.homedir,
  };
  const configPath = overrides.configPath ?? resolveConfigPath(deps.env, deps.homedir);

  function readConfigFileSnapshot(): ConfigFileSnapshot {
    if (!deps.fs.existsSync(configPath)) {
      return { path: configPath, exists: false, valid: true, config: {}, issues: [] };
    }
    let raw: string;
    try {
      raw = deps.fs.readFileSync(configPath, "utf-8");
    } catch (err) {
      return {
        path: configPath,
        exists: true,
        valid: false,
        config: {},
        issues: [{ path: "", message: `read failed: ${String(err)}` }],
      };
    }
    const parsed = parseConfigJson5(raw, deps.json5);
    if (!parsed.ok) {
      return {
        path: configPath,
        exists: true,
        valid: false,
        config: {},
        issues: [{ path: "", message: `JSON5 parse failed: ${parsed.error}` }],
      };
    }
    const validated = validateConfigObject(parsed.parsed);
    if (!validated.ok) {
      return { path: configPath, exists: true, valid: false, config: {}, issues: validated.issues };
    }
    return { path: configPath, exists: true, valid: true, config: validated.config, issues: [] };
  }

  function loadConfig(): GridcheckConfig {
    const snapshot = readConfigFileSnapshot();
    if (!snapshot.valid) {
      throw new ConfigValidationError(snapshot.path, snapshot.issues);
    }
    return snapshot.config;
  }

  return { configPath, loadConfig, readConfigFileSnapshot };
}

export function loadConfig(): GridcheckConfig {
  return createConfigIO().loadConfig();
}

export function readConfigFileSnapshot(): ConfigFileSnapshot {
  return createConfigIO().readConfigFileSnapshot();
}
