import type { GridcheckConfig, OutputFormat } from "../config/types.js";

export type OutputOptions = {
  json?: boolean;
  quiet?: boolean;
};

export function resolveOutputFormat(opts: OutputOptions, config: GridcheckConfig): OutputFormat {
  if (opts.json) {
    return "json";
  }
  return config.output?.format ?? "text";
}

export function padStatus(valid: boolean): string {
  return valid ? "valid  " : "invalid";
}
