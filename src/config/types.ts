import type { z } from "zod";
import type { GridcheckSchema, OutputFormatSchema } from "./zod-schema.js";

export type GridcheckConfig = z.infer<typeof GridcheckSchema>;

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export type ConfigValidationIssue = {
  path: string;
  message: string;
};

export type ConfigFileSnapshot = {
  path: string;
  exists: boolean;
  valid: boolean;
  config: GridcheckConfig;
  issues: ConfigValidationIssue[];
};
