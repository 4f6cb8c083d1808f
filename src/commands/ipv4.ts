import type { GridcheckConfig } from "../config/types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { RuntimeEnv } from "../runtime.js";
import { formatIPv4Issue, inspectIPv4 } from "../shared/net/ipv4.js";
import { theme } from "../terminal/theme.js";
import { type OutputOptions, padStatus, resolveOutputFormat } from "./output.js";

const log = createSubsystemLogger("ipv4");

export type Ipv4CommandOptions = OutputOptions & {
  candidates: string[];
};

export type Ipv4CheckResult = {
  candidate: string;
  valid: boolean;
  issue?: string;
};

export function checkIpv4Candidates(candidates: string[]): Ipv4CheckResult[] {
  return candidates.map((candidate) => {
    const inspection = inspectIPv4(candidate);
    const issue = formatIPv4Issue(inspection);
    return issue === undefined ? { candidate, valid: true } : { candidate, valid: false, issue };
  });
}

export function ipv4Command(
  opts: Ipv4CommandOptions,
  config: GridcheckConfig,
  runtime: RuntimeEnv,
): void {
  const results = checkIpv4Candidates(opts.candidates);
  const invalid = results.filter((result) => !result.valid);
  log.info("checked ipv4 candidates", { total: results.length, invalid: invalid.length });
  for (const result of invalid) {
    log.debug("invalid ipv4 candidate", { candidate: result.candidate, issue: result.issue });
  }

  if (!opts.quiet) {
    if (resolveOutputFormat(opts, config) === "json") {
      runtime.log(JSON.stringify(results, null, 2));
    } else {
      for (const result of results) {
        runtime.log(
          result.valid
            ? `${theme.success(padStatus(true))} ${result.candidate}`
            : `${theme.error(padStatus(false))} ${result.candidate}: ${theme.muted(result.issue ?? "")}`,
        );
      }
    }
  }
  if (invalid.length > 0) {
    runtime.exit(1);
  }
}
