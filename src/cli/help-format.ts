import { theme } from "../terminal/theme.js";

export type HelpExample = readonly [command: string, description: string];

export function formatHelpExamples(examples: ReadonlyArray<HelpExample>): string {
  return examples
    .map(([command, description]) => `  ${theme.accent(command)}\n    ${theme.muted(description)}`)
    .join("\n");
}
