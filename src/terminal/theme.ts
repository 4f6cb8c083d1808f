import chalk, { Chalk, type ChalkInstance } from "chalk";

export type Theme = {
  heading: (text: string) => string;
  muted: (text: string) => string;
  success: (text: string) => string;
  error: (text: string) => string;
  accent: (text: string) => string;
};

function buildTheme(painter: ChalkInstance): Theme {
  return {
    heading: (text) => painter.bold(text),
    muted: (text) => painter.gray(text),
    success: (text) => painter.green(text),
    error: (text) => painter.red(text),
    accent: (text) => painter.cyan(text),
  };
}

const plainTheme: Theme = buildTheme(new Chalk({ level: 0 }));
let activeTheme: Theme = buildTheme(chalk);

/** Disables color for the rest of the process (`--no-color`, `output.color: false`). */
export function setColorEnabled(enabled: boolean): void {
  activeTheme = enabled ? buildTheme(chalk) : plainTheme;
}

export const theme: Theme = {
  heading: (text) => activeTheme.heading(text),
  muted: (text) => activeTheme.muted(text),
  success: (text) => activeTheme.success(text),
  error: (text) => activeTheme.error(text),
  accent: (text) => activeTheme.accent(text),
};

export function danger(text: string): string {
  return theme.error(text);
}
