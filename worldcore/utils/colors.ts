//worldcore/utils/colors.ts

// Basic ANSI color helpers for Node console output.

export const Colors = {
  Reset: "\x1b[0m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",
  FgCyan: "\x1b[36m",

  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
} as const;

export type ColorCode = (typeof Colors)[keyof typeof Colors];

export function colorize(text: string, color?: ColorCode): string {
  if (!color || process.env.NO_COLOR) return text;
  return `${color}${text}${Colors.Reset}`;
}

// Matches ANSI color codes like \u001b[32m, \u001b[0m, etc.
const ANSI_REGEX = /\u001b\[[0-9;]*m/g;

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}
