// worldcore/utils/logger.ts

import { Colors, colorize, type ColorCode } from "./colors";
import { type LogLevel, logEnabled } from "../config/logconfig";

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function levelColor(level: LogLevel): ColorCode {
  switch (level) {
    case "debug":
      return Colors.BrightCyan;
    case "info":
      return Colors.FgGreen;
    case "warn":
      return Colors.FgYellow;
    case "error":
    default:
      return Colors.FgRed;
  }
}

function normalizeArgs(args: unknown[]): { message?: string; rest: unknown[] } {
  if (args.length === 0) {
    return { rest: [] };
  }

  const [first, ...rest] = args;

  if (typeof first === "string") {
    return { message: first, rest };
  }

  return { message: undefined, rest: args };
}

function maybeFormatError(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack,
    };
  }
  return value;
}

export class Logger {
  private constructor(private readonly scopeName: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, args: unknown[]): void {
    if (!logEnabled(this.scopeName, level)) return;

    const ts = timestamp();
    const { message, rest } = normalizeArgs(args);

    const tag = colorize(`[${this.scopeName}:${level.toUpperCase()}]`, color);
    const formattedRest = rest.map(maybeFormatError);

    // If first arg is string, show it inline; otherwise just tag + data.
    if (message !== undefined) {
      console.log(`${ts} ${tag} ${message}`, ...formattedRest);
    } else {
      console.log(`${ts} ${tag}`, ...formattedRest);
    }
  }

  debug(...args: unknown[]): void {
    this.write("debug", levelColor("debug"), args);
  }

  info(...args: unknown[]): void {
    this.write("info", levelColor("info"), args);
  }

  warn(...args: unknown[]): void {
    this.write("warn", levelColor("warn"), args);
  }

  error(...args: unknown[]): void {
    this.write("error", levelColor("error"), args);
  }

  // Convenience alias – logs at info level but with bright green tag
  success(...args: unknown[]): void {
    this.write("info", Colors.BrightGreen, args);
  }
}
