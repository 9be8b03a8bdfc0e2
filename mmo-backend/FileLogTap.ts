// mmo-backend/FileLogTap.ts

import fs from "fs";
import util from "util";

import { stripAnsi } from "../worldcore/utils/colors";

type ConsoleMethod = (...args: unknown[]) => void;

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") {
    return stripAnsi(arg);
  }
  if (arg instanceof Error) {
    const msg = arg.stack ?? arg.message;
    return stripAnsi(msg);
  }
  try {
    return stripAnsi(JSON.stringify(arg));
  } catch {
    return stripAnsi(util.inspect(arg));
  }
}

function formatLine(args: unknown[]): string {
  return args.map(serializeArg).join(" ");
}

function createTimestamp(): string {
  return new Date().toISOString();
}

function wrapMethod(
  level: string,
  original: ConsoleMethod,
  writer: (level: string, args: unknown[]) => void,
): ConsoleMethod {
  return (...args: unknown[]): void => {
    writer(level, args);
    original.call(console, ...args);
  };
}

/**
 * Tee console output into BW_FILELOG (ANSI stripped, ISO timestamps).
 * Returns false when no tap was installed.
 */
export function installFileLogTap(filePath = process.env.BW_FILELOG): boolean {
  if (!filePath) return false;

  let stream: fs.WriteStream;
  try {
    stream = fs.createWriteStream(filePath, { flags: "a" });
  } catch (err) {
    process.stderr.write(`file log tap disabled: ${String(err)}\n`);
    return false;
  }

  let broken = false;
  stream.on("error", (err) => {
    // Console output continues; only the tap stops.
    if (!broken) process.stderr.write(`file log tap write failed: ${String(err)}\n`);
    broken = true;
  });

  const writeLine = (level: string, args: unknown[]): void => {
    if (broken) return;
    stream.write(`[${createTimestamp()}] [${level}] ${formatLine(args)}\n`);
  };

  const { log, info, warn, error } = console;

  console.log = wrapMethod("log", log, writeLine);
  console.info = wrapMethod("info", info, writeLine);
  console.warn = wrapMethod("warn", warn, writeLine);
  console.error = wrapMethod("error", error, writeLine);
  return true;
}
