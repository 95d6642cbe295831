import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export function createLogger(
  level: LogLevel,
  filePath?: string,
  fileLevel?: LogLevel,
  opts?: { console?: boolean },
): Logger {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    if (!consoleEnabled) {
      return pino({ level: "silent" });
    }
    return pino({ level });
  }
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }
  const streams = [
    ...(consoleEnabled ? [{ level, stream: process.stdout }] : []),
    {
      level: fileLevel ?? level,
      stream: pino.destination({ dest: filePath, sync: false }),
    },
  ];
  return pino({ level: "trace" }, multistream(streams));
}

/**
 * Logger that drops everything. Used by CLI commands that print their own
 * output and by tests.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
