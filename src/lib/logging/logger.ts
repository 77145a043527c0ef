import { appendFileSync, mkdirSync } from "fs";
import path from "path";
import type { LogLevel } from "../env";
import { formatDateKey } from "../utils/date";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  scope?: string;
  /** Directory for daily `<scope>_yyyyMMdd.log` files. Without it entries go to stderr. */
  dir?: string | null;
  now?: () => Date;
}

type EntryLevel = Exclude<LogLevel, "silent">;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// stdout belongs to command output.
const toStderr = (line: string) => console.error(line);

function fileSink(dir: string, scope: string): (line: string, at: Date) => void {
  let dirReady = false;
  return (line, at) => {
    try {
      if (!dirReady) {
        mkdirSync(dir, { recursive: true });
        dirReady = true;
      }
      appendFileSync(path.join(dir, `${scope}_${formatDateKey(at)}.log`), `${line}\n`, "utf8");
    } catch {
      // Unwritable log directory; the entry still reaches stderr.
      toStderr(line);
    }
  };
}

/**
 * JSON-lines logger. Entries below `level` are dropped.
 */
export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const { scope = "stock-ledger", dir = null, now = () => new Date() } = options;
  const threshold = LEVEL_WEIGHT[level];
  const sink = dir ? fileSink(dir, scope) : (line: string) => toStderr(line);

  const write = (entryLevel: EntryLevel, message: string, context?: LogContext) => {
    if (LEVEL_WEIGHT[entryLevel] < threshold) {
      return;
    }
    const at = now();
    const entry = {
      timestamp: at.toISOString(),
      level: entryLevel,
      scope,
      message,
      ...(context && { context }),
    };
    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      // Circular context; keep the line without it.
      line = JSON.stringify({ ...entry, context: "[unserializable]" });
    }
    sink(line, at);
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}
