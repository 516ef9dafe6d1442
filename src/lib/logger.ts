/**
 * Console sink for session traffic and log records.
 *
 * Lines read `<ISO time> - <LEVEL> - <message>`. Debug records only show in
 * verbose mode; warnings and errors go to stderr.
 */

import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import { encode } from "../sdk/codec.js";
import type { LogLevel, LogRecord, SessionObserver } from "../sdk/observer.js";

export interface LoggerOptions {
  /** Show debug records. */
  verbose?: boolean;
  /** Colour the level label. Default: whatever chalk detects. */
  color?: boolean;
  /** Line writers; default to process.stdout / process.stderr. */
  out?: (line: string) => void;
  err?: (line: string) => void;
  now?: () => Date;
}

/** Logger surface used by the commands. */
export interface Logger {
  /** Pass to the session to log its traffic and records. */
  observer: SessionObserver;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: Error): void;
  error(message: string, error?: Error): void;
}

const LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

/** Format one record as a log line (no trailing newline). */
export function formatRecord(record: LogRecord, time: Date, paint?: ChalkInstance): string {
  const label = paint ? colorLabel(paint, record.level) : LABELS[record.level];
  const detail = record.error ? `: ${record.error.message}` : "";
  return `${time.toISOString()} - ${label} - ${record.message}${detail}`;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const paint = new Chalk({ level: opts.color === false ? 0 : chalk.level });
  const out = opts.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = opts.err ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = opts.now ?? (() => new Date());

  const onLog = (record: LogRecord): void => {
    if (record.level === "debug" && !opts.verbose) return;
    const line = formatRecord(record, now(), paint);
    if (record.level === "warn" || record.level === "error") err(line);
    else out(line);
  };

  const observer: SessionObserver = {
    onOutgoing: (message) => onLog({ level: "info", message: `📤 Sent: ${encode(message)}` }),
    onIncoming: (message) => onLog({ level: "info", message: `📥 Received: ${encode(message)}` }),
    onLog,
  };

  return {
    observer,
    debug: (message) => onLog({ level: "debug", message }),
    info: (message) => onLog({ level: "info", message }),
    warn: (message, error) => onLog({ level: "warn", message, ...(error ? { error } : {}) }),
    error: (message, error) => onLog({ level: "error", message, ...(error ? { error } : {}) }),
  };
}

function colorLabel(paint: ChalkInstance, level: LogLevel): string {
  switch (level) {
    case "debug":
      return paint.dim(LABELS.debug);
    case "info":
      return paint.cyan(LABELS.info);
    case "warn":
      return paint.yellow(LABELS.warn);
    case "error":
      return paint.red(LABELS.error);
  }
}
