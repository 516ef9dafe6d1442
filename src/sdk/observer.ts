/**
 * Observer hooks through which the session reports traffic and log records.
 *
 * The session never writes to the console itself; callers decide where
 * records go (see `lib/logger.ts` for the command-line sink).
 */

import type { Message } from "./codec.js";
import { toError } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  level: LogLevel;
  message: string;
  error?: Error;
}

/** Callbacks for observing session traffic and events. All optional. */
export interface SessionObserver {
  /** A message was written to the transport. */
  onOutgoing?: (message: Message) => void;
  /** A frame was read and decoded, before dispatch. */
  onIncoming?: (message: Message) => void;
  onLog?: (record: LogRecord) => void;
}

/** Hand `record` to the observer. A throwing `onLog` becomes a process warning. */
export function emitLog(observer: SessionObserver | undefined, record: LogRecord): void {
  try {
    observer?.onLog?.(record);
  } catch (err) {
    process.emitWarning(toError(err), "SessionObserverWarning");
  }
}
