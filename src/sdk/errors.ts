/**
 * Structured error hierarchy for the session client.
 *
 * All errors extend SessionError with a `.code` discriminant for programmatic
 * handling via switch statements or type predicates.
 *
 * @example
 * ```ts
 * try {
 *   const pong = await session.expectNext(isPong, 3000);
 * } catch (e) {
 *   if (e instanceof SessionError) {
 *     switch (e.code) {
 *       case "TIMEOUT":           console.error(`No reply after ${e.timeoutMs}ms`); break;
 *       case "CONNECTION_CLOSED": console.error(`Closed by ${e.initiator}`); break;
 *     }
 *   }
 * }
 * ```
 */

import type { CloseInitiator } from "./transport/transport.js";

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** Union of all error codes for exhaustive switch handling. */
export type SessionErrorCode =
  | "CONNECT_FAILED"
  | "SEND_FAILED"
  | "PARSE_FAILED"
  | "TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CANCELLED";

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base error for all session client errors. */
export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, opts?: { cause?: Error }) {
    super(message, opts?.cause ? { cause: opts.cause } : undefined);
    this.code = code;
    this.name = "SessionError";
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** Why a connect attempt failed. */
export type ConnectFailure = "refused" | "handshake_failed" | "handshake_timeout" | "invalid_url";

/** Opening the transport failed. Not retried. */
export class ConnectError extends SessionError {
  readonly code = "CONNECT_FAILED" as const;
  readonly url: string;
  readonly reason: ConnectFailure;

  constructor(url: string, reason: ConnectFailure, opts?: { cause?: Error }) {
    const detail = opts?.cause ? `: ${opts.cause.message}` : "";
    super("CONNECT_FAILED", `Failed to connect to ${url} (${reason})${detail}`, opts);
    this.name = "ConnectError";
    this.url = url;
    this.reason = reason;
  }
}

/** Why a send failed. */
export type SendFailure = "not_connected" | "write_failed";

/** A message could not be written. Surfaced to the caller, never retried. */
export class SendError extends SessionError {
  readonly code = "SEND_FAILED" as const;
  readonly reason: SendFailure;

  constructor(reason: SendFailure, opts?: { cause?: Error }) {
    super(
      "SEND_FAILED",
      reason === "not_connected"
        ? "Cannot send: session is not connected"
        : `Write failed: ${opts?.cause?.message ?? "unknown error"}`,
      opts,
    );
    this.name = "SendError";
    this.reason = reason;
  }
}

/** Inbound text was not a JSON object. Reported to observers, never thrown. */
export class ParseError extends SessionError {
  readonly code = "PARSE_FAILED" as const;
  readonly text: string;

  constructor(text: string, opts?: { cause?: Error }) {
    super("PARSE_FAILED", `Not a JSON object: ${preview(text)}`, opts);
    this.name = "ParseError";
    this.text = text;
  }
}

/** An expectation's deadline passed without a match. */
export class TimeoutError extends SessionError {
  readonly code = "TIMEOUT" as const;
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("TIMEOUT", `No matching message within ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The connection ended while something was still waiting on it. */
export class ConnectionClosedError extends SessionError {
  readonly code = "CONNECTION_CLOSED" as const;
  readonly initiator: CloseInitiator;

  constructor(initiator: CloseInitiator, detail?: string) {
    super(
      "CONNECTION_CLOSED",
      initiator === "peer"
        ? `Connection closed by peer${detail ? `: ${detail}` : ""}`
        : "Connection closed",
    );
    this.name = "ConnectionClosedError";
    this.initiator = initiator;
  }
}

/** The waiting caller aborted its own expectation. */
export class ExpectationCancelledError extends SessionError {
  readonly code = "CANCELLED" as const;

  constructor(message: string = "Expectation cancelled") {
    super("CANCELLED", message);
    this.name = "ExpectationCancelledError";
  }
}

// ---------------------------------------------------------------------------
// Type predicates
// ---------------------------------------------------------------------------

/** Narrow any caught value to a {@link SessionError}. */
export function isSessionError(err: unknown): err is SessionError {
  return err instanceof SessionError;
}

/** Narrow to a specific error by code. */
export function isErrorCode<C extends SessionErrorCode>(
  err: unknown,
  code: C,
): err is SessionError & { code: C } {
  return err instanceof SessionError && err.code === code;
}

/** Coerce a caught value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function preview(text: string): string {
  return text.length > 80 ? `${text.slice(0, 80)}…` : text;
}
