/**
 * wire-session SDK: a concurrent WebSocket session client with message
 * dispatch and request/response correlation.
 *
 * @example Quick start
 * ```ts
 * import { connect, isType } from "./sdk/index.js";
 *
 * const session = await connect("ws://localhost:19765");
 * await session.send({ type: "ping", timestamp: "2025-01-01T00:00:00Z" });
 * const pong = await session.expectNext(isType("pong"), 3000);
 * await session.disconnect();
 * ```
 *
 * @module
 */

// ── Primary API ─────────────────────────────────────────────────────
export {
  connect,
  createSession,
  Session,
  type SessionOptions,
  type ConnectOptions,
  type SessionState,
  type MessageHandler,
} from "./session.js";

// ── Messages ────────────────────────────────────────────────────────
export {
  encode,
  decode,
  structured,
  raw,
  isJsonObject,
  type Message,
  type StructuredMessage,
  type RawMessage,
  type JsonValue,
  type JsonObject,
  type JsonPrimitive,
} from "./codec.js";

export {
  classify,
  matchInbound,
  matchInboundPartial,
  isInboundKind,
  assertNever,
  type InboundMessage,
  type InboundKind,
  type InboundOfKind,
  type InboundVisitor,
  type PartialInboundVisitor,
  type PingRequest,
  type EchoRequest,
  type OtherMessage,
  type Unstructured,
} from "./match.js";

export { isType, hasField } from "./predicates.js";

// ── Errors ──────────────────────────────────────────────────────────
export {
  SessionError,
  ConnectError,
  SendError,
  ParseError,
  TimeoutError,
  ConnectionClosedError,
  ExpectationCancelledError,
  isSessionError,
  isErrorCode,
  type SessionErrorCode,
  type ConnectFailure,
  type SendFailure,
} from "./errors.js";

// ── Low-level (advanced usage) ──────────────────────────────────────
export {
  Correlator,
  MAX_TIMEOUT_MS,
  type MessagePredicate,
  type ExpectOptions,
  type ExpectCountOptions,
} from "./correlator.js";
export {
  Dispatcher,
  pongFor,
  echoResponseFor,
  type DispatcherOptions,
  type DispatchOutcome,
} from "./dispatcher.js";
export { Inbox } from "./inbox.js";
export { type SessionObserver, type LogRecord, type LogLevel } from "./observer.js";
export {
  type Transport,
  type TransportState,
  type CloseInfo,
  type CloseInitiator,
  type Disposable,
} from "./transport/transport.js";
export {
  openWebSocketTransport,
  WebSocketTransport,
  type WebSocketTransportOptions,
} from "./transport/websocket.js";
export { createMemoryTransport, MemoryTransport } from "./transport/memory.js";
