/**
 * Session: one live connection with its receive loop, dispatcher and
 * correlator.
 *
 * Created via `connect()` (WebSocket) or `createSession()` (any open
 * transport), a Session owns the full lifecycle: transport → inbox →
 * receive loop → dispatcher → correlator.
 *
 * @example
 * ```ts
 * import { connect } from "./sdk/index.js";
 *
 * const session = await connect("ws://localhost:19765");
 * await session.send({ type: "ping", timestamp: new Date().toISOString() });
 * const pong = await session.expectNext(isPong, 3000);
 * await session.disconnect();
 * ```
 */

import { decode, encode, structured } from "./codec.js";
import type { JsonObject, Message } from "./codec.js";
import { Correlator } from "./correlator.js";
import type { ExpectCountOptions, ExpectOptions, MessagePredicate } from "./correlator.js";
import { Dispatcher } from "./dispatcher.js";
import { ConnectionClosedError, SendError, toError } from "./errors.js";
import { Inbox } from "./inbox.js";
import type { InboundMessage } from "./match.js";
import { emitLog } from "./observer.js";
import type { LogRecord, SessionObserver } from "./observer.js";
import { openWebSocketTransport } from "./transport/websocket.js";
import type { CloseInfo, Disposable, Transport } from "./transport/transport.js";

// ── Options ──────────────────────────────────────────────────────────

export type SessionState = "disconnected" | "connected" | "closing" | "closed";

export interface SessionOptions {
  /** Receives traffic and log records. The session never logs on its own. */
  observer?: SessionObserver;
  /** Start the receive loop as soon as the session exists. Default: true. */
  autoReceive?: boolean;
}

export interface ConnectOptions extends SessionOptions {
  /** Abort the WebSocket handshake after this long. Default: 10000. */
  handshakeTimeoutMs?: number;
  /** Extra HTTP headers for the upgrade request. */
  headers?: Record<string, string>;
}

/** Handler for messages no dispatch rule claimed. */
export type MessageHandler = (inbound: InboundMessage) => void;

// ── Session ──────────────────────────────────────────────────────────

export class Session {
  readonly #transport: Transport;
  readonly #observer: SessionObserver | undefined;
  readonly #correlator = new Correlator();
  readonly #dispatcher: Dispatcher;
  readonly #inbox = new Inbox<string>();
  readonly #messageHandlers = new Set<MessageHandler>();
  readonly #transportSubs: Disposable[];
  readonly #closed = deferred<CloseInfo>();
  readonly #transportClosed = deferred<CloseInfo>();
  #state: SessionState = "disconnected";
  #writeQueue: Promise<void> = Promise.resolve();
  #loop: Promise<CloseInfo> | undefined;
  #peerClose: CloseInfo | undefined;
  #closeInfo: CloseInfo | undefined;

  /** @internal Use {@link connect} or {@link createSession} instead. */
  constructor(transport: Transport, opts: SessionOptions = {}) {
    this.#transport = transport;
    this.#observer = opts.observer;

    this.#dispatcher = new Dispatcher({
      correlator: this.#correlator,
      send: (message) => this.sendMessage(message),
      onUnhandled: (inbound) => this.#deliver(inbound),
      log: (record) => this.#log(record),
    });

    // Disposed on close; the close subscription is cleared by the transport.
    this.#transportSubs = [
      transport.onMessage((text) => this.#inbox.push(text)),
      transport.onError((err) =>
        this.#log({ level: "warn", message: "Transport error", error: err }),
      ),
    ];
    transport.onClose((info) => this.#handleTransportClose(info));

    if (transport.state === "open") {
      this.#state = "connected";
    } else {
      const info: CloseInfo = { initiator: "peer", reason: `transport is ${transport.state}` };
      this.#transportClosed.resolve(info);
      this.#finalize(info);
    }
  }

  /** Current lifecycle state. */
  get state(): SessionState {
    return this.#state;
  }

  /** Resolves once the session reaches `closed`, with how it ended. */
  get closed(): Promise<CloseInfo> {
    return this.#closed.promise;
  }

  /** Number of expectations still waiting for a message. */
  get pendingExpectations(): number {
    return this.#correlator.pending;
  }

  /**
   * Encode and write one message. Concurrent calls are written one at a
   * time, in call order. Rejects with SendError when not connected or when
   * the write fails; failed writes are not retried.
   */
  sendMessage(message: Message): Promise<void> {
    if (this.#state !== "connected") {
      return Promise.reject(new SendError("not_connected"));
    }
    const write = this.#writeQueue.then(() => this.#write(message));
    // Keep the queue going after a failed write; `write` carries the error.
    this.#writeQueue = write.catch(() => undefined);
    return write;
  }

  /** Send a JSON object body. */
  send(body: JsonObject): Promise<void> {
    return this.sendMessage(structured(body));
  }

  /**
   * Run the receive loop: read one frame, decode, dispatch, repeat.
   *
   * Ends when the session leaves `connected` or the peer closes; a peer close
   * runs the same cleanup as {@link disconnect}. Only one loop runs per
   * session; later calls return the running loop's promise.
   */
  runReceiveLoop(): Promise<CloseInfo> {
    this.#loop ??= this.#receive();
    return this.#loop;
  }

  /**
   * Close the connection. Stops the receive loop, closes the transport and
   * rejects every pending expectation with ConnectionClosedError. A no-op if
   * the session is already closing or closed. Resolves once the transport
   * has finished closing.
   */
  disconnect(): Promise<CloseInfo> {
    if (this.#state === "closing" || this.#state === "closed") {
      return this.#transportClosed.promise;
    }
    this.#state = "closing";
    this.#inbox.stop();
    this.#transport.close();
    this.#finalize({ initiator: "caller" });
    return this.#transportClosed.promise;
  }

  /** Wait for the next message matching `predicate`. See {@link Correlator.expectNext}. */
  expectNext(
    predicate: MessagePredicate,
    timeoutMs: number,
    opts?: ExpectOptions,
  ): Promise<Message> {
    return this.#correlator.expectNext(predicate, timeoutMs, opts);
  }

  /** Collect up to `count` messages. See {@link Correlator.expectCount}. */
  expectCount(count: number, timeoutMs: number, opts?: ExpectCountOptions): Promise<Message[]> {
    return this.#correlator.expectCount(count, timeoutMs, opts);
  }

  /** Subscribe to messages that no dispatch rule claimed. */
  onMessage(handler: MessageHandler): Disposable {
    this.#messageHandlers.add(handler);
    return { dispose: () => this.#messageHandlers.delete(handler) };
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  async #write(message: Message): Promise<void> {
    // The session may have closed while this write sat in the queue.
    if (this.#state !== "connected") throw new SendError("not_connected");
    try {
      await this.#transport.send(encode(message));
    } catch (err) {
      throw new SendError("write_failed", { cause: toError(err) });
    }
    this.#observe("onOutgoing", message);
  }

  /** Observer failures are logged; they never reach the loop or the writer. */
  #observe(hook: "onOutgoing" | "onIncoming", message: Message): void {
    try {
      this.#observer?.[hook]?.(message);
    } catch (err) {
      this.#log({ level: "error", message: `Observer ${hook} failed`, error: toError(err) });
    }
  }

  async #receive(): Promise<CloseInfo> {
    try {
      for await (const text of this.#inbox) {
        const message = decode(text, (error) =>
          this.#log({ level: "debug", message: "Received unstructured frame", error }),
        );
        this.#observe("onIncoming", message);
        await this.#dispatcher.handle(message);
      }
    } catch (err) {
      this.#finalize({ initiator: "caller", error: toError(err) });
      throw err;
    }
    return this.#finalize(this.#peerClose ?? { initiator: "caller" });
  }

  #deliver(inbound: InboundMessage): void {
    for (const handler of this.#messageHandlers) {
      try {
        handler(inbound);
      } catch (err) {
        this.#log({ level: "error", message: "Message handler failed", error: toError(err) });
      }
    }
  }

  #handleTransportClose(info: CloseInfo): void {
    this.#transportClosed.resolve(info);
    if (this.#state !== "connected") return;

    // Peer-initiated: let the loop drain frames that already arrived.
    this.#state = "closing";
    this.#peerClose = info;
    this.#inbox.end();
    if (!this.#loop) this.#finalize(info);
  }

  /** Move to `closed` exactly once; later calls return the first outcome. */
  #finalize(info: CloseInfo): CloseInfo {
    if (this.#closeInfo) return this.#closeInfo;
    this.#closeInfo = info;
    this.#state = "closed";
    this.#inbox.stop();
    if (this.#transport.state !== "closed") this.#transport.close();

    const detail = info.reason || info.error?.message;
    const rejected = this.#correlator.closeAll(new ConnectionClosedError(info.initiator, detail));

    if (info.initiator === "peer") {
      this.#log({
        level: info.error ? "warn" : "info",
        message: `Connection closed by peer${info.code !== undefined ? ` (code ${info.code})` : ""}`,
        ...(info.error ? { error: info.error } : {}),
      });
    } else {
      this.#log({ level: "info", message: "Disconnected" });
    }
    if (rejected > 0) {
      this.#log({ level: "debug", message: `Cancelled ${rejected} pending expectation(s)` });
    }

    for (const sub of this.#transportSubs) sub.dispose();
    this.#closed.resolve(info);
    return info;
  }

  #log(record: LogRecord): void {
    emitLog(this.#observer, record);
  }
}

// ── Factories ────────────────────────────────────────────────────────

/**
 * Wrap an already-open transport in a session. The receive loop starts
 * immediately unless `autoReceive` is false.
 */
export function createSession(transport: Transport, opts: SessionOptions = {}): Session {
  const session = new Session(transport, opts);
  if (opts.autoReceive !== false) {
    // A loop failure is recorded in the CloseInfo that `closed` resolves with.
    session.runReceiveLoop().catch(() => session.closed);
  }
  return session;
}

/**
 * Open a WebSocket connection to `url` and start a session on it.
 * Rejects with ConnectError on refusal or handshake failure; never retries.
 */
export async function connect(url: string, opts: ConnectOptions = {}): Promise<Session> {
  emitLog(opts.observer, { level: "info", message: `Connecting to ${url}` });

  let transport: Transport;
  try {
    transport = await openWebSocketTransport(url, {
      handshakeTimeoutMs: opts.handshakeTimeoutMs ?? 10_000,
      headers: opts.headers,
    });
  } catch (err) {
    emitLog(opts.observer, { level: "error", message: "Failed to connect", error: toError(err) });
    throw err;
  }

  emitLog(opts.observer, { level: "info", message: `Connected to ${url}` });
  return createSession(transport, opts);
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
