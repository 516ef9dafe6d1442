/**
 * WebSocket transport: one client connection over the `ws` package.
 *
 * Each text frame is one message. Binary frames are decoded as UTF-8 so the
 * session only ever sees strings.
 */

import WebSocket from "ws";
import { ConnectError, toError } from "../errors.js";
import type { ConnectFailure } from "../errors.js";
import type { CloseInfo, Disposable, Transport, TransportState } from "./transport.js";

/** Options for opening a WebSocketTransport. */
export interface WebSocketTransportOptions {
  /** Abort the opening handshake after this long. */
  handshakeTimeoutMs?: number;
  /** Extra HTTP headers sent with the upgrade request. */
  headers?: Record<string, string>;
}

/**
 * Open a WebSocket connection to `url` (`ws://host:port` or `wss://host:port`).
 * Rejects with ConnectError when the URL is invalid, the peer refuses, or the
 * handshake fails or times out. Never retries.
 */
export function openWebSocketTransport(
  url: string,
  opts: WebSocketTransportOptions = {},
): Promise<WebSocketTransport> {
  return new Promise<WebSocketTransport>((resolve, reject) => {
    let socket: WebSocket;
    try {
      socket = new WebSocket(url, {
        handshakeTimeout: opts.handshakeTimeoutMs,
        headers: opts.headers,
      });
    } catch (err) {
      reject(new ConnectError(url, "invalid_url", { cause: toError(err) }));
      return;
    }

    const onOpen = (): void => {
      socket.off("error", onError);
      resolve(new WebSocketTransport(socket));
    };
    const onError = (err: Error): void => {
      socket.off("open", onOpen);
      reject(new ConnectError(url, connectFailure(err), { cause: err }));
    };

    socket.once("open", onOpen);
    socket.once("error", onError);
  });
}

export class WebSocketTransport implements Transport {
  readonly #socket: WebSocket;
  readonly #messageHandlers = new Set<(data: string) => void>();
  readonly #closeHandlers = new Set<(info: CloseInfo) => void>();
  readonly #errorHandlers = new Set<(error: Error) => void>();
  #state: TransportState;
  #closeRequested = false;
  #lastError: Error | undefined;

  /** Wrap an already-open socket. Use {@link openWebSocketTransport} to dial. */
  constructor(socket: WebSocket) {
    this.#socket = socket;
    this.#state = socket.readyState === WebSocket.OPEN ? "open" : "connecting";

    socket.on("open", () => {
      this.#state = "open";
    });

    socket.on("message", (data: WebSocket.RawData) => {
      const text = rawDataToString(data);
      for (const handler of this.#messageHandlers) {
        handler(text);
      }
    });

    // ws follows every socket-level error with a close event
    socket.on("error", (err: Error) => {
      this.#lastError = err;
      for (const handler of this.#errorHandlers) {
        handler(err);
      }
    });

    socket.on("close", (code: number, reason: Buffer) => {
      this.#state = "closed";
      const info: CloseInfo = {
        initiator: this.#closeRequested ? "caller" : "peer",
        code,
        reason: reason.toString("utf8"),
      };
      if (this.#lastError) info.error = this.#lastError;
      for (const handler of this.#closeHandlers) {
        handler(info);
      }
      this.#closeHandlers.clear();
    });
  }

  /** Current connection state. */
  get state(): TransportState {
    return this.#state;
  }

  /** Write one text frame; resolves once ws has flushed it to the socket. */
  send(data: string): Promise<void> {
    if (this.#state !== "open") {
      return Promise.reject(new Error(`Cannot send in "${this.#state}" state`));
    }
    return new Promise<void>((resolve, reject) => {
      this.#socket.send(data, (err?: Error) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Register a handler for incoming frames. */
  onMessage(handler: (data: string) => void): Disposable {
    this.#messageHandlers.add(handler);
    return { dispose: () => this.#messageHandlers.delete(handler) };
  }

  /** Register a handler for transport close. Fires once. */
  onClose(handler: (info: CloseInfo) => void): Disposable {
    this.#closeHandlers.add(handler);
    return { dispose: () => this.#closeHandlers.delete(handler) };
  }

  /** Register a handler for socket errors. */
  onError(handler: (error: Error) => void): Disposable {
    this.#errorHandlers.add(handler);
    return { dispose: () => this.#errorHandlers.delete(handler) };
  }

  /** Start the closing handshake. Idempotent. */
  close(): void {
    if (this.#state === "closing" || this.#state === "closed") return;
    this.#closeRequested = true;
    this.#state = "closing";
    this.#socket.close(1000, "client disconnect");
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

function connectFailure(err: Error): ConnectFailure {
  if ("code" in err && err.code === "ECONNREFUSED") return "refused";
  if (/handshake has timed out/i.test(err.message)) return "handshake_timeout";
  return "handshake_failed";
}
