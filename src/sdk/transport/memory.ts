/**
 * In-memory transport pair for deterministic testing.
 *
 * Frames sent on one side appear on the other via queueMicrotask,
 * giving async-like ordering without real I/O.
 */

import type { CloseInfo, Disposable, Transport, TransportState } from "./transport.js";

/**
 * Create a linked pair of in-memory transports.
 * Frames sent on one appear on the other, in send order.
 */
export function createMemoryTransport(): [MemoryTransport, MemoryTransport] {
  const a = new MemoryTransport();
  const b = new MemoryTransport();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

export class MemoryTransport implements Transport {
  readonly #messageHandlers = new Set<(data: string) => void>();
  readonly #closeHandlers = new Set<(info: CloseInfo) => void>();
  readonly #errorHandlers = new Set<(error: Error) => void>();
  #state: TransportState = "open";
  peer: MemoryTransport | undefined;

  get state(): TransportState {
    return this.#state;
  }

  send(data: string): Promise<void> {
    if (this.#state !== "open") {
      return Promise.reject(new Error(`Cannot send in "${this.#state}" state`));
    }
    const target = this.peer;
    queueMicrotask(() => {
      if (!target || target.#state !== "open") return;
      for (const handler of target.#messageHandlers) {
        handler(data);
      }
    });
    return Promise.resolve();
  }

  onMessage(handler: (data: string) => void): Disposable {
    this.#messageHandlers.add(handler);
    return { dispose: () => this.#messageHandlers.delete(handler) };
  }

  onClose(handler: (info: CloseInfo) => void): Disposable {
    this.#closeHandlers.add(handler);
    return { dispose: () => this.#closeHandlers.delete(handler) };
  }

  onError(handler: (error: Error) => void): Disposable {
    this.#errorHandlers.add(handler);
    return { dispose: () => this.#errorHandlers.delete(handler) };
  }

  /** Close this side; the peer observes a peer-initiated close. */
  close(): void {
    if (this.#state === "closed") return;
    this.#shutdown({ initiator: "caller", code: 1000 });
    const peer = this.peer;
    if (peer !== undefined) peer.#shutdown({ initiator: "peer", code: 1000 });
  }

  /** Simulate a broken connection: both sides see a peer close carrying `error`. */
  fail(error: Error): void {
    if (this.#state === "closed") return;
    for (const handler of this.#errorHandlers) {
      handler(error);
    }
    this.#shutdown({ initiator: "peer", code: 1006, error });
    const peer = this.peer;
    if (peer !== undefined) peer.#shutdown({ initiator: "peer", code: 1006, error });
  }

  #shutdown(info: CloseInfo): void {
    if (this.#state === "closed") return;
    this.#state = "closed";
    for (const handler of this.#closeHandlers) {
      handler(info);
    }
    this.#closeHandlers.clear();
  }
}
