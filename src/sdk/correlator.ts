/**
 * Correlator: pending expectations over inbound messages.
 *
 * Each expectation has a predicate, a deadline and a single settlement. The
 * dispatcher offers every inbound message here first; the first expectation
 * (in registration order) whose predicate accepts it consumes it.
 *
 * The pending set is only touched in synchronous sections on the event loop,
 * so registration, matching and removal never interleave.
 */

import type { Message } from "./codec.js";
import {
  ConnectionClosedError,
  ExpectationCancelledError,
  TimeoutError,
  toError,
} from "./errors.js";

/** Longest deadline a timer can hold; larger delays would fire at once. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Decides whether an inbound message satisfies an expectation. */
export type MessagePredicate = (message: Message) => boolean;

export interface ExpectOptions {
  /** Aborting rejects this expectation only, with ExpectationCancelledError. */
  signal?: AbortSignal;
}

export interface ExpectCountOptions extends ExpectOptions {
  /** Which messages count. Default: every message. */
  predicate?: MessagePredicate;
}

/** Settlement callbacks for one expectation. */
interface Settlers {
  /** Returns true once the expectation is satisfied. */
  take: (message: Message) => boolean;
  expire: () => void;
  fail: (error: Error) => void;
}

interface PendingExpectation extends Settlers {
  readonly predicate: MessagePredicate;
  readonly timer: ReturnType<typeof setTimeout>;
  readonly detach: () => void;
}

const acceptAll: MessagePredicate = () => true;

export class Correlator {
  readonly #pending = new Map<number, PendingExpectation>();
  #nextId = 0;
  #closedWith: ConnectionClosedError | undefined;

  /** Number of expectations still waiting. */
  get pending(): number {
    return this.#pending.size;
  }

  /**
   * Wait for the next message matching `predicate`.
   *
   * Rejects with TimeoutError after `timeoutMs`, with ConnectionClosedError if
   * the session closes first, or with ExpectationCancelledError on abort.
   */
  expectNext(
    predicate: MessagePredicate,
    timeoutMs: number,
    opts: ExpectOptions = {},
  ): Promise<Message> {
    return new Promise<Message>((resolve, reject) => {
      this.#add(predicate, timeoutMs, opts.signal, {
        take: (message) => {
          resolve(message);
          return true;
        },
        expire: () => reject(new TimeoutError(timeoutMs)),
        fail: reject,
      });
    });
  }

  /**
   * Collect up to `count` matching messages in arrival order.
   *
   * Resolves early once `count` arrive; at the deadline resolves with
   * whatever was collected, which may be fewer than `count`.
   */
  expectCount(
    count: number,
    timeoutMs: number,
    opts: ExpectCountOptions = {},
  ): Promise<Message[]> {
    const collected: Message[] = [];
    return new Promise<Message[]>((resolve, reject) => {
      if (count <= 0) {
        resolve(collected);
        return;
      }
      this.#add(opts.predicate ?? acceptAll, timeoutMs, opts.signal, {
        take: (message) => {
          collected.push(message);
          if (collected.length < count) return false;
          resolve([...collected]);
          return true;
        },
        expire: () => resolve([...collected]),
        fail: reject,
      });
    });
  }

  /**
   * Offer an inbound message to the pending expectations.
   * Returns true if one consumed it.
   */
  offer(message: Message): boolean {
    for (const [id, entry] of this.#pending) {
      let matched: boolean;
      try {
        matched = entry.predicate(message);
      } catch (err) {
        this.#remove(id);
        entry.fail(toError(err));
        continue;
      }
      if (!matched) continue;

      if (entry.take(message)) this.#remove(id);
      return true;
    }
    return false;
  }

  /**
   * Reject every pending expectation with `error` and refuse new ones.
   * Returns how many were pending.
   */
  closeAll(error: ConnectionClosedError): number {
    this.#closedWith ??= error;
    const entries = [...this.#pending.keys()]
      .map((id) => this.#remove(id))
      .filter((entry): entry is PendingExpectation => entry !== undefined);
    for (const entry of entries) {
      entry.fail(error);
    }
    return entries.length;
  }

  #add(
    predicate: MessagePredicate,
    timeoutMs: number,
    signal: AbortSignal | undefined,
    settlers: Settlers,
  ): void {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
      settlers.fail(new RangeError(`Invalid timeout: ${timeoutMs}`));
      return;
    }
    if (this.#closedWith) {
      settlers.fail(this.#closedWith);
      return;
    }
    if (signal?.aborted) {
      settlers.fail(new ExpectationCancelledError());
      return;
    }

    const id = ++this.#nextId;
    const onAbort = (): void => {
      if (this.#remove(id)) settlers.fail(new ExpectationCancelledError());
    };
    const timer = setTimeout(() => {
      if (this.#remove(id)) settlers.expire();
    }, timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    this.#pending.set(id, {
      ...settlers,
      predicate,
      timer,
      detach: () => signal?.removeEventListener("abort", onAbort),
    });
  }

  #remove(id: number): PendingExpectation | undefined {
    const entry = this.#pending.get(id);
    if (!entry) return undefined;
    this.#pending.delete(id);
    clearTimeout(entry.timer);
    entry.detach();
    return entry;
  }
}
