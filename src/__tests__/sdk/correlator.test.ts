import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { raw, structured } from "../../sdk/codec.js";
import { Correlator, MAX_TIMEOUT_MS } from "../../sdk/correlator.js";
import {
  ConnectionClosedError,
  ExpectationCancelledError,
  TimeoutError,
} from "../../sdk/errors.js";
import { isType } from "../../sdk/predicates.js";

describe("Correlator", () => {
  let correlator: Correlator;

  beforeEach(() => {
    vi.useFakeTimers();
    correlator = new Correlator();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("expectNext", () => {
    it("resolves with the first matching message and consumes it", async () => {
      const pong = correlator.expectNext(isType("pong"), 1000);
      expect(correlator.offer(structured({ type: "status_response" }))).toBe(false);
      const message = structured({ type: "pong", timestamp: "t1" });
      expect(correlator.offer(message)).toBe(true);
      await expect(pong).resolves.toBe(message);
      expect(correlator.pending).toBe(0);
    });

    it("settles once; later matches are not consumed", async () => {
      const pong = correlator.expectNext(isType("pong"), 1000);
      correlator.offer(structured({ type: "pong" }));
      expect(correlator.offer(structured({ type: "pong" }))).toBe(false);
      await pong;
    });

    it("rejects with TimeoutError at the deadline", async () => {
      const pong = correlator.expectNext(isType("pong"), 500);
      const assertion = expect(pong).rejects.toBeInstanceOf(TimeoutError);
      vi.advanceTimersByTime(500);
      await assertion;
      expect(correlator.pending).toBe(0);
    });

    it("hands a message to the earliest registered match only", async () => {
      const first = correlator.expectNext(isType("pong"), 1000);
      const second = correlator.expectNext(isType("pong"), 1000);
      const m1 = structured({ type: "pong", n: 1 });
      const m2 = structured({ type: "pong", n: 2 });
      correlator.offer(m1);
      correlator.offer(m2);
      await expect(first).resolves.toBe(m1);
      await expect(second).resolves.toBe(m2);
    });

    it("rejects only the expectation whose predicate throws", async () => {
      const broken = correlator.expectNext(() => {
        throw new Error("bad predicate");
      }, 1000);
      const healthy = correlator.expectNext(() => true, 1000);
      const message = raw("hello");
      expect(correlator.offer(message)).toBe(true);
      await expect(broken).rejects.toThrow("bad predicate");
      await expect(healthy).resolves.toBe(message);
    });

    it("rejects a timeout longer than a timer can hold", async () => {
      await expect(correlator.expectNext(() => true, 2 ** 31)).rejects.toThrow(
        new RangeError("Invalid timeout: 2147483648"),
      );
      await expect(correlator.expectCount(1, MAX_TIMEOUT_MS + 1)).rejects.toBeInstanceOf(RangeError);
      expect(correlator.pending).toBe(0);

      const longest = correlator.expectNext(isType("pong"), MAX_TIMEOUT_MS);
      vi.advanceTimersByTime(1000);
      expect(correlator.pending).toBe(1);
      correlator.offer(structured({ type: "pong" }));
      await expect(longest).resolves.toEqual(structured({ type: "pong" }));
    });

    it("rejects an invalid timeout", async () => {
      await expect(correlator.expectNext(() => true, -1)).rejects.toBeInstanceOf(RangeError);
      await expect(correlator.expectNext(() => true, Number.NaN)).rejects.toBeInstanceOf(RangeError);
      expect(correlator.pending).toBe(0);
    });
  });

  describe("expectCount", () => {
    it("resolves early once count messages arrive", async () => {
      const collecting = correlator.expectCount(2, 1000);
      const a = structured({ type: "a" });
      const b = raw("b");
      correlator.offer(a);
      correlator.offer(b);
      await expect(collecting).resolves.toEqual([a, b]);
      expect(correlator.offer(structured({ type: "c" }))).toBe(false);
    });

    it("resolves with what arrived by the deadline", async () => {
      const collecting = correlator.expectCount(5, 300);
      const a = structured({ type: "a" });
      correlator.offer(a);
      vi.advanceTimersByTime(300);
      await expect(collecting).resolves.toEqual([a]);
    });

    it("resolves empty at the deadline when nothing arrived", async () => {
      const collecting = correlator.expectCount(3, 100);
      vi.advanceTimersByTime(100);
      await expect(collecting).resolves.toEqual([]);
    });

    it("resolves immediately for a zero count", async () => {
      await expect(correlator.expectCount(0, 1000)).resolves.toEqual([]);
      expect(correlator.pending).toBe(0);
    });

    it("counts only messages the predicate accepts", async () => {
      const collecting = correlator.expectCount(1, 1000, { predicate: isType("pong") });
      expect(correlator.offer(structured({ type: "other" }))).toBe(false);
      const pong = structured({ type: "pong" });
      expect(correlator.offer(pong)).toBe(true);
      await expect(collecting).resolves.toEqual([pong]);
    });
  });

  describe("cancellation", () => {
    it("rejects on abort and leaves others pending", async () => {
      const controller = new AbortController();
      const cancelled = correlator.expectNext(() => true, 1000, { signal: controller.signal });
      const other = correlator.expectNext(() => true, 1000);
      controller.abort();
      await expect(cancelled).rejects.toBeInstanceOf(ExpectationCancelledError);
      expect(correlator.pending).toBe(1);
      const message = raw("x");
      correlator.offer(message);
      await expect(other).resolves.toBe(message);
    });

    it("rejects at once for an already-aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(
        correlator.expectCount(2, 1000, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(ExpectationCancelledError);
      expect(correlator.pending).toBe(0);
    });
  });

  describe("closeAll", () => {
    it("rejects every pending expectation and reports how many", async () => {
      const one = correlator.expectNext(() => true, 1000);
      const two = correlator.expectCount(3, 1000);
      const error = new ConnectionClosedError("caller");
      const settled = Promise.allSettled([one, two]);
      expect(correlator.closeAll(error)).toBe(2);
      expect(await settled).toEqual([
        { status: "rejected", reason: error },
        { status: "rejected", reason: error },
      ]);
      expect(correlator.pending).toBe(0);
    });

    it("rejects expectations registered after close", async () => {
      const error = new ConnectionClosedError("peer");
      correlator.closeAll(error);
      await expect(correlator.expectNext(() => true, 1000)).rejects.toBe(error);
    });

    it("does not let a cleared timer fire later", async () => {
      const pending = correlator.expectNext(() => true, 100);
      correlator.closeAll(new ConnectionClosedError("caller"));
      await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
