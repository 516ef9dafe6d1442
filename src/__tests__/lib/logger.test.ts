import { describe, expect, it } from "vitest";
import { raw, structured } from "../../sdk/codec.js";
import { createLogger, formatRecord } from "../../lib/logger.js";

const NOW = new Date("2025-01-01T00:00:00.000Z");

function capture(verbose = false) {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger({
    verbose,
    color: false,
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    now: () => NOW,
  });
  return { logger, out, err };
}

describe("formatRecord", () => {
  it("formats time, level and message", () => {
    expect(formatRecord({ level: "info", message: "Connected" }, NOW)).toBe(
      "2025-01-01T00:00:00.000Z - INFO - Connected",
    );
  });

  it("appends the error message", () => {
    expect(
      formatRecord({ level: "warn", message: "Transport error", error: new Error("reset") }, NOW),
    ).toBe("2025-01-01T00:00:00.000Z - WARNING - Transport error: reset");
  });
});

describe("createLogger", () => {
  it("writes info to stdout and warnings and errors to stderr", () => {
    const { logger, out, err } = capture();
    logger.info("hello");
    logger.warn("careful");
    logger.error("broken", new Error("boom"));
    expect(out).toEqual(["2025-01-01T00:00:00.000Z - INFO - hello"]);
    expect(err).toEqual([
      "2025-01-01T00:00:00.000Z - WARNING - careful",
      "2025-01-01T00:00:00.000Z - ERROR - broken: boom",
    ]);
  });

  it("hides debug unless verbose", () => {
    const quiet = capture();
    quiet.logger.debug("hidden");
    expect(quiet.out).toEqual([]);

    const loud = capture(true);
    loud.logger.debug("shown");
    expect(loud.out).toEqual(["2025-01-01T00:00:00.000Z - DEBUG - shown"]);
  });

  it("logs session traffic through the observer", () => {
    const { logger, out } = capture();
    logger.observer.onOutgoing?.(structured({ type: "ping" }));
    logger.observer.onIncoming?.(raw("not json"));
    expect(out).toEqual([
      '2025-01-01T00:00:00.000Z - INFO - 📤 Sent: {"type":"ping"}',
      "2025-01-01T00:00:00.000Z - INFO - 📥 Received: not json",
    ]);
  });

  it("routes session log records by level", () => {
    const { logger, out, err } = capture();
    logger.observer.onLog?.({ level: "info", message: "Disconnected" });
    logger.observer.onLog?.({ level: "debug", message: "Cancelled 1 pending expectation(s)" });
    logger.observer.onLog?.({ level: "error", message: "Failed to connect", error: new Error("refused") });
    expect(out).toEqual(["2025-01-01T00:00:00.000Z - INFO - Disconnected"]);
    expect(err).toEqual(["2025-01-01T00:00:00.000Z - ERROR - Failed to connect: refused"]);
  });
});
