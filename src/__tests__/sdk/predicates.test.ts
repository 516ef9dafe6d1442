import { describe, expect, it } from "vitest";
import { hasField, isType, raw, structured } from "../../sdk/index.js";

describe("isType", () => {
  it("matches the type field of structured messages", () => {
    const isPong = isType("pong");
    expect(isPong(structured({ type: "pong" }))).toBe(true);
    expect(isPong(structured({ type: "ping" }))).toBe(false);
    expect(isPong(structured({ command: "pong" }))).toBe(false);
    expect(isPong(raw('{"type":"pong"}'))).toBe(false);
  });
});

describe("hasField", () => {
  it("checks presence when no value is given", () => {
    const hasTimestamp = hasField("timestamp");
    expect(hasTimestamp(structured({ type: "pong", timestamp: null }))).toBe(true);
    expect(hasTimestamp(structured({ type: "pong" }))).toBe(false);
    expect(hasTimestamp(raw("timestamp"))).toBe(false);
  });

  it("ignores names inherited from Object.prototype", () => {
    const message = structured({ type: "pong" });
    expect(hasField("toString")(message)).toBe(false);
    expect(hasField("constructor")(message)).toBe(false);
    expect(hasField("hasOwnProperty")(message)).toBe(false);
  });

  it("compares primitive values", () => {
    const forRequest = hasField("request_id", "test_001");
    expect(forRequest(structured({ type: "status_response", request_id: "test_001" }))).toBe(true);
    expect(forRequest(structured({ type: "status_response", request_id: "test_002" }))).toBe(false);
  });
});
