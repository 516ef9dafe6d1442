import { describe, expect, it, vi } from "vitest";
import { decode, encode, isJsonObject, raw, structured } from "../../sdk/codec.js";
import type { ParseError } from "../../sdk/errors.js";

describe("decode", () => {
  it("parses a JSON object into a structured message", () => {
    const message = decode('{"type":"ping","timestamp":"t1"}');
    expect(message).toEqual({ kind: "structured", body: { type: "ping", timestamp: "t1" } });
  });

  it("keeps invalid JSON as raw text and reports why", () => {
    const onParseError = vi.fn<(error: ParseError) => void>();
    const message = decode("not json", onParseError);
    expect(message).toEqual({ kind: "raw", text: "not json" });
    expect(onParseError).toHaveBeenCalledTimes(1);
    const [error] = onParseError.mock.calls[0];
    expect(error.code).toBe("PARSE_FAILED");
    expect(error.text).toBe("not json");
    expect(error.cause).toBeInstanceOf(SyntaxError);
  });

  it.each(["[1,2]", "42", '"text"', "null", "true"])(
    "treats top-level %s as raw",
    (text) => {
      const onParseError = vi.fn();
      expect(decode(text, onParseError)).toEqual({ kind: "raw", text });
      expect(onParseError).toHaveBeenCalledTimes(1);
    },
  );

  it("does not require a parse-error callback", () => {
    expect(decode("{").kind).toBe("raw");
  });

  it("freezes decoded bodies deeply", () => {
    const message = decode('{"data":{"nested":true,"list":[1]}}');
    expect(Object.isFrozen(message)).toBe(true);
    if (message.kind !== "structured") throw new Error("expected structured");
    expect(Object.isFrozen(message.body)).toBe(true);
    expect(Object.isFrozen(message.body.data)).toBe(true);
  });
});

describe("structured", () => {
  it("freezes a copy and leaves the caller's object writable", () => {
    const body = { type: "greeting", nested: { count: 1 } };
    const message = structured(body);

    body.type = "changed";
    body.nested.count = 2;

    expect(Object.isFrozen(body)).toBe(false);
    expect(Object.isFrozen(body.nested)).toBe(false);
    expect(message.body).toEqual({ type: "greeting", nested: { count: 1 } });
    expect(Object.isFrozen(message.body.nested)).toBe(true);
  });
});

describe("encode", () => {
  it("serializes structured bodies as compact JSON", () => {
    expect(encode(structured({ command: "echo", data: "hi" }))).toBe('{"command":"echo","data":"hi"}');
  });

  it("sends raw text unchanged", () => {
    expect(encode(raw("plain words"))).toBe("plain words");
  });

  it("round-trips a nested body", () => {
    const body = { type: "json_test", data: { nested: true, array: [1, 2, 3], n: 42.5 } };
    const decoded = decode(encode(structured(body)));
    expect(decoded).toEqual({ kind: "structured", body });
  });
});

describe("isJsonObject", () => {
  it("accepts plain objects only", () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject("x")).toBe(false);
  });
});
