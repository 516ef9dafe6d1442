import { describe, expect, it } from "vitest";
import {
  ConfigError,
  buildEndpoint,
  parseEndpoint,
  parsePort,
  resolveEndpoint,
} from "../../lib/config.js";

describe("resolveEndpoint", () => {
  it("defaults to ws://localhost:19765", () => {
    expect(resolveEndpoint({}, {})).toBe("ws://localhost:19765");
  });

  it("takes host and port from the environment", () => {
    expect(
      resolveEndpoint({}, { WIRE_SESSION_HOST: "example.test", WIRE_SESSION_PORT: "8080" }),
    ).toBe("ws://example.test:8080");
  });

  it("prefers flags over the environment", () => {
    const env = { WIRE_SESSION_HOST: "env-host", WIRE_SESSION_PORT: "1111" };
    expect(resolveEndpoint({ host: "flag-host", port: 2222 }, env)).toBe("ws://flag-host:2222");
  });

  it("uses wss when secure", () => {
    expect(resolveEndpoint({ secure: true }, {})).toBe("wss://localhost:19765");
  });

  it("lets an explicit URL override host and port", () => {
    expect(resolveEndpoint({ url: "wss://example.test:9000", host: "other", port: 1 }, {})).toBe(
      "wss://example.test:9000",
    );
    expect(resolveEndpoint({}, { WIRE_SESSION_URL: "ws://from-env:7000" })).toBe("ws://from-env:7000");
  });

  it("ignores blank environment values", () => {
    expect(resolveEndpoint({}, { WIRE_SESSION_URL: " ", WIRE_SESSION_PORT: "" })).toBe(
      "ws://localhost:19765",
    );
  });

  it("rejects a bad port from the environment", () => {
    expect(() => resolveEndpoint({}, { WIRE_SESSION_PORT: "http" })).toThrow(ConfigError);
  });
});

describe("parseEndpoint", () => {
  it("fills in the scheme's default port", () => {
    expect(parseEndpoint("ws://example.test")).toEqual({ scheme: "ws", host: "example.test", port: 80 });
    expect(parseEndpoint("wss://example.test")).toEqual({ scheme: "wss", host: "example.test", port: 443 });
  });

  it("strips IPv6 brackets", () => {
    expect(parseEndpoint("ws://[::1]:19765")).toEqual({ scheme: "ws", host: "::1", port: 19765 });
  });

  it("rejects other schemes", () => {
    expect(() => parseEndpoint("http://example.test")).toThrow('Unsupported scheme "http"');
  });

  it("rejects unparseable input", () => {
    expect(() => parseEndpoint("not a url")).toThrow("Invalid endpoint URL: not a url");
  });
});

describe("buildEndpoint", () => {
  it("brackets IPv6 hosts", () => {
    expect(buildEndpoint({ scheme: "ws", host: "::1", port: 19765 })).toBe("ws://[::1]:19765");
  });
});

describe("parsePort", () => {
  it("accepts 1 to 65535", () => {
    expect(parsePort("1")).toBe(1);
    expect(parsePort(" 65535 ")).toBe(65535);
    expect(parsePort(19765)).toBe(19765);
  });

  it.each(["0", "65536", "12.5", "abc", "-1"])("rejects %s", (value) => {
    expect(() => parsePort(value)).toThrow(`Invalid port: ${value}`);
  });
});
