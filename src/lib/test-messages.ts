import type { JsonObject } from "../sdk/codec.js";

/** Sent by `demo` and `test`: one of each message kind the server knows. */
export const TEST_MESSAGES: readonly JsonObject[] = [
  { type: "greeting", message: "Hello from wire-session!" },
  { command: "echo", data: "Test echo message" },
  { type: "ping", timestamp: "2025-01-01T00:00:00Z" },
  { command: "status", request_id: "test_001" },
  { type: "json_test", data: { nested: true, value: 42 } },
];

/** Sent by the message-exchange check. */
export const EXCHANGE_MESSAGES: readonly JsonObject[] = [
  { type: "ping", timestamp: "2025-01-01T00:00:00Z" },
  { command: "echo", data: "test echo" },
  { command: "status", request_id: "test_001" },
  { type: "greeting", message: "Hello from test!" },
];

/** Sent by the JSON-handling check. */
export const COMPLEX_MESSAGE: JsonObject = {
  type: "json_test",
  data: {
    nested: true,
    array: [1, 2, 3],
    string: "test string",
    number: 42.5,
    boolean: false,
  },
};
