/**
 * Message codec: JSON text frames in, tagged messages out.
 *
 * Anything that does not parse to a JSON object is kept as a raw-text
 * message instead of failing, so the receive loop never has to stop for it.
 */

import { ParseError, toError } from "./errors.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;
export type JsonObject = { readonly [key: string]: JsonValue };

/** A frame whose body parsed to a JSON object. */
export interface StructuredMessage {
  readonly kind: "structured";
  readonly body: JsonObject;
}

/** A frame that was not a JSON object, kept verbatim. */
export interface RawMessage {
  readonly kind: "raw";
  readonly text: string;
}

export type Message = StructuredMessage | RawMessage;

/** Wrap a copy of a JSON object as a message; the copy is frozen. */
export function structured(body: JsonObject): StructuredMessage {
  return sealed(structuredClone(body));
}

/** Wrap text that should travel (or arrived) unparsed. */
export function raw(text: string): RawMessage {
  const message: RawMessage = { kind: "raw", text };
  return Object.freeze(message);
}

/** Serialize a message to the text sent in one frame. */
export function encode(message: Message): string {
  return message.kind === "structured" ? JSON.stringify(message.body) : message.text;
}

/**
 * Parse one frame. Never throws: a body that is not a JSON object comes back
 * as a raw message and `onParseError` (if given) receives the reason.
 */
export function decode(text: string, onParseError?: (error: ParseError) => void): Message {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    onParseError?.(new ParseError(text, { cause: toError(err) }));
    return raw(text);
  }

  if (!isJsonObject(parsed)) {
    onParseError?.(new ParseError(text));
    return raw(text);
  }
  return sealed(parsed);
}

/** True for a plain (non-array, non-null) object. */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Freeze an object this module owns; callers' objects go through `structured`. */
function sealed(body: JsonObject): StructuredMessage {
  const message: StructuredMessage = { kind: "structured", body: deepFreeze(body) };
  return Object.freeze(message);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
