/**
 * Discriminator classification and type-safe matching for inbound messages.
 *
 * Every decoded frame is classified once into a closed set of variants, so
 * dispatch code switches on `kind` instead of probing keys.
 *
 * @example Exhaustive matching
 * ```ts
 * const label = matchInbound(classify(message), {
 *   ping:    (p) => `ping @ ${String(p.timestamp)}`,
 *   echo:    (e) => `echo ${JSON.stringify(e.data)}`,
 *   message: (m) => m.discriminator ?? "unknown",
 *   raw:     (r) => r.text,
 * });
 * ```
 *
 * @example Partial matching with default
 * ```ts
 * const isPing = matchInboundPartial(inbound, {
 *   ping: () => true,
 *   _:    () => false,
 * });
 * ```
 */

import type { JsonValue, Message, RawMessage, StructuredMessage } from "./codec.js";

/** `{type: "ping"}` keepalive ping. */
export interface PingRequest {
  readonly kind: "ping";
  /** The ping's `timestamp` field, absent when the ping had none. */
  readonly timestamp?: JsonValue;
  readonly message: StructuredMessage;
}

/** `{command: "echo"}` request. */
export interface EchoRequest {
  readonly kind: "echo";
  /** The request's `data` field, `null` when absent. */
  readonly data: JsonValue;
  readonly message: StructuredMessage;
}

/** Any other JSON object. */
export interface OtherMessage {
  readonly kind: "message";
  /** `type` if it is a string, else `command` if it is a string. */
  readonly discriminator?: string;
  readonly message: StructuredMessage;
}

/** A frame that was not a JSON object. */
export interface Unstructured {
  readonly kind: "raw";
  readonly text: string;
  readonly message: RawMessage;
}

export type InboundMessage = PingRequest | EchoRequest | OtherMessage | Unstructured;

/** Union of all variant tags. */
export type InboundKind = InboundMessage["kind"];

/** Extract a variant by its tag. */
export type InboundOfKind<K extends InboundKind> = Extract<InboundMessage, { kind: K }>;

/** A visitor requiring a handler for every variant. */
export type InboundVisitor<R> = {
  [K in InboundKind]: (inbound: InboundOfKind<K>) => R;
};

/** A partial visitor with a required `_` default for unhandled variants. */
export type PartialInboundVisitor<R> = Partial<InboundVisitor<R>> & {
  _: (inbound: InboundMessage) => R;
};

/**
 * Classify a decoded message. `type: "ping"` wins over `command: "echo"`
 * when a message carries both.
 */
export function classify(message: Message): InboundMessage {
  if (message.kind === "raw") {
    return { kind: "raw", text: message.text, message };
  }

  const { body } = message;
  if (body.type === "ping") {
    return Object.hasOwn(body, "timestamp")
      ? { kind: "ping", timestamp: body.timestamp, message }
      : { kind: "ping", message };
  }
  if (body.command === "echo") {
    return { kind: "echo", data: body.data ?? null, message };
  }

  const discriminator =
    typeof body.type === "string"
      ? body.type
      : typeof body.command === "string"
        ? body.command
        : undefined;
  return discriminator === undefined
    ? { kind: "message", message }
    : { kind: "message", discriminator, message };
}

/** Exhaustive matcher: compile error if any variant is missing. */
export function matchInbound<R>(inbound: InboundMessage, visitor: InboundVisitor<R>): R {
  switch (inbound.kind) {
    case "ping":
      return visitor.ping(inbound);
    case "echo":
      return visitor.echo(inbound);
    case "message":
      return visitor.message(inbound);
    case "raw":
      return visitor.raw(inbound);
    default:
      return assertNever(inbound);
  }
}

/** Partial matcher: unhandled variants fall through to the `_` default. */
export function matchInboundPartial<R>(
  inbound: InboundMessage,
  visitor: PartialInboundVisitor<R>,
): R {
  return matchInbound(inbound, {
    ping: visitor.ping ?? visitor._,
    echo: visitor.echo ?? visitor._,
    message: visitor.message ?? visitor._,
    raw: visitor.raw ?? visitor._,
  });
}

/** Type predicate that narrows an inbound message to one variant. */
export function isInboundKind<K extends InboundKind>(
  inbound: InboundMessage,
  kind: K,
): inbound is InboundOfKind<K> {
  return inbound.kind === kind;
}

/** Exhaustive-check helper: call in the `default` branch of a switch. */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
