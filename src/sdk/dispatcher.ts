/**
 * Dispatcher: the reaction rule table for inbound messages.
 *
 * Rules, first match wins:
 *   1. a pending expectation accepts the message → it is consumed there
 *   2. `type: "ping"`    → reply `{type: "pong", timestamp}`
 *   3. `command: "echo"` → reply `{type: "echo_response", original, response}`
 *   4. anything else     → handed to the unhandled-message callback
 *
 * Correlation runs before the auto-replies so a waiting caller sees a ping
 * exactly once and no reply is sent for it.
 */

import { structured } from "./codec.js";
import type { JsonObject, JsonValue, Message, StructuredMessage } from "./codec.js";
import type { Correlator } from "./correlator.js";
import { toError } from "./errors.js";
import { classify, matchInbound } from "./match.js";
import type { EchoRequest, InboundMessage, PingRequest } from "./match.js";
import type { LogRecord } from "./observer.js";

/** What the dispatcher did with one message. */
export type DispatchOutcome = "correlated" | "replied" | "reply_failed" | "observed";

export interface DispatcherOptions {
  correlator: Correlator;
  /** Writes an auto-reply. Expected to reject on failure. */
  send: (message: Message) => Promise<void>;
  /** Receives every message no other rule claimed. */
  onUnhandled: (inbound: InboundMessage) => void;
  log: (record: LogRecord) => void;
}

export class Dispatcher {
  readonly #opts: DispatcherOptions;

  constructor(opts: DispatcherOptions) {
    this.#opts = opts;
  }

  /** Apply the rule table to one message. Never rejects on a failed reply. */
  async handle(message: Message): Promise<DispatchOutcome> {
    if (this.#opts.correlator.offer(message)) return "correlated";

    const inbound = classify(message);
    const reply = matchInbound<StructuredMessage | null>(inbound, {
      ping: pongFor,
      echo: echoResponseFor,
      message: () => null,
      raw: () => null,
    });

    if (!reply) {
      this.#opts.onUnhandled(inbound);
      return "observed";
    }

    try {
      await this.#opts.send(reply);
      return "replied";
    } catch (err) {
      this.#opts.log({
        level: "error",
        message: `Failed to send ${inbound.kind} reply`,
        error: toError(err),
      });
      return "reply_failed";
    }
  }
}

/** `{type: "pong"}` echoing the ping's timestamp; no timestamp if it had none. */
export function pongFor(ping: PingRequest): StructuredMessage {
  const body: JsonObject =
    ping.timestamp === undefined
      ? { type: "pong" }
      : { type: "pong", timestamp: ping.timestamp };
  return structured(body);
}

/** `{type: "echo_response"}` carrying the request data and its echoed text. */
export function echoResponseFor(request: EchoRequest): StructuredMessage {
  return structured({
    type: "echo_response",
    original: request.data,
    response: `Echo: ${echoText(request.data)}`,
  });
}

function echoText(data: JsonValue): string {
  return typeof data === "string" ? data : JSON.stringify(data);
}
