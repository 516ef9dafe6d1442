/**
 * Ready-made predicates for `expectNext` / `expectCount`.
 */

import type { JsonValue, Message } from "./codec.js";
import type { MessagePredicate } from "./correlator.js";

/** Matches structured messages whose `type` field equals `type`. */
export function isType(type: string): MessagePredicate {
  return (message: Message) => message.kind === "structured" && message.body.type === type;
}

/**
 * Matches structured messages carrying `field`; when `value` is given, the
 * field must also equal it (primitives only).
 */
export function hasField(field: string, value?: JsonValue): MessagePredicate {
  return (message: Message) => {
    if (message.kind !== "structured" || !Object.hasOwn(message.body, field)) return false;
    return value === undefined || message.body[field] === value;
  };
}
