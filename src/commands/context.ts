/**
 * Settings shared by every command, resolved once in `bin.ts`.
 */
import { setTimeout as sleep } from "node:timers/promises";
import type { JsonObject } from "../sdk/codec.js";
import { connect } from "../sdk/session.js";
import type { ConnectOptions, Session } from "../sdk/session.js";
import type { Logger } from "../lib/logger.js";

/** Opens a session; swapped out in tests. */
export type Connector = (url: string, opts: ConnectOptions) => Promise<Session>;

export interface CommandContext {
  url: string;
  logger: Logger;
  /** How long verification flows wait for responses. */
  timeoutMs: number;
  /** Spacing between scripted messages. */
  intervalMs: number;
  handshakeTimeoutMs: number;
  connect?: Connector;
}

/** Connect with the context's logger attached as the session observer. */
export function openSession(ctx: CommandContext): Promise<Session> {
  return (ctx.connect ?? connect)(ctx.url, {
    observer: ctx.logger.observer,
    handshakeTimeoutMs: ctx.handshakeTimeoutMs,
  });
}

/** Send `messages` in order, `ctx.intervalMs` apart. */
export async function sendAll(
  session: Session,
  messages: readonly JsonObject[],
  ctx: CommandContext,
): Promise<void> {
  for (const [i, body] of messages.entries()) {
    ctx.logger.info(`Sending test message ${i + 1}/${messages.length}`);
    await session.send(body);
    if (i < messages.length - 1) await sleep(ctx.intervalMs);
  }
}
