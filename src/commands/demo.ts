/**
 * `wire-session demo`: send the test messages, give the server time to
 * answer, then drop into interactive mode.
 */
import { setTimeout as sleep } from "node:timers/promises";
import { TEST_MESSAGES } from "../lib/test-messages.js";
import { openSession, sendAll, type CommandContext } from "./context.js";
import { interact, type InteractiveIO } from "./interactive.js";

export async function runDemo(ctx: CommandContext, io?: InteractiveIO): Promise<void> {
  const session = await openSession(ctx);
  try {
    ctx.logger.info("Sending test messages...");
    await sendAll(session, TEST_MESSAGES, ctx);
    await sleep(ctx.timeoutMs);
    await interact(session, ctx.logger, io);
  } finally {
    await session.disconnect();
  }
}
