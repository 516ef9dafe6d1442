/**
 * `wire-session ping`: one ping, one pong.
 */
import { isType } from "../sdk/predicates.js";
import { toError } from "../sdk/errors.js";
import { openSession, type CommandContext } from "./context.js";

export async function runPing(ctx: CommandContext, now: () => Date = () => new Date()): Promise<boolean> {
  const { logger } = ctx;
  const session = await openSession(ctx);
  const timestamp = now().toISOString();

  try {
    const [reply] = await Promise.all([
      session.expectNext(isType("pong"), ctx.timeoutMs),
      session.send({ type: "ping", timestamp }),
    ]);

    if (reply.kind === "structured" && reply.body.timestamp !== timestamp) {
      logger.warn(`Pong timestamp ${JSON.stringify(reply.body.timestamp ?? null)} does not match ${timestamp}`);
    }
    logger.info("✅ Ping-pong test passed");
    return true;
  } catch (err) {
    logger.error("❌ Ping-pong test failed", toError(err));
    return false;
  } finally {
    await session.disconnect();
  }
}
