/**
 * `wire-session test`: send the test messages and check that one response
 * comes back for each within the timeout.
 */
import type { Message } from "../sdk/codec.js";
import { TEST_MESSAGES } from "../lib/test-messages.js";
import { openSession, sendAll, type CommandContext } from "./context.js";

export interface TestReport {
  expected: number;
  responses: Message[];
  /** Responses that arrived without a `timestamp` field. */
  missingTimestamp: number;
  passed: boolean;
}

export async function runTest(ctx: CommandContext): Promise<TestReport> {
  const { logger } = ctx;
  const expected = TEST_MESSAGES.length;
  const session = await openSession(ctx);

  try {
    // Register before sending so early responses are collected, not dispatched.
    const [responses] = await Promise.all([
      session.expectCount(expected, ctx.timeoutMs),
      sendAll(session, TEST_MESSAGES, ctx),
    ]);

    let missingTimestamp = 0;
    for (const [i, response] of responses.entries()) {
      if (response.kind === "structured" && Object.hasOwn(response.body, "timestamp")) continue;
      missingTimestamp++;
      logger.warn(`Response ${i + 1} has no timestamp field`);
    }

    const passed = responses.length === expected;
    if (passed) {
      logger.info(`✅ Message exchange passed (${responses.length}/${expected} responses)`);
    } else {
      logger.error(`❌ Message exchange failed (${responses.length}/${expected} responses)`);
    }
    return { expected, responses, missingTimestamp, passed };
  } finally {
    await session.disconnect();
  }
}
