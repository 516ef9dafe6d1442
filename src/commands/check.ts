/**
 * `wire-session check`: connection, message exchange and JSON handling
 * checks against the server, with a pass/fail summary.
 */
import { isType } from "../sdk/predicates.js";
import { toError } from "../sdk/errors.js";
import { COMPLEX_MESSAGE, EXCHANGE_MESSAGES } from "../lib/test-messages.js";
import { openSession, sendAll, type CommandContext } from "./context.js";

export interface CheckResult {
  name: string;
  passed: boolean;
  detail: string;
}

type Check = (ctx: CommandContext) => Promise<CheckResult>;

const checkConnection: Check = async (ctx) => {
  const session = await openSession(ctx);
  await session.disconnect();
  return { name: "Connection", passed: true, detail: "connected and closed" };
};

const checkExchange: Check = async (ctx) => {
  const session = await openSession(ctx);
  try {
    const [responses] = await Promise.all([
      session.expectCount(EXCHANGE_MESSAGES.length, ctx.timeoutMs),
      sendAll(session, EXCHANGE_MESSAGES, ctx),
    ]);
    return {
      name: "Message exchange",
      passed: responses.length === EXCHANGE_MESSAGES.length,
      detail: `${responses.length}/${EXCHANGE_MESSAGES.length} responses`,
    };
  } finally {
    await session.disconnect();
  }
};

const checkJson: Check = async (ctx) => {
  const session = await openSession(ctx);
  try {
    await Promise.all([
      session.expectNext(isType("json_test_response"), ctx.timeoutMs),
      session.send(COMPLEX_MESSAGE),
    ]);
    return { name: "JSON handling", passed: true, detail: "json_test_response received" };
  } finally {
    await session.disconnect();
  }
};

const CHECKS: ReadonlyArray<[string, Check]> = [
  ["Connection", checkConnection],
  ["Message exchange", checkExchange],
  ["JSON handling", checkJson],
];

/** Run every check in order; a failing check does not stop the rest. */
export async function runCheck(
  ctx: CommandContext,
  print: (line: string) => void = console.log,
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];

  for (const [name, check] of CHECKS) {
    let result: CheckResult;
    try {
      result = await check(ctx);
    } catch (err) {
      result = { name, passed: false, detail: toError(err).message };
    }
    results.push(result);
    print(`${`${name} `.padEnd(20, ".")} ${result.passed ? "✓" : "✗"} ${result.detail}`);
  }

  const passed = results.filter((r) => r.passed).length;
  print(`\n${passed}/${results.length} checks passed.`);
  return results;
}
