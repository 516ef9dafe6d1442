/**
 * `wire-session interactive`: send typed lines until quit.
 *
 * A line holding a JSON object is sent as-is; anything else is wrapped as
 * `{type: "text", message}`.
 */
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { decode } from "../sdk/codec.js";
import type { JsonObject } from "../sdk/codec.js";
import { toError } from "../sdk/errors.js";
import type { Session } from "../sdk/session.js";
import type { Logger } from "../lib/logger.js";
import { openSession, type CommandContext } from "./context.js";

const QUIT_WORDS = new Set(["quit", "exit", "q"]);

export interface InteractiveIO {
  input?: Readable;
  output?: Writable;
}

/** Turn one typed line into the message body to send. */
export function parseUserInput(line: string): JsonObject {
  const message = decode(line);
  return message.kind === "structured" ? message.body : { type: "text", message: line };
}

/** True for the words that end interactive mode. */
export function isQuit(line: string): boolean {
  return QUIT_WORDS.has(line.trim().toLowerCase());
}

/** Read lines and send them on `session` until quit, end of input, or close. */
export async function interact(
  session: Session,
  logger: Logger,
  io: InteractiveIO = {},
): Promise<void> {
  const rl = createInterface({
    input: io.input ?? process.stdin,
    output: io.output ?? process.stdout,
    prompt: "Enter message: ",
  });
  rl.on("SIGINT", () => rl.close());
  void session.closed.then(() => rl.close());

  logger.info("Interactive mode started. Type messages (JSON format) or 'quit' to exit:");
  rl.prompt();
  try {
    for await (const line of rl) {
      if (isQuit(line)) break;
      const text = line.trim();
      if (text) {
        try {
          await session.send(parseUserInput(text));
        } catch (err) {
          logger.error("Failed to send message", toError(err));
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

export async function runInteractive(ctx: CommandContext, io?: InteractiveIO): Promise<void> {
  const session = await openSession(ctx);
  try {
    await interact(session, ctx.logger, io);
  } finally {
    await session.disconnect();
  }
}
