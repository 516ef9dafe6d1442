#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ConfigError, DEFAULTS, resolveEndpoint } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { isErrorCode, toError } from "./sdk/errors.js";
import type { CommandContext } from "./commands/context.js";

// --- Parse CLI args ---

const argv = await yargs(hideBin(process.argv))
  .scriptName("wire-session")
  .usage("Usage: $0 [command] [options]")
  .option("url", {
    type: "string",
    describe: "Endpoint URL (ws://host:port or wss://host:port); overrides --host/--port",
  })
  .option("host", {
    type: "string",
    describe: `Server host (default: ${DEFAULTS.host})`,
  })
  .option("port", {
    alias: "p",
    type: "number",
    describe: `Server port (default: ${DEFAULTS.port})`,
  })
  .option("secure", {
    type: "boolean",
    default: false,
    describe: "Use an encrypted (wss://) connection",
  })
  .option("timeout", {
    alias: "t",
    type: "number",
    default: DEFAULTS.timeoutMs,
    describe: "How long to wait for responses, in ms",
  })
  .option("interval", {
    type: "number",
    describe: "Delay between scripted messages, in ms",
  })
  .option("verbose", {
    alias: "v",
    type: "boolean",
    default: false,
    describe: "Verbose output",
  })
  .command(["demo", "$0"], "Send the test messages, then go interactive (default)")
  .command("test", "Send the test messages and verify one response per message")
  .command("interactive", "Type messages (JSON or plain text) to send")
  .command("ping", "Send one ping and wait for the pong")
  .command("check", "Run the connection, exchange and JSON checks")
  .command("version", "Print version information and exit")
  .version(false)
  .strict()
  .help()
  .parse();

// --- Route to subcommands ---

const command = String(argv._[0] ?? "demo");
const logger = createLogger({ verbose: argv.verbose });

function buildContext(defaultIntervalMs: number): CommandContext | undefined {
  try {
    return {
      url: resolveEndpoint({
        url: argv.url,
        host: argv.host,
        port: argv.port,
        secure: argv.secure,
      }),
      logger,
      timeoutMs: argv.timeout,
      intervalMs: argv.interval ?? defaultIntervalMs,
      handshakeTimeoutMs: DEFAULTS.handshakeTimeoutMs,
    };
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error(err.message);
    process.exitCode = 2;
    return undefined;
  }
}

process.once("SIGINT", () => {
  logger.info("Client stopped by user");
  process.exit(130);
});

try {
  if (command === "version") {
    const { runVersion } = await import("./commands/version.js");
    runVersion();
  } else if (command === "test") {
    const ctx = buildContext(DEFAULTS.testIntervalMs);
    if (ctx) {
      const { runTest } = await import("./commands/test.js");
      const report = await runTest(ctx);
      if (!report.passed) process.exitCode = 1;
    }
  } else if (command === "ping") {
    const ctx = buildContext(DEFAULTS.testIntervalMs);
    if (ctx) {
      const { runPing } = await import("./commands/ping.js");
      if (!(await runPing(ctx))) process.exitCode = 1;
    }
  } else if (command === "check") {
    const ctx = buildContext(DEFAULTS.testIntervalMs);
    if (ctx) {
      const { runCheck } = await import("./commands/check.js");
      const results = await runCheck(ctx);
      if (results.some((r) => !r.passed)) process.exitCode = 1;
    }
  } else if (command === "interactive") {
    const ctx = buildContext(DEFAULTS.demoIntervalMs);
    if (ctx) {
      const { runInteractive } = await import("./commands/interactive.js");
      await runInteractive(ctx);
    }
  } else {
    const ctx = buildContext(DEFAULTS.demoIntervalMs);
    if (ctx) {
      const { runDemo } = await import("./commands/demo.js");
      await runDemo(ctx);
    }
  }
} catch (err) {
  // Connect failures were already logged by the session observer.
  if (!isErrorCode(err, "CONNECT_FAILED")) logger.error("Client error", toError(err));
  process.exitCode = 1;
}
