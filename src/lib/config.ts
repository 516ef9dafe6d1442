/**
 * Endpoint and timing configuration for the command line.
 *
 * Precedence: command-line flag > environment variable > default.
 */

export const DEFAULTS = {
  scheme: "ws",
  host: "localhost",
  port: 19765,
  /** How long verification flows wait for responses. */
  timeoutMs: 3000,
  /** Spacing between demo messages. */
  demoIntervalMs: 1000,
  /** Spacing between test messages. */
  testIntervalMs: 100,
  handshakeTimeoutMs: 10_000,
} as const;

export const ENV = {
  url: "WIRE_SESSION_URL",
  host: "WIRE_SESSION_HOST",
  port: "WIRE_SESSION_PORT",
} as const;

export type Scheme = "ws" | "wss";

export interface Endpoint {
  scheme: Scheme;
  host: string;
  port: number;
}

/** Endpoint-related flags as yargs hands them over. */
export interface EndpointFlags {
  url?: string;
  host?: string;
  port?: number;
  secure?: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Format `scheme://host:port`, bracketing IPv6 hosts. */
export function buildEndpoint({ scheme, host, port }: Endpoint): string {
  const hostPart = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
  return `${scheme}://${hostPart}:${port}`;
}

/** Parse and validate a `ws://` or `wss://` URL. A missing port means 80 / 443. */
export function parseEndpoint(url: string): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Invalid endpoint URL: ${url}`);
  }

  const scheme = parsed.protocol.replace(/:$/, "");
  if (scheme !== "ws" && scheme !== "wss") {
    throw new ConfigError(`Unsupported scheme "${scheme}" (expected ws or wss)`);
  }
  if (!parsed.hostname) {
    throw new ConfigError(`Endpoint has no host: ${url}`);
  }

  const port = parsed.port ? Number(parsed.port) : scheme === "wss" ? 443 : 80;
  return { scheme, host: parsed.hostname.replace(/^\[|\]$/g, ""), port };
}

/** Parse a port from a flag or environment string. */
export function parsePort(value: string | number): number {
  const port = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
}

/** Work out the URL to dial from flags, then environment, then defaults. */
export function resolveEndpoint(
  flags: EndpointFlags,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const explicitUrl = flags.url ?? nonEmpty(env[ENV.url]);
  if (explicitUrl !== undefined) {
    return buildEndpoint(parseEndpoint(explicitUrl));
  }

  const envPort = nonEmpty(env[ENV.port]);
  const port =
    flags.port !== undefined
      ? parsePort(flags.port)
      : envPort !== undefined
        ? parsePort(envPort)
        : DEFAULTS.port;

  return buildEndpoint({
    scheme: flags.secure ? "wss" : DEFAULTS.scheme,
    host: flags.host ?? nonEmpty(env[ENV.host]) ?? DEFAULTS.host,
    port,
  });
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}
