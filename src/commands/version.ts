/**
 * `wire-session version`: Print the client version, then exit.
 */
import { readFileSync } from "node:fs";

export function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf-8"),
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "unknown";
}

export function runVersion(print: (line: string) => void = console.log): void {
  print(`wire-session ${readVersion()}`);
}
