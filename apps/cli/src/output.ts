import { toError } from "@peerchat/session";

import { ConfigError } from "./config.js";

/** What the user sees on stderr when the program ends on `error`. */
export function failureLines(error: unknown): string[] {
  const err = toError(error);
  if (err instanceof ConfigError) {
    return ["Invalid configuration:", ...err.issues.map(issue => `  ${issue}`)];
  }
  const lines = [`Error: ${err.message}`];
  if (err.cause instanceof Error && err.cause.message !== err.message) {
    lines.push(`  caused by: ${err.cause.message}`);
  }
  return lines;
}

export function printFailure(error: unknown, stream: NodeJS.WritableStream = process.stderr): void {
  stream.write(`${failureLines(error).join("\n")}\n`);
}
