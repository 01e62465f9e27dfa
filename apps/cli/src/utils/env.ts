import { readFileSync } from "node:fs";

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, "utf-8").trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `name` from the environment, preferring the file named by `<name>_FILE`.
 */
export function resolveEnv(name: string, fallback?: string): string | undefined {
  const filePath = process.env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = process.env[name];
  if (direct !== undefined && direct.trim() !== "") {
    return direct.trim();
  }
  return fallback;
}

/** First of `names` that resolves, in order. */
export function resolveFirstEnv(names: readonly string[], fallback?: string): string | undefined {
  for (const name of names) {
    const value = resolveEnv(name);
    if (value !== undefined) {
      return value;
    }
  }
  return fallback;
}
