/**
 * Runtime configuration for the chat client.
 *
 * Values come from command-line options first, then `PEERCHAT_*` environment
 * variables (each also readable through a `<NAME>_FILE` path), then defaults.
 */

import { z } from "zod";

import { resolveFirstEnv } from "./utils/env.js";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const intervalMs = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

export const ChatConfigSchema = z.object({
  nick: z
    .string()
    .trim()
    .min(1, "nick must not be empty")
    .max(32, "nick must be at most 32 characters")
    .regex(/^\S+$/, "nick must not contain whitespace")
    .default("anon"),
  room: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_.-]+$/, "room may only include letters, digits, '.', '_' or '-'")
    .default("global"),
  redisUrl: z
    .string()
    .url()
    .refine(value => /^rediss?:\/\//.test(value), { message: "redisUrl must use redis:// or rediss://" })
    .default("redis://localhost:6379"),
  presenceIntervalMs: intervalMs(10, 60_000).default(250),
  probeTtlMs: intervalMs(0, 3_600_000).default(60_000),
  logLevel: LogLevelSchema.default("warn"),
});
export type ChatConfig = z.infer<typeof ChatConfigSchema>;

export type ChatConfigOverrides = {
  nick?: string;
  room?: string;
  redisUrl?: string;
  presenceInterval?: string;
  probeTtl?: string;
  logLevel?: string;
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const ENV_NAMES = {
  nick: ["PEERCHAT_NICK"],
  room: ["PEERCHAT_ROOM"],
  redisUrl: ["PEERCHAT_REDIS_URL", "REDIS_URL"],
  presenceIntervalMs: ["PEERCHAT_PRESENCE_INTERVAL_MS"],
  probeTtlMs: ["PEERCHAT_PROBE_TTL_MS"],
  logLevel: ["PEERCHAT_LOG_LEVEL", "LOG_LEVEL"],
} as const satisfies Record<keyof ChatConfig, readonly string[]>;

export function loadConfig(overrides: ChatConfigOverrides = {}): ChatConfig {
  const raw = {
    nick: overrides.nick ?? resolveFirstEnv(ENV_NAMES.nick),
    room: overrides.room ?? resolveFirstEnv(ENV_NAMES.room),
    redisUrl: overrides.redisUrl ?? resolveFirstEnv(ENV_NAMES.redisUrl),
    presenceIntervalMs: overrides.presenceInterval ?? resolveFirstEnv(ENV_NAMES.presenceIntervalMs),
    probeTtlMs: overrides.probeTtl ?? resolveFirstEnv(ENV_NAMES.probeTtlMs),
    logLevel: (overrides.logLevel ?? resolveFirstEnv(ENV_NAMES.logLevel))?.toLowerCase(),
  };
  const parsed = ChatConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join("\n  ")}`, issues);
  }
  return parsed.data;
}
