import pino, { type DestinationStream, type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  options?: LoggerOptions;
  /** Where JSON lines go; stderr unless given. */
  destination?: DestinationStream;
};

function resolveLevel(): string {
  const envLevel = (process.env.PEERCHAT_LOG_LEVEL ?? process.env.LOG_LEVEL)?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "warn";
}

function buildLoggerOptions(overrides?: LoggerOptions): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveLevel(),
    base: { service: "peerchat" },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return overrides ? { ...base, ...overrides } : base;
}

/**
 * Builds a pino logger that writes to stderr; stdout belongs to the chat feed.
 */
export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions = buildLoggerOptions(options.options);
  if (options.level) {
    loggerOptions.level = options.level;
  }
  if (options.serviceName) {
    loggerOptions.base = { ...(loggerOptions.base ?? {}), service: options.serviceName };
  }
  const logger = pino(loggerOptions, options.destination ?? pino.destination({ dest: 2, sync: true }));
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "session" } });

function extractCode(error: unknown): string | number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const candidate = error.code;
    if (typeof candidate === "string" || typeof candidate === "number") {
      return candidate;
    }
  }
  return undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    if (error.cause !== undefined) {
      normalized.cause = error.cause instanceof Error ? normalizeError(error.cause) : error.cause;
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
