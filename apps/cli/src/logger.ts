import { createLogger, type AppLogger } from "@peerchat/session";

export type CliLogger = AppLogger;

export const logger: CliLogger = createLogger({ serviceName: "peerchat-cli", bindings: { subsystem: "cli" } });
