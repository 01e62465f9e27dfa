import { Command } from "commander";

import { SessionCancelledError } from "@peerchat/session";

import { defaultDependencies, runChat, type RunDependencies } from "./commands/run.js";
import type { ChatConfigOverrides } from "./config.js";

type RunChat = (overrides: ChatConfigOverrides, dependencies: RunDependencies) => Promise<unknown>;

export function buildProgram(run: RunChat = runChat): Command {
  const program = new Command();

  program.name("peerchat").description("Terminal chat over a shared pub/sub room").version("0.1.0");

  program
    .command("run")
    .description("Join a room and start chatting")
    .option("-n, --nick <name>", "display name (PEERCHAT_NICK)")
    .option("-r, --room <name>", "room to join (PEERCHAT_ROOM)")
    .option("-u, --redis-url <url>", "Redis server URL (PEERCHAT_REDIS_URL)")
    .option("--presence-interval <ms>", "peer poll interval before announcing presence")
    .option("--probe-ttl <ms>", "forget unanswered pings after this long, 0 keeps them")
    .option("-l, --log-level <level>", "log level for stderr output")
    .action(async (options: ChatConfigOverrides) => {
      const controller = new AbortController();
      const onTerminate = () => controller.abort(new SessionCancelledError("Received SIGTERM"));
      process.once("SIGTERM", onTerminate);
      try {
        await run(options, { ...defaultDependencies, signal: controller.signal });
      } finally {
        process.off("SIGTERM", onTerminate);
      }
    });

  return program;
}
