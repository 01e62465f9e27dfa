import { encodeEnvelope } from "../envelope/codec.js";
import { chatBody, createEnvelope, probeBody } from "../envelope/Envelope.js";
import { TerminalInterruptError } from "../errors.js";
import { normalizeError } from "../observability/logger.js";
import { createProbeId } from "../probes/ProbeTracker.js";
import { parseCommand, type Command } from "./commands.js";
import type { SessionContext } from "./SessionContext.js";

export type SenderOptions = {
  /** Called by `/quit` before the loop returns. */
  onQuit: () => void;
  createProbeId?: () => string;
};

async function listPeers(ctx: SessionContext): Promise<void> {
  try {
    ctx.renderer.peers(await ctx.channel.listPeers());
  } catch (error) {
    ctx.logger.warn({ err: normalizeError(error), event: "sender.list_failed" }, "Failed to list peers");
    ctx.renderer.notice(`Could not list peers: ${normalizeError(error).message}`);
  }
}

async function ping(ctx: SessionContext, nextProbeId: () => string): Promise<void> {
  const probeId = nextProbeId();
  const now = ctx.clock();
  ctx.probes.record(probeId, now.getTime());
  try {
    await ctx.channel.publish(encodeEnvelope(createEnvelope(ctx.identity, probeBody(probeId), now)));
  } catch (error) {
    ctx.probes.forget(probeId);
    ctx.logger.warn({ err: normalizeError(error), probeId, event: "sender.ping_failed" }, "Failed to publish probe");
    ctx.renderer.notice(`Ping failed: ${normalizeError(error).message}`);
  }
}

/** Returns `true` when the session should end. */
async function runCommand(ctx: SessionContext, command: Command, options: SenderOptions): Promise<boolean> {
  switch (command.name) {
    case "list":
      await listPeers(ctx);
      return false;
    case "ping":
      await ping(ctx, options.createProbeId ?? createProbeId);
      return false;
    case "help":
      ctx.renderer.help();
      return false;
    case "quit":
      ctx.renderer.farewell();
      options.onQuit();
      return true;
    case "unknown":
      ctx.renderer.unknownCommand(command.word);
      return false;
  }
}

/**
 * Reads terminal lines until `/quit` (resolves) or a fatal read or publish
 * error (rejects).
 */
export async function runSender(ctx: SessionContext, signal: AbortSignal, options: SenderOptions): Promise<void> {
  for (;;) {
    let line: string;
    try {
      line = await ctx.terminal.readLine(signal);
    } catch (error) {
      if (error instanceof TerminalInterruptError) {
        continue;
      }
      throw error;
    }

    const command = parseCommand(line);
    if (command) {
      ctx.logger.debug({ event: "sender.command", command: command.name }, "Running command");
      if (await runCommand(ctx, command, options)) {
        return;
      }
      continue;
    }

    if (line.trim().length === 0) {
      continue;
    }

    ctx.renderer.eraseSubmittedLine();
    const envelope = createEnvelope(ctx.identity, chatBody(line), ctx.clock());
    await ctx.channel.publish(encodeEnvelope(envelope));
  }
}
