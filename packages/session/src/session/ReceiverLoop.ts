import { classify } from "../envelope/classifier.js";
import { decodeEnvelope, encodeEnvelope } from "../envelope/codec.js";
import { createEnvelope, probeReplyBody, type Envelope } from "../envelope/Envelope.js";
import { normalizeError } from "../observability/logger.js";
import type { SessionContext } from "./SessionContext.js";

export type ReceiveOutcome =
  | "dropped"
  | "swallowed"
  | "replied"
  | "latency"
  | "joined"
  | "chat";

/**
 * Handles one datum from the channel. Never throws: every failure here is
 * local to the datum.
 */
export async function handleIncoming(ctx: SessionContext, data: Uint8Array): Promise<ReceiveOutcome> {
  let envelope: Envelope;
  try {
    envelope = decodeEnvelope(data);
  } catch (error) {
    ctx.logger.debug({ err: normalizeError(error), event: "receiver.decode_failed" }, "Dropping malformed envelope");
    return "dropped";
  }

  const { body, isLocal } = classify(envelope, ctx.identity);
  const sender = envelope.sender.nick;

  switch (body.kind) {
    case "probe": {
      if (isLocal) {
        return "swallowed";
      }
      const reply = createEnvelope(ctx.identity, probeReplyBody(body.probeId), ctx.clock());
      try {
        await ctx.channel.publish(encodeEnvelope(reply));
      } catch (error) {
        ctx.logger.warn(
          { err: normalizeError(error), probeId: body.probeId, event: "receiver.reply_failed" },
          "Failed to answer latency probe",
        );
        return "swallowed";
      }
      return "replied";
    }
    case "probe-reply": {
      if (isLocal) {
        return "swallowed";
      }
      const elapsedMs = ctx.probes.resolve(body.probeId, ctx.clock().getTime());
      if (elapsedMs === undefined) {
        ctx.logger.debug({ probeId: body.probeId, sender, event: "receiver.reply_unmatched" }, "Ignoring unmatched probe reply");
        return "swallowed";
      }
      ctx.renderer.latency(sender, elapsedMs);
      return "latency";
    }
    case "presence": {
      if (isLocal) {
        return "swallowed";
      }
      ctx.renderer.joined(sender);
      return "joined";
    }
    case "chat": {
      ctx.renderer.chat(sender, body.text, ctx.clock());
      return "chat";
    }
  }
}

/**
 * Consumes the channel until fetching fails. The rejection carries the cause:
 * the abort reason on cancellation, the channel's error on closure.
 */
export async function runReceiver(ctx: SessionContext, signal: AbortSignal): Promise<never> {
  for (;;) {
    const data = await ctx.channel.next(signal);
    const outcome = await handleIncoming(ctx, data);
    ctx.logger.trace({ event: "receiver.handled", outcome }, "Handled incoming envelope");
  }
}
