import { randomUUID } from "node:crypto";

import type { PubSubChannel } from "../channel/PubSubChannel.js";
import type { Identity } from "../envelope/Envelope.js";
import { SessionCancelledError } from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import { PresenceAnnouncer } from "../presence/PresenceAnnouncer.js";
import { ProbeTracker } from "../probes/ProbeTracker.js";
import { ChatRenderer } from "../terminal/ChatRenderer.js";
import type { Terminal } from "../terminal/Terminal.js";
import { toError } from "../utils/errorUtils.js";
import { runReceiver } from "./ReceiverLoop.js";
import { runSender } from "./SenderLoop.js";
import type { SessionContext } from "./SessionContext.js";

export type SessionState = "idle" | "announcing" | "active" | "closing" | "terminated";

export type SessionEndReason = "quit" | "cancelled";

export type ChatSessionOptions = {
  nick: string;
  /** Generated when omitted. */
  instanceId?: string;
  channel: PubSubChannel;
  terminal: Terminal;
  renderer?: ChatRenderer;
  presencePollMs?: number;
  presenceTimeoutMs?: number;
  probeTtlMs?: number;
  createProbeId?: () => string;
  clock?: () => Date;
  logger?: AppLogger;
};

/**
 * One chat participant: a receiver loop, a sender loop and a presence
 * announcer sharing a single cancellation signal.
 */
export class ChatSession {
  readonly identity: Identity;
  readonly probes: ProbeTracker;
  private readonly channel: PubSubChannel;
  private readonly terminal: Terminal;
  private readonly renderer: ChatRenderer;
  private readonly announcer: PresenceAnnouncer;
  private readonly clock: () => Date;
  private readonly logger: AppLogger;
  private readonly createProbeId?: () => string;
  private currentState: SessionState = "idle";

  constructor(options: ChatSessionOptions) {
    this.identity = { nick: options.nick, instanceId: options.instanceId ?? randomUUID() };
    this.channel = options.channel;
    this.terminal = options.terminal;
    this.renderer = options.renderer ?? new ChatRenderer(options.terminal);
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? appLogger).child({ nick: options.nick, instanceId: this.identity.instanceId });
    this.probes = new ProbeTracker({ ttlMs: options.probeTtlMs });
    this.createProbeId = options.createProbeId;
    this.announcer = new PresenceAnnouncer({
      channel: options.channel,
      identity: this.identity,
      pollIntervalMs: options.presencePollMs,
      timeoutMs: options.presenceTimeoutMs,
      clock: this.clock,
      logger: this.logger,
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Runs until `/quit`, the external `signal`, or the first fatal error, and
   * settles only after all three tasks have exited.
   */
  async run(signal?: AbortSignal): Promise<SessionEndReason> {
    if (this.currentState !== "idle") {
      throw new Error("A chat session can only be run once");
    }

    const controller = new AbortController();
    const outcome: { reason: SessionEndReason; fatal?: Error } = { reason: "cancelled" };

    const stop = (): void => {
      if (controller.signal.aborted) {
        return;
      }
      this.transition("closing");
      controller.abort(new SessionCancelledError());
    };
    // Failures after cancellation are fallout from it, not causes.
    const fail = (error: unknown): void => {
      if (!controller.signal.aborted) {
        outcome.fatal = toError(error);
        this.logger.error({ err: normalizeError(error), event: "session.failed" }, "Chat session failed");
      }
      stop();
    };

    const onExternalAbort = (): void => stop();
    signal?.addEventListener("abort", onExternalAbort, { once: true });

    const ctx: SessionContext = {
      identity: this.identity,
      channel: this.channel,
      terminal: this.terminal,
      renderer: this.renderer,
      probes: this.probes,
      clock: this.clock,
      logger: this.logger,
    };

    this.transition("announcing");
    this.renderer.joined(this.identity.nick);
    if (signal?.aborted) {
      stop();
    }

    const tasks = [
      this.announcer.run(controller.signal).then(
        () => {
          if (this.currentState === "announcing") {
            this.transition("active");
          }
        },
        fail,
      ),
      runReceiver(ctx, controller.signal).catch(fail),
      runSender(ctx, controller.signal, {
        onQuit: () => {
          outcome.reason = "quit";
          stop();
        },
        createProbeId: this.createProbeId,
      }).catch(fail),
    ];

    try {
      await Promise.all(tasks);
    } finally {
      signal?.removeEventListener("abort", onExternalAbort);
      this.transition("terminated");
    }

    if (outcome.fatal) {
      throw outcome.fatal;
    }
    return outcome.reason;
  }

  private transition(next: SessionState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    this.logger.debug({ event: "session.state", from: previous, to: next }, "Session state changed");
  }
}
