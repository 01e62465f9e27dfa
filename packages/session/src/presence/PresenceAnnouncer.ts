import { setTimeout as delay } from "node:timers/promises";

import type { PubSubChannel } from "../channel/PubSubChannel.js";
import { encodeEnvelope } from "../envelope/codec.js";
import { createEnvelope, presenceBody, type Identity } from "../envelope/Envelope.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";

export const DEFAULT_PRESENCE_POLL_MS = 250;

export type PresenceAnnouncerOptions = {
  channel: Pick<PubSubChannel, "publish" | "listPeers">;
  identity: Identity;
  pollIntervalMs?: number;
  /** Give up polling after this long; zero or less polls until cancelled. */
  timeoutMs?: number;
  clock?: () => Date;
  logger?: AppLogger;
};

/**
 * Waits until another peer is visible, then announces this participant once.
 */
export class PresenceAnnouncer {
  private readonly channel: Pick<PubSubChannel, "publish" | "listPeers">;
  private readonly identity: Identity;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;
  private readonly logger: AppLogger;
  private latched = false;

  constructor(options: PresenceAnnouncerOptions) {
    this.channel = options.channel;
    this.identity = options.identity;
    this.pollIntervalMs = Math.max(1, Math.floor(options.pollIntervalMs ?? DEFAULT_PRESENCE_POLL_MS));
    this.timeoutMs = Math.max(0, Math.floor(options.timeoutMs ?? 0));
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? appLogger).child({ component: "presence" });
  }

  get announced(): boolean {
    return this.latched;
  }

  /**
   * Polls the peer list until it is non-empty, the timeout passes or `signal`
   * fires. Resolves `true` only for the call that published.
   */
  async run(signal: AbortSignal): Promise<boolean> {
    const deadline = this.timeoutMs > 0 ? Date.now() + this.timeoutMs : Number.POSITIVE_INFINITY;
    while (!this.latched) {
      try {
        await delay(this.pollIntervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          return false;
        }
        throw error;
      }
      const visible = await this.peersVisible();
      if (signal.aborted) {
        return false;
      }
      if (visible) {
        return this.announce(signal);
      }
      if (Date.now() >= deadline) {
        this.logger.debug({ event: "presence.timeout", timeoutMs: this.timeoutMs }, "No peers seen before timeout");
        return false;
      }
    }
    return false;
  }

  /** Publishes the presence envelope unless one was already attempted or `signal` has fired. */
  async announce(signal?: AbortSignal): Promise<boolean> {
    if (this.latched || signal?.aborted) {
      return false;
    }
    this.latched = true;
    try {
      await this.channel.publish(encodeEnvelope(createEnvelope(this.identity, presenceBody(), this.clock())));
      this.logger.debug({ event: "presence.announced", nick: this.identity.nick }, "Presence announced");
      return true;
    } catch (error) {
      this.logger.warn({ err: normalizeError(error), event: "presence.publish_failed" }, "Failed to publish presence");
      return false;
    }
  }

  private async peersVisible(): Promise<boolean> {
    try {
      const peers = await this.channel.listPeers();
      return peers.length > 0;
    } catch (error) {
      this.logger.warn({ err: normalizeError(error), event: "presence.list_failed" }, "Failed to list peers");
      return false;
    }
  }
}
