import { createClient } from "redis";

import {
  AsyncQueue,
  ChannelClosedError,
  appLogger,
  normalizeError,
  type AppLogger,
  type PubSubChannel,
} from "@peerchat/session";

const DEFAULT_KEY_PREFIX = "peerchat";
const DEFAULT_HEARTBEAT_MS = 5_000;
const DEFAULT_PEER_TTL_MS = 15_000;

type RedisClient = ReturnType<typeof createClient>;

export type RedisPubSubChannelConfig = {
  redisUrl: string;
  room: string;
  /** How this participant appears in other peers' `/list`. */
  peerId: string;
  keyPrefix?: string;
  heartbeatMs?: number;
  peerTtlMs?: number;
  logger?: AppLogger;
};

/**
 * Redis-backed room.
 *
 * Redis Key Structure:
 * - Topic: `{prefix}:{room}` (PUBLISH / SUBSCRIBE)
 * - Peers: `{prefix}:{room}:peers` sorted set, member = peer id, score = last heartbeat
 */
export class RedisPubSubChannel implements PubSubChannel {
  readonly peerId: string;
  private readonly redisUrl: string;
  private readonly topic: string;
  private readonly peersKey: string;
  private readonly heartbeatMs: number;
  private readonly peerTtlMs: number;
  private readonly logger: AppLogger;
  private readonly inbox = new AsyncQueue<Uint8Array>();
  private publisher: RedisClient | null = null;
  private subscriber: RedisClient | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(config: RedisPubSubChannelConfig) {
    const prefix = config.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.peerId = config.peerId;
    this.redisUrl = config.redisUrl;
    this.topic = `${prefix}:${config.room}`;
    this.peersKey = `${prefix}:${config.room}:peers`;
    this.heartbeatMs = config.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.peerTtlMs = config.peerTtlMs ?? DEFAULT_PEER_TTL_MS;
    this.logger = (config.logger ?? appLogger).child({ component: "redis-channel", topic: this.topic });
  }

  async connect(): Promise<void> {
    if (this.closed) {
      throw new ChannelClosedError("Redis channel already closed");
    }
    if (this.publisher) {
      return;
    }
    const publisher = createClient({ url: this.redisUrl });
    publisher.on("error", (error: unknown) => {
      this.logger.warn({ err: normalizeError(error), event: "channel.redis.error" }, "Redis publisher connection error");
    });
    const subscriber = publisher.duplicate();
    subscriber.on("error", (error: unknown) => {
      this.logger.warn({ err: normalizeError(error), event: "channel.redis.error" }, "Redis subscriber connection error");
    });

    try {
      await Promise.all([publisher.connect(), subscriber.connect()]);
      await subscriber.subscribe(this.topic, (message: string) => {
        this.inbox.push(Buffer.from(message, "utf8"));
      });
    } catch (error) {
      await Promise.all([
        publisher.disconnect().catch(() => undefined),
        subscriber.disconnect().catch(() => undefined),
      ]);
      throw error;
    }

    this.publisher = publisher;
    this.subscriber = subscriber;
    await this.touch();
    this.heartbeat = setInterval(() => {
      this.touch().catch((error: unknown) => {
        this.logger.warn({ err: normalizeError(error), event: "channel.redis.heartbeat_failed" }, "Failed to refresh peer heartbeat");
      });
    }, this.heartbeatMs);
    this.heartbeat.unref();
    this.logger.info({ event: "channel.redis.connected", peerId: this.peerId }, "Redis channel connected");
  }

  async publish(data: Uint8Array): Promise<void> {
    const publisher = this.requirePublisher();
    await publisher.publish(this.topic, Buffer.from(data).toString("utf8"));
  }

  next(signal: AbortSignal): Promise<Uint8Array> {
    return this.inbox.next(signal);
  }

  async listPeers(): Promise<string[]> {
    const publisher = this.requirePublisher();
    const cutoff = Date.now() - this.peerTtlMs;
    await publisher.zRemRangeByScore(this.peersKey, "-inf", cutoff);
    const members = await publisher.zRangeByScore(this.peersKey, cutoff, "+inf");
    return members.filter(member => member !== this.peerId);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    this.inbox.close(new ChannelClosedError());

    const publisher = this.publisher;
    const subscriber = this.subscriber;
    this.publisher = null;
    this.subscriber = null;

    if (subscriber) {
      await subscriber.unsubscribe(this.topic).catch((error: unknown) => {
        this.logger.warn({ err: normalizeError(error), event: "channel.redis.unsubscribe_failed" }, "Failed to unsubscribe");
      });
      await subscriber.quit().catch((error: unknown) => {
        this.logger.warn({ err: normalizeError(error), event: "channel.redis.close_failed" }, "Failed to close subscriber");
      });
    }
    if (publisher) {
      await publisher.zRem(this.peersKey, this.peerId).catch((error: unknown) => {
        this.logger.warn({ err: normalizeError(error), event: "channel.redis.leave_failed" }, "Failed to remove peer entry");
      });
      await publisher.quit().catch((error: unknown) => {
        this.logger.warn({ err: normalizeError(error), event: "channel.redis.close_failed" }, "Failed to close publisher");
      });
    }
    this.logger.info({ event: "channel.redis.closed" }, "Redis channel closed");
  }

  private async touch(): Promise<void> {
    const publisher = this.requirePublisher();
    await publisher.zAdd(this.peersKey, { score: Date.now(), value: this.peerId });
  }

  private requirePublisher(): RedisClient {
    if (this.closed || !this.publisher) {
      throw new ChannelClosedError("Redis channel is not connected");
    }
    return this.publisher;
  }
}
