import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

// In-memory stand-in for a Redis server shared by every mocked client
const redisState = vi.hoisted(() => {
  type Listener = (message: string, channel: string) => void;
  const sortedSets = new Map<string, Map<string, number>>();
  const subscriptions = new Map<string, Set<Listener>>();
  const failure = { connect: false };

  const bound = (value: number | string): number =>
    value === "-inf" ? Number.NEGATIVE_INFINITY : value === "+inf" ? Number.POSITIVE_INFINITY : Number(value);

  function makeClient() {
    const client = {
      on: vi.fn(),
      connect: vi.fn(async () => {
        if (failure.connect) {
          throw new Error("Redis connection failed");
        }
      }),
      disconnect: vi.fn(async () => {}),
      quit: vi.fn(async () => {}),
      duplicate: vi.fn((): object => makeClient()),
      publish: vi.fn(async (channel: string, message: string) => {
        const listeners = subscriptions.get(channel) ?? new Set<Listener>();
        for (const listener of listeners) {
          listener(message, channel);
        }
        return listeners.size;
      }),
      subscribe: vi.fn(async (channel: string, listener: Listener) => {
        const listeners = subscriptions.get(channel) ?? new Set<Listener>();
        listeners.add(listener);
        subscriptions.set(channel, listeners);
      }),
      unsubscribe: vi.fn(async (channel: string) => {
        subscriptions.delete(channel);
      }),
      zAdd: vi.fn(async (key: string, member: { score: number; value: string }) => {
        const set = sortedSets.get(key) ?? new Map<string, number>();
        set.set(member.value, member.score);
        sortedSets.set(key, set);
        return 1;
      }),
      zRem: vi.fn(async (key: string, member: string) => (sortedSets.get(key)?.delete(member) ? 1 : 0)),
      zRangeByScore: vi.fn(async (key: string, min: number | string, max: number | string) =>
        [...(sortedSets.get(key) ?? new Map<string, number>()).entries()]
          .filter(([, score]) => score >= bound(min) && score <= bound(max))
          .sort((a, b) => a[1] - b[1])
          .map(([member]) => member),
      ),
      zRemRangeByScore: vi.fn(async (key: string, min: number | string, max: number | string) => {
        const set = sortedSets.get(key);
        let removed = 0;
        for (const [member, score] of set ?? []) {
          if (score >= bound(min) && score <= bound(max)) {
            set?.delete(member);
            removed += 1;
          }
        }
        return removed;
      }),
    };
    void clients.push(client);
    return client;
  }

  const clients: Array<ReturnType<typeof makeClient>> = [];
  const createClient = vi.fn((_options: { url: string }) => makeClient());

  return {
    sortedSets,
    subscriptions,
    failure,
    clients,
    createClient,
    reset() {
      sortedSets.clear();
      subscriptions.clear();
      failure.connect = false;
      clients.length = 0;
      createClient.mockClear();
    },
  };
});

vi.mock("redis", () => ({
  createClient: redisState.createClient,
}));

import { ChannelClosedError, createLogger } from "@peerchat/session";

import { RedisPubSubChannel, type RedisPubSubChannelConfig } from "./RedisPubSubChannel.js";

const logger = createLogger({ level: "silent" });

function channelFor(peerId: string, overrides: Partial<RedisPubSubChannelConfig> = {}) {
  return new RedisPubSubChannel({
    redisUrl: "redis://localhost:6379/0",
    room: "lobby",
    peerId,
    logger,
    ...overrides,
  });
}

const text = (data: Uint8Array) => new TextDecoder().decode(data);

describe("RedisPubSubChannel", () => {
  const open: RedisPubSubChannel[] = [];

  beforeEach(() => {
    redisState.reset();
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
  });

  afterEach(async () => {
    for (const channel of open.splice(0)) {
      await channel.close();
    }
    vi.useRealTimers();
  });

  async function connected(peerId: string, overrides: Partial<RedisPubSubChannelConfig> = {}) {
    const channel = channelFor(peerId, overrides);
    open.push(channel);
    await channel.connect();
    return channel;
  }

  it("connects a publisher and a duplicated subscriber", async () => {
    await connected("alice@1111");

    expect(redisState.createClient).toHaveBeenCalledWith({ url: "redis://localhost:6379/0" });
    expect(redisState.clients).toHaveLength(2);
    expect(redisState.clients[1]?.subscribe).toHaveBeenCalledWith("peerchat:lobby", expect.any(Function));
    expect(redisState.sortedSets.get("peerchat:lobby:peers")?.get("alice@1111")).toBe(
      Date.parse("2024-01-01T00:00:00.000Z"),
    );
  });

  it("delivers published data to every subscriber, the publisher included", async () => {
    const alice = await connected("alice@1111");
    const bob = await connected("bob@2222");
    const signal = new AbortController().signal;

    await alice.publish(new TextEncoder().encode('{"nick":"alice"}'));

    expect(text(await alice.next(signal))).toBe('{"nick":"alice"}');
    expect(text(await bob.next(signal))).toBe('{"nick":"alice"}');
  });

  it("lists live peers other than itself", async () => {
    const alice = await connected("alice@1111");
    await connected("bob@2222");

    await expect(alice.listPeers()).resolves.toEqual(["bob@2222"]);
  });

  it("drops peers whose heartbeat is older than the ttl", async () => {
    const alice = await connected("alice@1111", { heartbeatMs: 1_000, peerTtlMs: 3_000 });
    redisState.sortedSets.get("peerchat:lobby:peers")?.set("ghost@0000", Date.now() - 10_000);

    await expect(alice.listPeers()).resolves.toEqual([]);
    expect(redisState.sortedSets.get("peerchat:lobby:peers")?.has("ghost@0000")).toBe(false);
  });

  it("refreshes its heartbeat on an interval", async () => {
    await connected("alice@1111", { heartbeatMs: 1_000 });

    await vi.advanceTimersByTimeAsync(2_500);

    expect(redisState.sortedSets.get("peerchat:lobby:peers")?.get("alice@1111")).toBe(
      Date.parse("2024-01-01T00:00:02.000Z"),
    );
  });

  it("leaves the room and rejects pending reads on close", async () => {
    const alice = channelFor("alice@1111");
    await alice.connect();
    const pending = alice.next(new AbortController().signal);

    await alice.close();

    await expect(pending).rejects.toBeInstanceOf(ChannelClosedError);
    expect(redisState.sortedSets.get("peerchat:lobby:peers")?.has("alice@1111")).toBe(false);
    expect(redisState.clients[0]?.quit).toHaveBeenCalledTimes(1);
    expect(redisState.clients[1]?.unsubscribe).toHaveBeenCalledWith("peerchat:lobby");
    await expect(alice.publish(new Uint8Array())).rejects.toBeInstanceOf(ChannelClosedError);
    await expect(alice.connect()).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it("refuses to publish before connecting", async () => {
    const alice = channelFor("alice@1111");
    await expect(alice.publish(new Uint8Array())).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it("disconnects both clients when connecting fails", async () => {
    redisState.failure.connect = true;
    const alice = channelFor("alice@1111");

    await expect(alice.connect()).rejects.toThrow("Redis connection failed");
    expect(redisState.clients[0]?.disconnect).toHaveBeenCalledTimes(1);
    expect(redisState.clients[1]?.disconnect).toHaveBeenCalledTimes(1);
  });
});
