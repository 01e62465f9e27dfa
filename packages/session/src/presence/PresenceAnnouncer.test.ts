import { describe, expect, it, vi } from "vitest";

import { decodeEnvelope } from "../envelope/codec.js";
import { createLogger } from "../observability/logger.js";
import { PresenceAnnouncer } from "./PresenceAnnouncer.js";

const logger = createLogger({ level: "silent" });
const identity = { nick: "alice", instanceId: "instance-a" };

function fakeChannel(peerSequence: string[][]) {
  let call = 0;
  const published: Uint8Array[] = [];
  return {
    published,
    listPeers: vi.fn(async () => peerSequence[Math.min(call++, peerSequence.length - 1)]),
    publish: vi.fn(async (data: Uint8Array) => {
      published.push(data);
    }),
  };
}

describe("PresenceAnnouncer", () => {
  it("announces once the first peer becomes visible", async () => {
    const channel = fakeChannel([[], [], ["bob"]]);
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 1, logger });

    await expect(announcer.run(new AbortController().signal)).resolves.toBe(true);

    expect(channel.listPeers).toHaveBeenCalledTimes(3);
    expect(channel.published).toHaveLength(1);
    const envelope = decodeEnvelope(channel.published[0]);
    expect(envelope.body).toEqual({ kind: "presence" });
    expect(envelope.sender).toEqual(identity);
  });

  it("publishes at most once across repeated and concurrent triggers", async () => {
    const channel = fakeChannel([["bob"]]);
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 1, logger });
    const signal = new AbortController().signal;

    const results = await Promise.all([
      announcer.run(signal),
      announcer.run(signal),
      announcer.announce(),
      announcer.announce(),
    ]);

    expect(results.filter(Boolean)).toHaveLength(1);
    expect(channel.publish).toHaveBeenCalledTimes(1);
    await expect(announcer.run(signal)).resolves.toBe(false);
    expect(channel.publish).toHaveBeenCalledTimes(1);
  });

  it("exits without publishing when cancelled before any peer shows up", async () => {
    const channel = fakeChannel([[]]);
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 5, logger });
    const controller = new AbortController();

    const running = announcer.run(controller.signal);
    setTimeout(() => controller.abort(), 20);

    await expect(running).resolves.toBe(false);
    expect(channel.publish).not.toHaveBeenCalled();
    expect(announcer.announced).toBe(false);
  });

  it("does not publish when cancelled while a peer listing is in flight", async () => {
    const controller = new AbortController();
    const channel = fakeChannel([["bob"]]);
    channel.listPeers.mockImplementationOnce(async () => {
      controller.abort();
      return ["bob"];
    });
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 1, logger });

    await expect(announcer.run(controller.signal)).resolves.toBe(false);
    expect(channel.publish).not.toHaveBeenCalled();
    expect(announcer.announced).toBe(false);
  });

  it("skips an explicit announce once the signal has fired", async () => {
    const channel = fakeChannel([["bob"]]);
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 1, logger });

    await expect(announcer.announce(AbortSignal.abort())).resolves.toBe(false);
    expect(channel.publish).not.toHaveBeenCalled();
  });

  it("stops polling after the timeout", async () => {
    const channel = fakeChannel([[]]);
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 2, timeoutMs: 10, logger });

    await expect(announcer.run(new AbortController().signal)).resolves.toBe(false);
    expect(channel.publish).not.toHaveBeenCalled();
  });

  it("keeps polling when listing peers fails", async () => {
    const channel = fakeChannel([["bob"]]);
    channel.listPeers.mockRejectedValueOnce(new Error("redis down"));
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 1, logger });

    await expect(announcer.run(new AbortController().signal)).resolves.toBe(true);
    expect(channel.listPeers).toHaveBeenCalledTimes(2);
  });

  it("stays latched when the publish fails", async () => {
    const channel = fakeChannel([["bob"]]);
    channel.publish.mockRejectedValueOnce(new Error("closed"));
    const announcer = new PresenceAnnouncer({ channel, identity, pollIntervalMs: 1, logger });

    await expect(announcer.run(new AbortController().signal)).resolves.toBe(false);
    expect(announcer.announced).toBe(true);
    await expect(announcer.announce()).resolves.toBe(false);
    expect(channel.publish).toHaveBeenCalledTimes(1);
  });
});
