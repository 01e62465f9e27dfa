import { randomUUID } from "node:crypto";

import { ChatSession, type PubSubChannel, type SessionEndReason, type Terminal } from "@peerchat/session";

import { loadConfig, type ChatConfig, type ChatConfigOverrides } from "../config.js";
import { RedisPubSubChannel } from "../channel/RedisPubSubChannel.js";
import { logger } from "../logger.js";
import { ReadlineTerminal } from "../terminal/ReadlineTerminal.js";

export type ClosableChannel = PubSubChannel & { close(): Promise<void> };
export type ClosableTerminal = Terminal & { close(): void };

export type RunDependencies = {
  openChannel(config: ChatConfig, peerId: string): Promise<ClosableChannel>;
  openTerminal(): ClosableTerminal;
  signal?: AbortSignal;
};

/** How a participant shows up in `/list`: its nick and the head of its instance id. */
export function peerLabel(nick: string, instanceId: string): string {
  return `${nick}@${instanceId.slice(0, 8)}`;
}

async function openRedisChannel(config: ChatConfig, peerId: string): Promise<ClosableChannel> {
  const channel = new RedisPubSubChannel({
    redisUrl: config.redisUrl,
    room: config.room,
    peerId,
    logger,
  });
  await channel.connect();
  return channel;
}

export const defaultDependencies: RunDependencies = {
  openChannel: openRedisChannel,
  openTerminal: () => new ReadlineTerminal({ input: process.stdin, output: process.stdout }),
};

export async function runChat(
  overrides: ChatConfigOverrides,
  dependencies: RunDependencies = defaultDependencies,
): Promise<SessionEndReason> {
  const config = loadConfig(overrides);
  logger.level = config.logLevel;

  const instanceId = randomUUID();
  const peerId = peerLabel(config.nick, instanceId);
  const channel = await dependencies.openChannel(config, peerId);
  let terminal: ClosableTerminal | undefined;
  try {
    terminal = dependencies.openTerminal();
    logger.info({ event: "cli.joined", room: config.room, peerId }, "Joined room");

    const session = new ChatSession({
      nick: config.nick,
      instanceId,
      channel,
      terminal,
      presencePollMs: config.presenceIntervalMs,
      probeTtlMs: config.probeTtlMs,
      logger,
    });
    return await session.run(dependencies.signal);
  } finally {
    terminal?.close();
    await channel.close();
  }
}
