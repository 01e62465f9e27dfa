import { ChannelClosedError } from "../errors.js";
import { AsyncQueue } from "./AsyncQueue.js";
import type { PubSubChannel } from "./PubSubChannel.js";

/**
 * In-process broker: every channel joined through it sees what the others publish.
 */
export class MemoryPubSub {
  private readonly members = new Map<string, MemoryChannel>();

  join(peerId: string): MemoryChannel {
    if (this.members.has(peerId)) {
      throw new Error(`Peer ${peerId} already joined`);
    }
    const channel = new MemoryChannel(this, peerId);
    this.members.set(peerId, channel);
    return channel;
  }

  peers(): string[] {
    return [...this.members.keys()];
  }

  deliver(data: Uint8Array): void {
    for (const member of this.members.values()) {
      member.receive(data);
    }
  }

  remove(peerId: string): void {
    this.members.delete(peerId);
  }
}

export class MemoryChannel implements PubSubChannel {
  private readonly inbox = new AsyncQueue<Uint8Array>();

  constructor(
    private readonly broker: MemoryPubSub,
    readonly peerId: string,
  ) {}

  async publish(data: Uint8Array): Promise<void> {
    if (this.inbox.closed) {
      throw new ChannelClosedError(`Peer ${this.peerId} has left the channel`);
    }
    this.broker.deliver(Uint8Array.from(data));
  }

  next(signal: AbortSignal): Promise<Uint8Array> {
    return this.inbox.next(signal);
  }

  async listPeers(): Promise<string[]> {
    return this.broker.peers().filter(peer => peer !== this.peerId);
  }

  receive(data: Uint8Array): void {
    this.inbox.push(data);
  }

  leave(): void {
    this.broker.remove(this.peerId);
    this.inbox.close(new ChannelClosedError());
  }
}
