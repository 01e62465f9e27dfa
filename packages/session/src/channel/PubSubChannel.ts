/**
 * A broadcast topic shared by every participant of a room.
 *
 * Implementations deliver a copy of each published datum to every subscriber,
 * the publisher included.
 */
export interface PubSubChannel {
  publish(data: Uint8Array): Promise<void>;
  /** Waits for the next datum; rejects when the channel closes or `signal` fires. */
  next(signal: AbortSignal): Promise<Uint8Array>;
  /** Ids of the other peers currently subscribed. */
  listPeers(): Promise<string[]>;
}
