import { randomBytes } from "node:crypto";

export type ProbeRecord = {
  id: string;
  /** Epoch milliseconds. */
  sentAt: number;
};

export type ProbeTrackerOptions = {
  /** Records older than this are swept; zero or less keeps them forever. */
  ttlMs?: number;
};

/**
 * Outstanding latency probes keyed by id.
 *
 * Both the sender (on `/ping`) and the receiver (on a reply) touch the table.
 * Every method runs to completion synchronously, so a lookup and its removal
 * can never be split by another task.
 */
export class ProbeTracker {
  private readonly records = new Map<string, ProbeRecord>();
  private readonly ttlMs: number;

  constructor(options: ProbeTrackerOptions = {}) {
    this.ttlMs = Math.max(0, Math.floor(options.ttlMs ?? 0));
  }

  get size(): number {
    return this.records.size;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  record(id: string, sentAt: number): void {
    this.sweep(sentAt);
    this.records.set(id, { id, sentAt });
  }

  /**
   * Removes the probe and returns the elapsed milliseconds, or `undefined`
   * when the id was never recorded or has already been answered.
   */
  resolve(id: string, receivedAt: number): number | undefined {
    const record = this.records.get(id);
    if (!record) {
      return undefined;
    }
    this.records.delete(id);
    return Math.max(0, receivedAt - record.sentAt);
  }

  forget(id: string): boolean {
    return this.records.delete(id);
  }

  sweep(now: number): number {
    if (this.ttlMs <= 0) {
      return 0;
    }
    let removed = 0;
    for (const [id, record] of this.records) {
      if (now - record.sentAt >= this.ttlMs) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}

export function createProbeId(): string {
  return randomBytes(8).toString("hex");
}
