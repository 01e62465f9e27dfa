import { abortReason } from "../utils/errorUtils.js";

type PendingTake<T> = {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Unbounded FIFO with cancelable waits. Items pushed while nobody waits are
 * buffered; once closed, buffered items still drain before `next` rejects.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly pending: PendingTake<T>[] = [];
  private closedWith: Error | null = null;

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }

  push(item: T): boolean {
    if (this.closedWith) {
      return false;
    }
    const waiter = this.pending.shift();
    if (waiter) {
      this.detach(waiter);
      waiter.resolve(item);
      return true;
    }
    this.items.push(item);
    return true;
  }

  next(signal?: AbortSignal): Promise<T> {
    if (this.items.length > 0) {
      const [head] = this.items.splice(0, 1);
      return Promise.resolve(head);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    return new Promise<T>((resolve, reject) => {
      const waiter: PendingTake<T> = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.pending.indexOf(waiter);
          if (index >= 0) {
            this.pending.splice(index, 1);
          }
          reject(abortReason(signal));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.pending.push(waiter);
    });
  }

  close(reason: Error): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = reason;
    for (const waiter of this.pending.splice(0)) {
      this.detach(waiter);
      waiter.reject(reason);
    }
  }

  private detach(waiter: PendingTake<T>): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }
}
