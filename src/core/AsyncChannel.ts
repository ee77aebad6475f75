// =============================================================================
// AsyncChannel<T>: bounded push-to-pull bridge implementing AsyncIterable
// =============================================================================

/** Consumer side of a channel, as handed to subscribers and client callers. */
export interface ReadableChannel<T> extends AsyncIterable<T> {
  receive(): Promise<IteratorResult<T, undefined>>;
  readonly isClosed: boolean;
}

interface PendingSend<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

/**
 * A FIFO channel with a fixed buffer capacity. Closing stops further sends but
 * values already buffered can still be received.
 */
export class AsyncChannel<T> implements ReadableChannel<T> {
  private buffer: { value: T }[] = [];
  private receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private senders: PendingSend<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity >= 1)) throw new RangeError(`Channel capacity must be at least 1, got ${capacity}`);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Non-blocking send. False when the channel is closed or its buffer is full. */
  trySend(value: T): boolean {
    if (this.closed) return false;
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return true;
    }
    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push({ value });
    return true;
  }

  /**
   * Waits for buffer space. Resolves false if the channel closes or `signal`
   * aborts before the value is accepted.
   */
  send(value: T, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    if (this.trySend(value)) return Promise.resolve(true);
    if (this.closed) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const pending: PendingSend<T> = {
        value,
        resolve: (accepted) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(accepted);
        },
      };
      const onAbort = () => {
        this.senders = this.senders.filter((s) => s !== pending);
        pending.resolve(false);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const head = this.buffer.shift();
    if (head) {
      this.admitPendingSender();
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers) {
      receiver({ value: undefined, done: true });
    }
    this.receivers = [];
    for (const sender of this.senders) {
      sender.resolve(false);
    }
    this.senders = [];
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }

  private admitPendingSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    this.buffer.push({ value: sender.value });
    sender.resolve(true);
  }
}
