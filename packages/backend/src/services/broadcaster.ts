type Slot<T> = { value: T };

/**
 * One consumer's view of a {@link Broadcaster}. Values are queued per receiver; once the
 * queue is over capacity the oldest value is discarded instead of blocking the sender.
 */
export class BroadcastReceiver<T> implements AsyncIterableIterator<T> {
  private readonly buffer: Slot<T>[] = [];
  private readonly capacity: number;
  private readonly detach: (receiver: BroadcastReceiver<T>) => void;
  private pending: ((result: IteratorResult<T>) => void) | null = null;
  private dropped = 0;
  private closed = false;

  constructor(capacity: number, detach: (receiver: BroadcastReceiver<T>) => void) {
    this.capacity = capacity;
    this.detach = detach;
  }

  get size(): number {
    return this.buffer.length;
  }

  deliver(value: T): void {
    if (this.closed) {
      return;
    }

    if (this.pending) {
      const resolve = this.pending;
      this.pending = null;
      resolve({ value, done: false });
      return;
    }

    this.buffer.push({ value });
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this.dropped += 1;
    }
  }

  /** Number of values discarded since the last call. */
  takeDropped(): number {
    const dropped = this.dropped;
    this.dropped = 0;
    return dropped;
  }

  next(): Promise<IteratorResult<T>> {
    const slot = this.buffer.shift();

    if (slot) {
      return Promise.resolve({ value: slot.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  return(): Promise<IteratorResult<T>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.buffer.length = 0;
    this.detach(this);

    if (this.pending) {
      const resolve = this.pending;
      this.pending = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}

export class Broadcaster<T> {
  private readonly receivers = new Set<BroadcastReceiver<T>>();
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Broadcast capacity must be a positive integer, received ${capacity}`);
    }

    this.capacity = capacity;
  }

  get receiverCount(): number {
    return this.receivers.size;
  }

  subscribe(): BroadcastReceiver<T> {
    const receiver = new BroadcastReceiver<T>(this.capacity, (closed) => {
      this.receivers.delete(closed);
    });
    this.receivers.add(receiver);
    return receiver;
  }

  /** Hands the value to every live receiver and returns how many there were. */
  send(value: T): number {
    for (const receiver of this.receivers) {
      receiver.deliver(value);
    }

    return this.receivers.size;
  }

  close(): void {
    for (const receiver of [...this.receivers]) {
      receiver.close();
    }
  }
}
