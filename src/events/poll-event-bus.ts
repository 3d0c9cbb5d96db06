import { PollEvent } from './poll-event';

export const DEFAULT_MAX_QUEUE_SIZE = 100;

export interface PollEventBusOptions {
  maxQueueSize?: number;
}

/**
 * Handle returned by {@link PollEventBus.subscribe}. Iterating it yields every
 * event published after the subscription was registered, waiting when the
 * queue is empty. Once closed it stays closed: pending and later reads resolve
 * as done.
 */
export class PollEventSubscription implements AsyncIterableIterator<PollEvent> {
  private readonly queue: PollEvent[] = [];
  // Pending next() calls, oldest first
  private readonly waiting: ((result: IteratorResult<PollEvent>) => void)[] = [];
  private closed = false;

  constructor(
    private readonly capacity: number,
    private readonly onClose: (subscription: PollEventSubscription) => void,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Non-blocking enqueue. A full queue drops its oldest event first.
   */
  offer(event: PollEvent): void {
    if (this.closed) {
      return;
    }

    const reader = this.waiting.shift();
    if (reader) {
      reader({ value: event, done: false });
      return;
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift();
    }
    this.queue.push(event);
  }

  next(): Promise<IteratorResult<PollEvent>> {
    const event = this.queue.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  return(): Promise<IteratorResult<PollEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.queue.length = 0;

    for (const reader of this.waiting.splice(0)) {
      reader({ value: undefined, done: true });
    }

    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<PollEvent> {
    return this;
  }
}

/**
 * In-process fan-out of poll events. Each subscriber owns a bounded queue;
 * publishing never waits on a subscriber and never fails because one is slow
 * or gone.
 */
export class PollEventBus {
  private readonly subscribers = new Set<PollEventSubscription>();
  private readonly maxQueueSize: number;

  constructor(options: PollEventBusOptions = {}) {
    const size = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`maxQueueSize must be a positive integer, got ${size}`);
    }
    this.maxQueueSize = size;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(): PollEventSubscription {
    const subscription = new PollEventSubscription(
      this.maxQueueSize,
      (closed) => this.subscribers.delete(closed),
    );
    this.subscribers.add(subscription);
    return subscription;
  }

  publish(event: PollEvent): void {
    for (const subscription of Array.from(this.subscribers)) {
      subscription.offer(event);
    }
  }
}
