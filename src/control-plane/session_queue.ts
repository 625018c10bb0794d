type QueueEntry<T> = {
  items: T[];
  // Settles once the consumer has emptied the queue.
  drained: Promise<void>;
};

export type SessionQueueOptions<T> = {
  maxDepth: number;
  handle: (key: string, item: T) => Promise<void>;
  onError: (key: string, item: T, error: unknown) => void;
};

/**
 * One FIFO and one consumer per key. Items for the same key run strictly one
 * after another in arrival order; different keys run concurrently.
 */
export class SessionQueue<T> {
  private readonly entries = new Map<string, QueueEntry<T>>();
  private readonly opts: SessionQueueOptions<T>;

  constructor(opts: SessionQueueOptions<T>) {
    this.opts = opts;
  }

  /** Returns false when the key already has `maxDepth` items waiting. */
  enqueue(key: string, item: T): boolean {
    const existing = this.entries.get(key);
    if (existing) {
      if (existing.items.length >= this.opts.maxDepth) return false;
      existing.items.push(item);
      return true;
    }

    const entry: QueueEntry<T> = { items: [item], drained: Promise.resolve() };
    this.entries.set(key, entry);
    entry.drained = this.consume(key, entry);
    return true;
  }

  /** Items waiting behind the one in progress. */
  waiting(key: string): number {
    return this.entries.get(key)?.items.length ?? 0;
  }

  /** Drop waiting items; the one in progress finishes on its own. */
  clear(key: string) {
    const entry = this.entries.get(key);
    if (entry) entry.items.length = 0;
  }

  async whenIdle(key: string): Promise<void> {
    await this.entries.get(key)?.drained;
  }

  async whenAllIdle(): Promise<void> {
    await Promise.all(Array.from(this.entries.values(), (entry) => entry.drained));
  }

  private async consume(key: string, entry: QueueEntry<T>): Promise<void> {
    // Let enqueue() finish before the first item runs.
    await Promise.resolve();
    let item = entry.items.shift();
    while (item !== undefined) {
      try {
        await this.opts.handle(key, item);
      } catch (error) {
        this.opts.onError(key, item, error);
      }
      item = entry.items.shift();
    }
    this.entries.delete(key);
  }
}
