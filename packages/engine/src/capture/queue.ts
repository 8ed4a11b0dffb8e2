/**
 * FIFO between the input callbacks and the control loop.
 *
 * Producers only ever `push`. The control loop takes everything pending with
 * `drain`; `clear` throws away what is queued and bumps `epoch`, which tells a
 * consumer halfway through a drained batch to abandon the rest of it.
 */
export class IngestionQueue<T> {
  private items: T[] = [];
  private generation = 0;
  private listeners = new Set<() => void>();

  push(item: T): void {
    this.items.push(item);
    for (const listener of this.listeners) listener();
  }

  /** Remove and return all pending items in arrival order. */
  drain(): T[] {
    if (this.items.length === 0) return [];
    const batch = this.items;
    this.items = [];
    return batch;
  }

  /** Discard pending items and invalidate any batch being processed. */
  clear(): number {
    const discarded = this.items.length;
    this.items = [];
    this.generation++;
    return discarded;
  }

  get epoch(): number {
    return this.generation;
  }

  get size(): number {
    return this.items.length;
  }

  /** Called after every push; returns an unsubscribe function. */
  onPush(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
