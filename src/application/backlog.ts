/**
 * What happens when an entry arrives at a full backlog.
 *
 * - `drop-oldest` evicts the head to make room (freshness over completeness).
 * - `drop-newest` rejects the incoming entry and keeps what is queued.
 */
export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

export const OVERFLOW_POLICIES = ['drop-oldest', 'drop-newest'] as const satisfies readonly OverflowPolicy[];

/** Result of a push: which entry, if any, was discarded to respect capacity. */
export type PushResult<T> =
  | { readonly evicted: false }
  | { readonly evicted: true; readonly entry: T };

/**
 * Bounded FIFO owned by exactly one sink.
 *
 * Invariant: `size <= capacity` after every operation. Entries only leave
 * from the head, either delivered (`discardHead`) or evicted on overflow.
 */
export class Backlog<T> {
  private entries: T[] = [];
  readonly capacity: number;
  readonly policy: OverflowPolicy;

  constructor(capacity: number, policy: OverflowPolicy = 'drop-oldest') {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Backlog capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.policy = policy;
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  push(entry: T): PushResult<T> {
    if (this.entries.length < this.capacity) {
      this.entries.push(entry);
      return { evicted: false };
    }

    if (this.policy === 'drop-newest') {
      return { evicted: true, entry };
    }

    const oldest = this.entries.shift();
    this.entries.push(entry);
    return oldest === undefined ? { evicted: false } : { evicted: true, entry: oldest };
  }

  /** The first `count` entries, oldest first, without removing them. */
  peek(count: number): readonly T[] {
    return this.entries.slice(0, Math.max(0, count));
  }

  /**
   * Removes leading entries while `predicate` holds.
   *
   * Used after a delivery: the entries that were in flight are still at the
   * head unless eviction already removed them.
   */
  discardHead(predicate: (entry: T) => boolean): number {
    let count = 0;
    while (count < this.entries.length) {
      const entry = this.entries[count];
      if (entry === undefined || !predicate(entry)) break;
      count++;
    }
    if (count > 0) this.entries.splice(0, count);
    return count;
  }

  /** Removes every entry matching `predicate`, wherever it sits. */
  remove(predicate: (entry: T) => boolean): number {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => !predicate(entry));
    return before - this.entries.length;
  }

  /** Snapshot of the queued entries, oldest first. */
  toArray(): readonly T[] {
    return [...this.entries];
  }

  clear(): number {
    const count = this.entries.length;
    this.entries = [];
    return count;
  }
}
