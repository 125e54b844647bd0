/**
 * Keyed async mutual exclusion
 *
 * Each key owns a FIFO queue of promises. Multi-key acquisition takes keys in
 * sorted order so two callers needing overlapping sets cannot deadlock.
 * In `global` mode every key collapses to one, which serializes everything.
 *
 * `snapshot()` is the lock-wide read: it closes a gate to new acquisitions,
 * waits for every current holder, and runs while nothing can move. Holders
 * already inside a critical section still take their nested keys.
 */

export type LockMode = 'per-product' | 'global';

const GLOBAL_KEY = '*';

export function productKey(productId: string): string {
  return `product:${productId}`;
}

export function orderKey(orderId: string): string {
  return `order:${orderId}`;
}

/**
 * Proof of holding a set of keys. Pass it down to nested operations so they
 * reuse the held keys instead of queueing behind themselves.
 */
export class LockHandle {
  private released = false;

  constructor(
    private readonly keys: ReadonlySet<string>,
    private readonly releaseAll: () => void
  ) {}

  covers(keys: Iterable<string>): boolean {
    if (this.released) return false;
    if (this.keys.has(GLOBAL_KEY)) return true;
    for (const key of keys) {
      if (!this.keys.has(key)) return false;
    }
    return true;
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.releaseAll();
  }
}

export class KeyedLock {
  private readonly tails: Map<string, Promise<void>> = new Map();
  private gate: Promise<void> = Promise.resolve();

  constructor(readonly mode: LockMode = 'per-product') {}

  /**
   * Wait until every key is free, then hold them all. A caller passing the
   * handle it already holds is not stopped by a pending snapshot.
   */
  async acquire(keys: Iterable<string>, held?: LockHandle): Promise<LockHandle> {
    if (!held || held.isReleased) {
      // Re-checked after each wait: a snapshot may close the gate meanwhile
      let gate: Promise<void>;
      do {
        gate = this.gate;
        await gate;
      } while (gate !== this.gate);
    }

    const ordered = this.mode === 'global' ? [GLOBAL_KEY] : [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    for (const key of ordered) {
      releases.push(await this.acquireOne(key));
    }

    return new LockHandle(new Set(ordered), () => {
      for (const release of releases.reverse()) {
        release();
      }
    });
  }

  /**
   * Run `fn` while holding `keys`. When `held` already covers them the
   * function runs inside the caller's critical section.
   */
  async runExclusive<T>(
    keys: Iterable<string>,
    fn: (handle: LockHandle) => Promise<T>,
    held?: LockHandle
  ): Promise<T> {
    const wanted = [...keys];
    if (held?.covers(wanted)) {
      return fn(held);
    }

    const handle = await this.acquire(wanted, held);
    try {
      return await fn(handle);
    } finally {
      handle.release();
    }
  }

  /**
   * Run `fn` once every holder has released, with new acquisitions queued
   * behind it. `fn` must not acquire keys itself.
   */
  async snapshot<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.gate;
    let open: () => void = () => undefined;
    const closed = new Promise<void>((resolve) => {
      open = resolve;
    });
    this.gate = previous.then(() => closed);

    try {
      await previous;
      await Promise.all(this.tails.values());
      return await fn();
    } finally {
      open();
    }
  }

  /** Number of keys with a holder or waiters */
  get size(): number {
    return this.tails.size;
  }

  private async acquireOne(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
