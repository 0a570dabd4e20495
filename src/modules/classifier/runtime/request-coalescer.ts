/**
 * REQUEST COALESCER
 * =================
 * Anti-stampede: concurrent calls for the same key share one promise.
 * The key is released once that promise settles, so a failure is
 * delivered to every waiter but not remembered.
 */

export class RequestCoalescer<K, T> {
  private inflight = new Map<K, Promise<T>>();

  run(key: K, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const p = (async () => {
      try {
        return await fn();
      } finally {
        this.inflight.delete(key);
      }
    })();

    this.inflight.set(key, p);
    return p;
  }
}
