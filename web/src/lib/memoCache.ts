/**
 * Session-lifetime promise cache
 *
 * Stores the promise for each key, so concurrent callers with the same key
 * share a single in-flight request. A rejected promise is dropped so the next
 * call retries. Entries never expire; `refresh` replaces one with newer data.
 */
export class MemoCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  get(key: string, fetcher: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    let pending: Promise<T>;
    try {
      pending = fetcher();
    } catch (err) {
      return Promise.reject(err);
    }

    this.entries.set(key, pending);
    pending.catch(() => {
      // A later call may already have replaced the entry
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });

    return pending;
  }

  /**
   * Re-runs the fetcher for a key that may already be cached. Readers keep
   * getting the cached value until the new request resolves; a failed refresh
   * leaves the cached value in place. Without an entry this is `get`.
   */
  refresh(key: string, fetcher: () => Promise<T>): Promise<T> {
    if (!this.entries.has(key)) {
      return this.get(key, fetcher);
    }

    let pending: Promise<T>;
    try {
      pending = fetcher();
    } catch (err) {
      return Promise.reject(err);
    }

    return pending.then((value) => {
      this.entries.set(key, Promise.resolve(value));
      return value;
    });
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export type CacheKeyPart = string | number | boolean | readonly number[] | undefined;

/**
 * Builds a key that does not depend on property order. Undefined parts are
 * left out, so `{ a: 1 }` and `{ a: 1, b: undefined }` collide.
 */
export function cacheKey(parts: Record<string, CacheKeyPart>): string {
  const entries = Object.keys(parts)
    .sort()
    .filter((name) => parts[name] !== undefined)
    .map((name) => [name, parts[name]]);
  return JSON.stringify(entries);
}
