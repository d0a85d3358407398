export interface RequestMemoOptions {
  forgetFailures?: boolean;
}

/**
 * Request-scoped memo store
 *
 * One computation per key for the lifetime of a request. Concurrent callers
 * for the same key share the in-flight promise. A rejection is kept too unless
 * `forgetFailures` is set, in which case the next caller computes again.
 */
export class RequestMemo<V> {
  private readonly entries = new Map<string, Promise<V>>();

  constructor(private readonly options: RequestMemoOptions = {}) {}

  getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    let pending: Promise<V>;
    try {
      pending = compute();
    } catch (error) {
      pending = Promise.reject(error);
    }
    this.entries.set(key, pending);

    if (this.options.forgetFailures) {
      void pending.catch(() => {
        if (this.entries.get(key) === pending) {
          this.entries.delete(key);
        }
      });
    }
    return pending;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
