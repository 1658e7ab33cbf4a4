import type { FactsLoader } from "./loader.js";
import type { FactSet } from "./types.js";

/** Runtime statistics exposed for observability and tests. */
export interface FactsCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * Small LRU in front of a {@link FactsLoader}. Fact sets are immutable, so a
 * cached instance can be shared read-only by concurrent runs on the same
 * patch. Concurrent misses share one in-flight load; failed loads are evicted
 * so the next request retries.
 */
export class CachedFactsLoader implements FactsLoader {
  private readonly entries = new Map<string, Promise<FactSet>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    private readonly inner: FactsLoader,
    private readonly capacity = 8,
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`CachedFactsLoader capacity must be a positive integer (received ${capacity})`);
    }
  }

  load(patch: string, signal?: AbortSignal): Promise<FactSet> {
    const cached = this.entries.get(patch);
    if (cached) {
      this.hits += 1;
      // Refresh recency.
      this.entries.delete(patch);
      this.entries.set(patch, cached);
      return signal ? abortable(cached, signal) : cached;
    }

    this.misses += 1;
    // The shared load is not tied to one caller's signal: another run may be
    // waiting on the same promise.
    const pending = this.inner.load(patch);
    this.entries.set(patch, pending);
    pending.catch(() => {
      if (this.entries.get(patch) === pending) {
        this.entries.delete(patch);
      }
    });
    this.evictOverflow();
    return signal ? abortable(pending, signal) : pending;
  }

  /** Drops every cached patch. */
  clear(): void {
    this.entries.clear();
  }

  stats(): FactsCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private evictOverflow(): void {
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
      this.evictions += 1;
    }
  }
}

/** Lets one caller stop waiting on a shared promise without cancelling it for others. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
