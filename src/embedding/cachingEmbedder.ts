import type { Embedder, EmbeddingRole } from "./types.js";

/**
 * Bounded least-recently-used memo in front of another {@link Embedder}.
 * Concurrent requests for the same `(role, text)` share one upstream call;
 * failed calls are evicted so the next request retries upstream.
 */
export class CachingEmbedder implements Embedder {
  private readonly entries = new Map<string, Promise<number[]>>();

  constructor(
    private readonly inner: Embedder,
    private readonly capacity: number,
  ) {}

  get dimensions(): number | null {
    return this.inner.dimensions;
  }

  /** Number of cached vectors (resolved or in flight). */
  get size(): number {
    return this.entries.size;
  }

  embed(text: string, role: EmbeddingRole, signal?: AbortSignal): Promise<number[]> {
    if (this.capacity <= 0) {
      return this.inner.embed(text, role, signal);
    }

    const key = `${role}\u0000${text}`;
    const cached = this.entries.get(key);
    if (cached) {
      // Refresh recency.
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }

    const pending = this.inner.embed(text, role, signal);
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    return pending;
  }
}
