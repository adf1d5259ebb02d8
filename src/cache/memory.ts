import { systemClock, type Cache, type Clock } from "./types.js";

interface Entry {
  value: unknown;
  expiresAt: number;
}

/**
 * Process-lifetime cache. Expired entries are dropped lazily on read.
 */
export class MemoryCache implements Cache {
  private entries = new Map<string, Entry>();

  constructor(private clock: Clock = systemClock) {}

  get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return Promise.resolve(undefined);
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return Promise.resolve(undefined);
    }
    return Promise.resolve(entry.value);
  }

  set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: this.clock() + ttlSeconds * 1000,
    });
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.entries.delete(key);
    return Promise.resolve();
  }

  get size(): number {
    return this.entries.size;
  }
}
