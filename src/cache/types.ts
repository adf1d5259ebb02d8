/**
 * Key-value cache with per-entry TTL.
 *
 * Values come back as `unknown`: readers validate what they get.
 */
export interface Cache {
  /** Stored value, or undefined when absent or expired */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
