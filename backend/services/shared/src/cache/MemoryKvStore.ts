// backend/services/shared/src/cache/MemoryKvStore.ts
/**
 * Purpose:
 * - In-process TTL store. Used for local runs (TOKEN_CACHE=memory) and as the
 *   stand-in for Redis in tests.
 *
 * Invariants:
 * - Expired entries are dropped on read; nothing is served past expiry.
 * - Clock is injectable (epoch ms).
 */

import type { IKvStore } from "./IKvStore";

type Entry = {
  value: string;
  expiresAt: number; // epoch ms
};

export class MemoryKvStore implements IKvStore {
  public readonly kind = "memory";
  private readonly entries = new Map<string, Entry>();
  private readonly nowMs: () => number;

  constructor(opts: { nowMs?: () => number } = {}) {
    this.nowMs = opts.nowMs ?? (() => Date.now());
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.nowMs()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSec: number): Promise<void> {
    if (!Number.isInteger(ttlSec) || ttlSec <= 0) {
      throw new Error(`MemoryKvStore: ttlSec must be a positive integer (got ${ttlSec})`);
    }
    this.entries.set(key, { value, expiresAt: this.nowMs() + ttlSec * 1000 });
  }

  /** Remaining lifetime in whole seconds (0 when missing or expired). */
  ttlOf(key: string): number {
    const entry = this.entries.get(key);
    if (!entry) return 0;
    const delta = entry.expiresAt - this.nowMs();
    return delta > 0 ? Math.ceil(delta / 1000) : 0;
  }

  size(): number {
    return this.entries.size;
  }
}
