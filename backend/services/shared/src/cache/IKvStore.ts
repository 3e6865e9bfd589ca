// backend/services/shared/src/cache/IKvStore.ts
/**
 * Minimal key-value store contract with per-entry expiry.
 * Implementations must never return an entry past its expiry.
 */
export interface IKvStore {
  /** Human-readable backend name for health/readiness output. */
  readonly kind: string;

  get(key: string): Promise<string | null>;

  /** ttlSec must be a positive integer. */
  set(key: string, value: string, ttlSec: number): Promise<void>;
}
