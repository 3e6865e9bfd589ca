// backend/services/trends/src/security/CredentialCache.ts
/**
 * Purpose:
 * - Advisory cache of bearer tokens keyed by scope fingerprint.
 *
 * Invariants:
 * - lookup() never rejects: a broken store is a miss (logged).
 * - store() rejects with CacheError; callers treat that as a no-op write.
 * - Entries carry the provider-reported lifetime; the store enforces expiry.
 */

import { createHash } from "node:crypto";
import type { IKvStore } from "@rt/shared/cache/IKvStore";
import { getLogger } from "@rt/shared/logger/Logger";
import { CacheError } from "../errors";

/** SHA-256 hex of the scope string. */
export type ScopeFingerprint = string;

export function fingerprintScope(scope: string): ScopeFingerprint {
  return createHash("sha256").update(scope, "utf8").digest("hex");
}

export class CredentialCache {
  private readonly log = getLogger({
    service: "trends",
    component: "CredentialCache",
  });

  constructor(private readonly kv: IKvStore) {}

  get kind(): string {
    return this.kv.kind;
  }

  async lookup(fingerprint: ScopeFingerprint): Promise<string | undefined> {
    try {
      const token = await this.kv.get(keyFor(fingerprint));
      return token ?? undefined;
    } catch (err: unknown) {
      this.log.warn(
        { fingerprint, error: this.log.serializeError(err) },
        "credential_cache_lookup_failed"
      );
      return undefined;
    }
  }

  async store(
    fingerprint: ScopeFingerprint,
    token: string,
    ttlSec: number
  ): Promise<void> {
    if (!Number.isInteger(ttlSec) || ttlSec <= 0) {
      this.log.debug({ fingerprint, ttlSec }, "credential_cache_skip_non_positive_ttl");
      return;
    }
    try {
      await this.kv.set(keyFor(fingerprint), token, ttlSec);
    } catch (err: unknown) {
      throw new CacheError(`token cache write failed for ${fingerprint}`, {
        meta: { fingerprint },
        cause: err,
      });
    }
  }
}

function keyFor(fingerprint: ScopeFingerprint): string {
  return `token:${fingerprint}`;
}
