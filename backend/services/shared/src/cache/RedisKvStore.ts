// backend/services/shared/src/cache/RedisKvStore.ts
/**
 * Purpose:
 * - IKvStore over node-redis v4, shared across instances of the service.
 *
 * Notes:
 * - Connects in the background; callers MUST tolerate rejected reads/writes.
 * - Offline queue is disabled so a down Redis rejects immediately instead of
 *   parking commands on the request path.
 */

import { createClient } from "redis";
import { getLogger } from "../logger/Logger";
import type { IKvStore } from "./IKvStore";

type RedisClient = ReturnType<typeof createClient>;

export class RedisKvStore implements IKvStore {
  public readonly kind = "redis";

  constructor(private readonly client: RedisClient) {}

  static connect(url: string): RedisKvStore {
    const log = getLogger({ component: "RedisKvStore" });
    const client = createClient({ url, disableOfflineQueue: true });

    client.on("error", (err: unknown) => {
      log.warn({ error: log.serializeError(err) }, "redis_error");
    });

    client.connect().catch((err: unknown) => {
      log.error({ error: log.serializeError(err) }, "redis_connect_failed");
    });

    return new RedisKvStore(client);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSec: number): Promise<void> {
    if (!Number.isInteger(ttlSec) || ttlSec <= 0) {
      throw new Error(`RedisKvStore: ttlSec must be a positive integer (got ${ttlSec})`);
    }
    await this.client.set(key, value, { EX: ttlSec });
  }

  async quit(): Promise<void> {
    if (this.client.isOpen) await this.client.quit();
  }
}
