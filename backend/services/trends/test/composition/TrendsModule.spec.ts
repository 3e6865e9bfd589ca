// backend/services/trends/test/composition/TrendsModule.spec.ts
import { describe, it, expect, vi } from "vitest";

// ---- redis mock (module-scoped) ---------------------------------------------
const redisClient = vi.hoisted(() => ({
  isOpen: true,
  on: vi.fn(),
  connect: vi.fn(() => Promise.resolve()),
  get: vi.fn(() => Promise.resolve(null)),
  set: vi.fn(() => Promise.resolve("OK")),
  quit: vi.fn(() => Promise.resolve()),
}));
vi.mock("redis", () => ({ createClient: vi.fn(() => redisClient) }));

import { createClient } from "redis";
import { AuthError } from "../../src/errors";
import { buildTrendsModule } from "../../src/composition/TrendsModule";
import { FakeTransport, testEnv } from "../helpers/fakes";

describe("buildTrendsModule", () => {
  it("uses the in-process store for TOKEN_CACHE=memory", async () => {
    const trends = buildTrendsModule(testEnv(), { transport: new FakeTransport() });
    expect(trends.cacheKind).toBe("memory");
    await expect(trends.close()).resolves.toBeUndefined();
    expect(createClient).not.toHaveBeenCalled();
  });

  it("connects to redis for TOKEN_CACHE=redis and quits on close", async () => {
    const trends = buildTrendsModule(
      testEnv({ TOKEN_CACHE: "redis", REDIS_URL: "redis://127.0.0.1:6379" }),
      { transport: new FakeTransport() }
    );

    expect(trends.cacheKind).toBe("redis");
    expect(createClient).toHaveBeenCalledWith({
      url: "redis://127.0.0.1:6379",
      disableOfflineQueue: true,
    });
    expect(redisClient.connect).toHaveBeenCalledTimes(1);

    await trends.close();
    expect(redisClient.quit).toHaveBeenCalledTimes(1);
  });

  it("fails fast on a malformed signing key", () => {
    expect(() =>
      buildTrendsModule(testEnv({ SA_PRIVATE_KEY: "test-secret" }), {
        transport: new FakeTransport(),
      })
    ).toThrow(AuthError);
  });
});
