// backend/services/trends/test/security/TokenProvider.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import jwt from "jsonwebtoken";
import { MemoryKvStore } from "@rt/shared/cache/MemoryKvStore";
import type { IKvStore } from "@rt/shared/cache/IKvStore";
import { TransportError } from "@rt/shared/http/TransportError";
import { AuthError, UpstreamRejection } from "../../src/errors";
import {
  AssertionMinter,
  RsaAssertionSigner,
} from "../../src/security/AssertionSigner";
import {
  CredentialCache,
  fingerprintScope,
} from "../../src/security/CredentialCache";
import { TokenProvider } from "../../src/security/TokenProvider";
import { FailingKvStore, FakeTransport, TOKEN_URL, rsaKeyPair } from "../helpers/fakes";

const SCOPE = "https://scopes.test/bigquery";
const NOW_SEC = 1_710_000_000;

function build(opts: { kv?: IKvStore; singleFlight?: boolean; transport?: FakeTransport } = {}) {
  const kv = opts.kv ?? new MemoryKvStore({ nowMs: () => NOW_SEC * 1000 });
  const transport = opts.transport ?? new FakeTransport();
  const provider = new TokenProvider({
    identity: {
      issuer: "writer@test-project.iam.example.com",
      audience: TOKEN_URL,
      grantType: "urn:ietf:params:oauth:grant-type:jwt-bearer",
    },
    minter: new AssertionMinter({
      signer: new RsaAssertionSigner(rsaKeyPair().privateKey),
      now: () => NOW_SEC,
    }),
    cache: new CredentialCache(kv),
    transport,
    singleFlight: opts.singleFlight ?? false,
  });
  return { kv, transport, provider };
}

function cacheKey(scope: string): string {
  return `token:${fingerprintScope(scope)}`;
}

describe("TokenProvider.acquire", () => {
  let kv: MemoryKvStore;

  beforeEach(() => {
    kv = new MemoryKvStore({ nowMs: () => NOW_SEC * 1000 });
  });

  it("returns a cached token without signing or network", async () => {
    await kv.set(cacheKey(SCOPE), "cached-token", 600);
    const { provider, transport } = build({ kv });

    await expect(provider.acquire(SCOPE)).resolves.toBe("cached-token");
    expect(transport.requests).toHaveLength(0);
  });

  it("exchanges on a miss and caches for expires_in seconds", async () => {
    const transport = new FakeTransport().reply(200, {
      access_token: "fresh-token",
      expires_in: 3599,
      token_type: "Bearer",
    });
    const { provider } = build({ kv, transport });

    await expect(provider.acquire(SCOPE)).resolves.toBe("fresh-token");

    expect(transport.requests).toHaveLength(1);
    const req = transport.requests[0];
    expect(req?.method).toBe("POST");
    expect(req?.url).toBe(TOKEN_URL);
    expect(req?.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded",
    });

    const form = new URLSearchParams(req?.body ?? "");
    expect(form.get("grant_type")).toBe("urn:ietf:params:oauth:grant-type:jwt-bearer");
    const assertion = form.get("assertion") ?? "";
    const claims = jwt.verify(assertion, rsaKeyPair().publicKey, {
      clockTimestamp: NOW_SEC,
    });
    expect(claims).toMatchObject({ scope: SCOPE, aud: TOKEN_URL, exp: NOW_SEC + 3600 });

    expect(await kv.get(cacheKey(SCOPE))).toBe("fresh-token");
    expect(kv.ttlOf(cacheKey(SCOPE))).toBe(3599);
  });

  it("serves the second call from cache", async () => {
    const transport = new FakeTransport().reply(200, {
      access_token: "fresh-token",
      expires_in: 3600,
    });
    const { provider } = build({ kv, transport });

    await provider.acquire(SCOPE);
    await provider.acquire(SCOPE);
    expect(transport.requests).toHaveLength(1);
  });

  it("does not cache a zero lifetime", async () => {
    const transport = new FakeTransport().reply(200, {
      access_token: "short-token",
      expires_in: 0,
    });
    const { provider } = build({ kv, transport });

    await expect(provider.acquire(SCOPE)).resolves.toBe("short-token");
    expect(kv.size()).toBe(0);
  });

  it("surfaces a non-2xx exchange as UpstreamRejection with the body", async () => {
    const transport = new FakeTransport().reply(400, '{"error":"invalid_grant"}');
    const { provider } = build({ kv, transport });

    const err = await provider.acquire(SCOPE).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamRejection);
    if (!(err instanceof UpstreamRejection)) return;
    expect(err.upstream).toBe("identity-provider");
    expect(err.upstreamStatus).toBe(400);
    expect(err.upstreamBody).toBe('{"error":"invalid_grant"}');
    expect(err.httpStatus).toBe(502);
    expect(kv.size()).toBe(0);
  });

  it("rejects a response without access_token", async () => {
    const transport = new FakeTransport().reply(200, { expires_in: 3600 });
    const { provider } = build({ kv, transport });

    await expect(provider.acquire(SCOPE)).rejects.toThrow(
      "token response lacks usable fields: access_token"
    );
  });

  it("rejects a non-integer expires_in", async () => {
    const transport = new FakeTransport().reply(200, {
      access_token: "t",
      expires_in: "3600",
    });
    const { provider } = build({ kv, transport });

    await expect(provider.acquire(SCOPE)).rejects.toBeInstanceOf(AuthError);
  });

  it("rejects a non-JSON body", async () => {
    const transport = new FakeTransport().reply(200, "<html>oops</html>");
    const { provider } = build({ kv, transport });

    await expect(provider.acquire(SCOPE)).rejects.toThrow(
      "token response is not valid JSON"
    );
  });

  it("propagates transport failures", async () => {
    const transport = new FakeTransport().fail(
      new TransportError("POST https://idp.test/token failed: ECONNREFUSED")
    );
    const { provider } = build({ kv, transport });

    await expect(provider.acquire(SCOPE)).rejects.toBeInstanceOf(TransportError);
  });

  it("still returns the token when the cache is down", async () => {
    const failing = new FailingKvStore();
    const transport = new FakeTransport().reply(200, {
      access_token: "uncached-token",
      expires_in: 3600,
    });
    const { provider } = build({ kv: failing, transport });

    await expect(provider.acquire(SCOPE)).resolves.toBe("uncached-token");
    expect(failing.getCalls).toBe(1);
    expect(failing.setCalls).toBe(1);
  });
});

describe("TokenProvider concurrency", () => {
  const ok = () => ({ status: 200, body: JSON.stringify({ access_token: "t", expires_in: 3600 }) });

  it("coalesces concurrent misses when single-flight is on", async () => {
    const transport = new FakeTransport(ok);
    const { provider } = build({ transport, singleFlight: true });

    const tokens = await Promise.all([
      provider.acquire(SCOPE),
      provider.acquire(SCOPE),
      provider.acquire(SCOPE),
    ]);
    expect(tokens).toEqual(["t", "t", "t"]);
    expect(transport.requests).toHaveLength(1);
  });

  it("exchanges per miss when single-flight is off", async () => {
    const transport = new FakeTransport(ok);
    const { provider } = build({ transport, singleFlight: false });

    await Promise.all([provider.acquire(SCOPE), provider.acquire(SCOPE)]);
    expect(transport.requests).toHaveLength(2);
  });

  it("keeps scopes apart", async () => {
    const transport = new FakeTransport(ok);
    const { provider } = build({ transport, singleFlight: true });

    await Promise.all([provider.acquire(SCOPE), provider.acquire("other-scope")]);
    expect(transport.requests).toHaveLength(2);
  });
});
