// backend/services/trends/src/security/TokenProvider.ts
/**
 * Purpose:
 * - Hand out bearer tokens for a scope, cache-first.
 * - On a miss: mint one assertion, exchange it once at the identity provider,
 *   store the token for the reported lifetime, return it.
 *
 * Invariants:
 * - A cache hit costs no signature and no network call.
 * - Exchange failures are fatal for the request; nothing is retried.
 * - A failed cache write never fails the request.
 * - With singleFlight on, concurrent misses for one fingerprint in this process
 *   share a single exchange. Off, each miss exchanges and the last write wins;
 *   both are correct because unexpired tokens for a scope are interchangeable.
 */

import { z } from "zod";
import type { IHttpTransport } from "@rt/shared/http/IHttpTransport";
import { isSuccessStatus } from "@rt/shared/http/IHttpTransport";
import { getLogger, type IBoundLogger } from "@rt/shared/logger/Logger";
import { AuthError, CacheError, UpstreamRejection } from "../errors";
import type { AssertionMinter } from "./AssertionSigner";
import {
  fingerprintScope,
  type CredentialCache,
  type ScopeFingerprint,
} from "./CredentialCache";

export type ServiceAccountIdentity = {
  /** Service-account email; assertion issuer. */
  issuer: string;
  /** Token endpoint URL; assertion audience and exchange target. */
  audience: string;
  grantType: string;
};

/** Only the fields we rely on; providers add more. */
const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().int().nonnegative(),
  })
  .passthrough();

export interface ITokenProvider {
  acquire(scope: string): Promise<string>;
}

export type TokenProviderOptions = {
  identity: ServiceAccountIdentity;
  minter: AssertionMinter;
  cache: CredentialCache;
  transport: IHttpTransport;
  singleFlight: boolean;
  log?: IBoundLogger;
};

export class TokenProvider implements ITokenProvider {
  private readonly identity: ServiceAccountIdentity;
  private readonly minter: AssertionMinter;
  private readonly cache: CredentialCache;
  private readonly transport: IHttpTransport;
  private readonly singleFlight: boolean;
  private readonly log: IBoundLogger;

  private readonly inflight = new Map<ScopeFingerprint, Promise<string>>();

  constructor(opts: TokenProviderOptions) {
    this.identity = opts.identity;
    this.minter = opts.minter;
    this.cache = opts.cache;
    this.transport = opts.transport;
    this.singleFlight = opts.singleFlight;
    this.log =
      opts.log ?? getLogger({ service: "trends", component: "TokenProvider" });
  }

  async acquire(scope: string): Promise<string> {
    const fingerprint = fingerprintScope(scope);

    const cached = await this.cache.lookup(fingerprint);
    if (cached) {
      this.log.debug({ fingerprint }, "TokenProvider: cache hit");
      return cached;
    }

    if (!this.singleFlight) return this.exchangeAndStore(scope, fingerprint);

    const existing = this.inflight.get(fingerprint);
    if (existing) {
      this.log.debug({ fingerprint }, "TokenProvider: awaiting in-flight exchange");
      return existing;
    }

    const p = this.exchangeAndStore(scope, fingerprint).finally(() =>
      this.inflight.delete(fingerprint)
    );
    this.inflight.set(fingerprint, p);
    return p;
  }

  // ----------------
  // Internals
  // ----------------

  private async exchangeAndStore(
    scope: string,
    fingerprint: ScopeFingerprint
  ): Promise<string> {
    const { token, expiresIn } = await this.exchange(scope, fingerprint);

    try {
      await this.cache.store(fingerprint, token, expiresIn);
    } catch (err: unknown) {
      if (!(err instanceof CacheError)) throw err;
      this.log.warn(
        { fingerprint, error: this.log.serializeError(err) },
        "TokenProvider: token not cached"
      );
    }
    return token;
  }

  private async exchange(
    scope: string,
    fingerprint: ScopeFingerprint
  ): Promise<{ token: string; expiresIn: number }> {
    const { assertion, claims } = this.minter.mint({
      issuer: this.identity.issuer,
      audience: this.identity.audience,
      scope,
    });

    this.log.info(
      { fingerprint, iss: claims.iss, exp: claims.exp },
      "TokenProvider: cache miss, exchanging assertion"
    );

    const form = new URLSearchParams({
      grant_type: this.identity.grantType,
      assertion,
    });

    const res = await this.transport.send({
      method: "POST",
      url: this.identity.audience,
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: form.toString(),
    });

    if (!isSuccessStatus(res.status)) {
      throw new UpstreamRejection("identity-provider", res.status, res.body);
    }

    let json: unknown;
    try {
      json = JSON.parse(res.body);
    } catch (err: unknown) {
      throw new AuthError("token response is not valid JSON", { cause: err });
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      const missing = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
      throw new AuthError(`token response lacks usable fields: ${missing}`);
    }

    this.log.info(
      { fingerprint, expiresIn: parsed.data.expires_in },
      "TokenProvider: exchange ok"
    );
    return {
      token: parsed.data.access_token,
      expiresIn: parsed.data.expires_in,
    };
  }
}
