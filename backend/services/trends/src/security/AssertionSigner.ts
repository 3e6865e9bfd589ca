// backend/services/trends/src/security/AssertionSigner.ts
/**
 * Purpose (single concern):
 * - Mint the signed JWT assertion a service account trades for a bearer token.
 *
 * Invariants:
 * - One assertion per exchange attempt; nothing here is cached or reused.
 * - Validity window is fixed at ASSERTION_TTL_SEC, which equals the identity
 *   provider's maximum accepted lifetime.
 * - Key material is parsed once at construction; a malformed key is an AuthError.
 */

import { createPrivateKey, type KeyObject } from "node:crypto";
import jwt from "jsonwebtoken";
import { AuthError } from "../errors";

/** Identity providers reject assertions living longer than one hour. */
export const ASSERTION_TTL_SEC = 3600;

export type AssertionClaims = {
  scope: string;
  iss: string;
  aud: string;
  iat: number; // epoch seconds
  exp: number; // epoch seconds
};

/** Contract for any signer of assertions. */
export interface IAssertionSigner {
  /** e.g., "RS256" */
  alg(): string;
  /** Produce a compact JWS; must not mutate claims. */
  sign(claims: AssertionClaims): string;
}

/**
 * Config values travel as single-line strings, so PEM newlines arrive as the
 * two characters "\" + "n". Turn them back into real newlines.
 */
export function normalizePrivateKey(raw: string): string {
  return raw.replace(/\\n/g, "\n");
}

export class RsaAssertionSigner implements IAssertionSigner {
  private readonly key: KeyObject;

  constructor(privateKeyPem: string) {
    let key: KeyObject;
    try {
      key = createPrivateKey(normalizePrivateKey(privateKeyPem));
    } catch (err: unknown) {
      throw new AuthError("service account private key is malformed", {
        cause: err,
      });
    }
    if (key.asymmetricKeyType !== "rsa") {
      throw new AuthError(
        `service account key must be RSA (got ${key.asymmetricKeyType ?? "unknown"})`
      );
    }
    this.key = key;
  }

  alg(): string {
    return "RS256";
  }

  sign(claims: AssertionClaims): string {
    try {
      return jwt.sign({ ...claims }, this.key, {
        algorithm: "RS256",
        header: { alg: "RS256", typ: "JWT" },
      });
    } catch (err: unknown) {
      throw new AuthError("failed to sign service account assertion", {
        cause: err,
      });
    }
  }
}

export class AssertionMinter {
  private readonly signer: IAssertionSigner;
  private readonly now: () => number;

  constructor(deps: { signer: IAssertionSigner; now?: () => number }) {
    this.signer = deps.signer;
    // Clock is injectable for deterministic tests (epoch seconds).
    this.now = deps.now ?? (() => Math.floor(Date.now() / 1000));
  }

  mint(opts: { issuer: string; audience: string; scope: string }): {
    assertion: string;
    claims: AssertionClaims;
  } {
    const iat = this.now();
    const claims: AssertionClaims = Object.freeze({
      scope: opts.scope,
      iss: opts.issuer,
      aud: opts.audience,
      iat,
      exp: iat + ASSERTION_TTL_SEC,
    });
    return { assertion: this.signer.sign(claims), claims };
  }
}
