// backend/services/trends/src/errors.ts
/**
 * Failure taxonomy of the trends service.
 *
 * Each class fixes its code and HTTP status; the problem middleware is the
 * only place that turns them into responses. CacheError never reaches it.
 */

import { ServiceError } from "@rt/shared/problem/ServiceError";
import { TransportError } from "@rt/shared/http/TransportError";

export { TransportError };

type ErrorContext = { meta?: Record<string, unknown>; cause?: unknown };

/** Signing key malformed, signing failed, or the token response is unusable. */
export class AuthError extends ServiceError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, {
      code: "AUTH_FAILED",
      httpStatus: 502,
      title: "Bad Gateway",
      ...ctx,
    });
  }
}

export type Upstream = "identity-provider" | "warehouse";

/** Upstream answered with a non-success status; its body is kept verbatim. */
export class UpstreamRejection extends ServiceError {
  public readonly upstream: Upstream;
  public readonly upstreamStatus: number;
  public readonly upstreamBody: string;

  constructor(
    upstream: Upstream,
    upstreamStatus: number,
    upstreamBody: string,
    ctx: ErrorContext = {}
  ) {
    super(`${upstream} rejected the request (${upstreamStatus}): ${upstreamBody}`, {
      code: "UPSTREAM_REJECTED",
      httpStatus: 502,
      title: "Bad Gateway",
      meta: { upstream, upstreamStatus, ...(ctx.meta ?? {}) },
      cause: ctx.cause,
    });
    this.upstream = upstream;
    this.upstreamStatus = upstreamStatus;
    this.upstreamBody = upstreamBody;
  }
}

/** Response body is not JSON, or lacks the structure it must have. */
export class DecodeError extends ServiceError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, {
      code: "DECODE_FAILED",
      httpStatus: 502,
      title: "Bad Gateway",
      ...ctx,
    });
  }
}

/** Caller-supplied date bounds are unparsable or logically out of range. */
export class DateRangeError extends ServiceError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, {
      code: "INVALID_DATE_RANGE",
      httpStatus: 400,
      title: "Bad Request",
      ...ctx,
    });
  }
}

/** Insert body failed validation. */
export class PayloadError extends ServiceError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, {
      code: "INVALID_PAYLOAD",
      httpStatus: 400,
      title: "Bad Request",
      ...ctx,
    });
  }
}

/** Token cache read/write failure. Logged, never surfaced. */
export class CacheError extends ServiceError {
  constructor(message: string, ctx: ErrorContext = {}) {
    super(message, {
      code: "CACHE_FAILED",
      httpStatus: 500,
      title: "Internal Server Error",
      ...ctx,
    });
  }
}

/** Attach the statement text to an error on its way out, keeping its class. */
export function withQuery<E extends ServiceError>(err: E, query: string): E {
  err.meta.query = query;
  return err;
}
