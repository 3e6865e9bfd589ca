// backend/services/shared/src/problem/ServiceError.ts
/**
 * Purpose:
 * - Base class for every error a service raises on purpose.
 * - Carries the stable code and HTTP status the problem middleware emits, so
 *   handlers never pick statuses themselves.
 *
 * Invariants:
 * - No Express imports.
 * - `meta` is diagnostic context for operators (e.g. the statement text);
 *   it is copied onto the problem body verbatim.
 */

export type ServiceErrorOptions = {
  code: string;
  httpStatus: number;
  title: string;
  meta?: Record<string, unknown>;
  cause?: unknown;
};

export class ServiceError extends Error {
  public readonly code: string;
  public readonly httpStatus: number;
  public readonly title: string;
  public readonly meta: Record<string, unknown>;

  constructor(message: string, opts: ServiceErrorOptions) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = opts.code;
    this.httpStatus = opts.httpStatus;
    this.title = opts.title;
    this.meta = { ...(opts.meta ?? {}) };
  }
}
