// backend/services/shared/src/problem/problem.ts
/**
 * Purpose:
 * - Transport-agnostic Problem primitives (RFC7807-ish).
 * - Single source of truth for:
 *   - ProblemJson wire shape
 *   - ProblemFactory helpers used by the problem middleware
 *
 * Invariants:
 * - No Express/HTTP framework imports.
 * - No process.env access.
 */

import type { ServiceError } from "./ServiceError";

export type ProblemJson = {
  type: string; // e.g. "about:blank" or a stable URN
  title: string;
  status: number;

  detail?: string;
  code?: string;

  requestId?: string;

  serviceSlug?: string;
  serviceVersion?: number;

  meta?: Record<string, unknown>;
};

export class ProblemFactory {
  private readonly serviceSlug: string;
  private readonly serviceVersion: number;

  public constructor(opts: { serviceSlug: string; serviceVersion: number }) {
    if (!opts?.serviceSlug?.trim()) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: serviceSlug is required. Ops: pass a valid serviceSlug."
      );
    }
    if (
      typeof opts.serviceVersion !== "number" ||
      !Number.isFinite(opts.serviceVersion) ||
      opts.serviceVersion <= 0
    ) {
      throw new Error(
        "PROBLEM_FACTORY_INVALID: serviceVersion must be a positive number. Ops: pass a valid serviceVersion."
      );
    }

    this.serviceSlug = opts.serviceSlug.trim();
    this.serviceVersion = opts.serviceVersion;
  }

  private base(
    p: Omit<ProblemJson, "serviceSlug" | "serviceVersion">
  ): ProblemJson {
    return {
      serviceSlug: this.serviceSlug,
      serviceVersion: this.serviceVersion,
      ...p,
    };
  }

  public fromServiceError(err: ServiceError, requestId?: string): ProblemJson {
    const hasMeta = Object.keys(err.meta).length > 0;
    return this.base({
      type: "about:blank",
      title: err.title,
      status: err.httpStatus,
      code: err.code,
      detail: err.message,
      requestId,
      ...(hasMeta ? { meta: err.meta } : {}),
    });
  }

  public internalError(detail?: string, requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "INTERNAL_ERROR",
      detail: detail ?? "An unexpected error occurred.",
      requestId,
    });
  }

  public notFound(path: string, requestId?: string): ProblemJson {
    return this.base({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: `Route not found: ${path}`,
      requestId,
    });
  }
}
