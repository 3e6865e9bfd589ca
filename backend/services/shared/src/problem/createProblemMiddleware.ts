// backend/services/shared/src/problem/createProblemMiddleware.ts
/**
 * Purpose:
 * - Express-only final error funnel.
 * - ServiceError subclasses map to their declared status/code; the message and
 *   meta (e.g. the statement that failed) travel back for operator diagnosis.
 * - Emits RFC7807-ish JSON for unexpected errors (using ProblemFactory shape).
 *
 * Invariants:
 * - Express import allowed here (adapter).
 * - No process.env reads.
 * - Every failure is logged exactly once, here.
 */

import type { ErrorRequestHandler, RequestHandler, Request } from "express";
import type { ReqId } from "pino-http"; // req.id typing
import type { IBoundLogger } from "../logger/Logger";
import { ProblemFactory } from "./problem";
import { ServiceError } from "./ServiceError";

function requestIdOf(req: Request): string | undefined {
  const id: ReqId | undefined = req.id;
  if (typeof id === "string" || typeof id === "number") return String(id);
  return undefined;
}

export function createProblemMiddleware(opts: {
  log: IBoundLogger;
  serviceSlug: string;
  serviceVersion: number;
}): ErrorRequestHandler {
  const { log, serviceSlug, serviceVersion } = opts;
  const pf = new ProblemFactory({ serviceSlug, serviceVersion });

  return (err, req, res, _next) => {
    const requestId = requestIdOf(req);

    if (err instanceof ServiceError) {
      const problem = pf.fromServiceError(err, requestId);
      const entry = {
        requestId,
        code: err.code,
        status: err.httpStatus,
        meta: err.meta,
        error: log.serializeError(err),
      };
      if (err.httpStatus >= 500) log.error(entry, err.message);
      else log.warn(entry, err.message);

      return res
        .status(err.httpStatus)
        .type("application/problem+json")
        .json(problem);
    }

    log.error(
      {
        requestId,
        service: serviceSlug,
        serviceVersion,
        error: log.serializeError(err),
      },
      "unhandled error in request pipeline"
    );

    return res
      .status(500)
      .type("application/problem+json")
      .json(pf.internalError(undefined, requestId));
  };
}

/** Terminal 404 for anything no router claimed. */
export function createNotFoundHandler(opts: {
  serviceSlug: string;
  serviceVersion: number;
}): RequestHandler {
  const pf = new ProblemFactory(opts);
  return (req, res) => {
    res
      .status(404)
      .type("application/problem+json")
      .json(pf.notFound(req.originalUrl, requestIdOf(req)));
  };
}
