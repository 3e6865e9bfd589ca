// backend/services/trends/src/app.ts
/**
 * Purpose:
 * - Express app for the trends service.
 *
 * Order:
 * 1) Hardening & basics (cors)
 * 2) Request logging (pino-http, x-request-id propagated or minted), json
 * 3) Health (unversioned)
 * 4) /api/trends/v1 routes
 * 5) 404 + problem funnel
 */

import { randomUUID } from "node:crypto";
import cors from "cors";
import express, { type ErrorRequestHandler, type Express } from "express";
import pinoHttp from "pino-http";
import { createHealthRouter } from "@rt/shared/health/createHealthRouter";
import { getLogger, getRootLogger } from "@rt/shared/logger/Logger";
import {
  createNotFoundHandler,
  createProblemMiddleware,
} from "@rt/shared/problem/createProblemMiddleware";
import type { TrendsModule } from "./composition/TrendsModule";
import { PayloadError } from "./errors";

export const SERVICE_SLUG = "trends";
export const SERVICE_VERSION = 1;

export function createTrendsApp(
  trends: Pick<TrendsModule, "router" | "cacheKind">
): Express {
  const app = express();
  const log = getLogger({ service: SERVICE_SLUG, component: "app" });

  // Hardening & basics
  app.disable("x-powered-by");
  app.use(cors({ origin: true, credentials: true }));

  // Request logging (before body parsing)
  app.use(
    pinoHttp({
      logger: getRootLogger(),
      genReqId: (req, res) => {
        const hdr = req.headers["x-request-id"];
        const id = (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();
        res.setHeader("x-request-id", id);
        return id;
      },
      customLogLevel(_req, res, err) {
        if (err) return "error";
        if (res.statusCode >= 500) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
      customProps() {
        return { service: SERVICE_SLUG };
      },
      autoLogging: {
        ignore: (req) => (req.url ?? "").startsWith("/health"),
      },
      serializers: {
        req(req: { id?: unknown; method?: string; url?: string }) {
          return { id: req.id, method: req.method, url: req.url };
        },
        res(res: { statusCode?: number }) {
          return { statusCode: res.statusCode };
        },
      },
    })
  );

  app.use(express.json({ limit: "1mb" }));

  // Health
  app.use(
    createHealthRouter({
      service: SERVICE_SLUG,
      version: SERVICE_VERSION,
      readiness: () => ({ tokenCache: trends.cacheKind }),
    })
  );

  // Routes
  app.use(`/api/${SERVICE_SLUG}/v${SERVICE_VERSION}`, trends.router);

  // 404 + error funnel
  app.use(
    createNotFoundHandler({
      serviceSlug: SERVICE_SLUG,
      serviceVersion: SERVICE_VERSION,
    })
  );
  app.use(translateBodyParseError);
  app.use(
    createProblemMiddleware({
      log,
      serviceSlug: SERVICE_SLUG,
      serviceVersion: SERVICE_VERSION,
    })
  );

  return app;
}

/** express.json() failures become our own 400 instead of a generic 500. */
const translateBodyParseError: ErrorRequestHandler = (err, _req, _res, next) => {
  if (isBodyParseError(err)) {
    next(new PayloadError(`request body is not valid JSON: ${err.message}`, { cause: err }));
    return;
  }
  next(err);
};

function isBodyParseError(err: unknown): err is Error & { type: string } {
  return (
    err instanceof Error &&
    "type" in err &&
    (err.type === "entity.parse.failed" || err.type === "entity.too.large")
  );
}
