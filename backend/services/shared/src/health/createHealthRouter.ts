// backend/services/shared/src/health/createHealthRouter.ts
import express from "express";

type ReadinessDetails = Record<string, unknown>;
type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  version: number;
  readiness?: ReadinessFn;
};

/**
 * Exposes (relative to where it is mounted):
 *   GET /health         -> liveness
 *   GET /health/live    -> explicit liveness
 *   GET /health/ready   -> readiness (503 when the readiness check throws)
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();

  const base = { service: opts.service, version: opts.version };

  const liveness = (_req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true });
  };

  const readiness = async (_req: express.Request, res: express.Response) => {
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({ ...base, ok: true, ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);

  return router;
}
