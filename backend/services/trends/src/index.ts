// backend/services/trends/src/index.ts
/**
 * Purpose:
 * - Orchestration-only bootstrap for the trends service.
 *   env files → TrendsEnv.assert() → root logger → module → app → listen.
 *
 * Invariants:
 * - Nothing listens until the env validated and the signing key parsed.
 * - SIGINT/SIGTERM close the server, then the token store.
 */

import path from "node:path";
import { EnvLoader } from "@rt/shared/env/EnvLoader";
import { getLogger, initRootLogger } from "@rt/shared/logger/Logger";
import { createTrendsApp, SERVICE_SLUG } from "./app";
import { buildTrendsModule } from "./composition/TrendsModule";
import { TrendsEnv } from "./env/TrendsEnv";

const SERVICE_ROOT = path.resolve(__dirname, "..");
const REPO_ROOT = path.resolve(SERVICE_ROOT, "../../..");

async function main(): Promise<void> {
  const loaded = EnvLoader.loadAll({
    repoRoot: REPO_ROOT,
    serviceRoot: SERVICE_ROOT,
  });
  const env = TrendsEnv.assert();

  initRootLogger({ service: SERVICE_SLUG, level: env.LOG_LEVEL });
  const log = getLogger({ service: SERVICE_SLUG, component: "bootstrap" });
  log.info(EnvLoader.describe(REPO_ROOT, loaded));

  const trends = buildTrendsModule(env);
  const app = createTrendsApp(trends);

  const server = app.listen(env.TRENDS_PORT, () => {
    log.info(
      { port: env.TRENDS_PORT, tokenCache: trends.cacheKind },
      "trends listening"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "trends shutting_down");
    server.close(() => {
      trends
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err: log.serializeError(err) }, "trends close_failed");
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  const log = getLogger().bind({ service: SERVICE_SLUG, component: "bootstrap" });
  try {
    log.error({ err: log.serializeError(err) }, "trends boot_failed");
  } catch {
    // eslint-disable-next-line no-console
    console.error("fatal trends startup", err);
  }
  process.exit(1);
});
