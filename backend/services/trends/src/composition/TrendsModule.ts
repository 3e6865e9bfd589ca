// backend/services/trends/src/composition/TrendsModule.ts
/**
 * Purpose (single concern):
 * - Orchestrate the trends pieces from a validated env:
 *   1) Key-value store for tokens (redis | memory)
 *   2) Signer + minter + token provider
 *   3) Query executor over the shared transport
 *   4) DI into controller
 *   5) Return configured Router plus what boot needs to report and close
 *
 * Invariants:
 * - No process.env reads here; TrendsEnv.assert() ran before we were called.
 * - One transport instance serves both the identity provider and the warehouse.
 */

import type { Router } from "express";
import type { IKvStore } from "@rt/shared/cache/IKvStore";
import { MemoryKvStore } from "@rt/shared/cache/MemoryKvStore";
import { RedisKvStore } from "@rt/shared/cache/RedisKvStore";
import { AxiosTransport } from "@rt/shared/http/AxiosTransport";
import type { IHttpTransport } from "@rt/shared/http/IHttpTransport";
import { TermsController } from "../controllers/TermsController";
import type { TrendsEnvShape } from "../env/TrendsEnv";
import { RangeFilterBuilder } from "../filters/RangeFilterBuilder";
import { TermsRouter } from "../routes/terms.router";
import { AssertionMinter, RsaAssertionSigner } from "../security/AssertionSigner";
import { CredentialCache } from "../security/CredentialCache";
import { TokenProvider } from "../security/TokenProvider";
import { QueryExecutor } from "../warehouse/QueryExecutor";

export type TrendsModule = {
  router: Router;
  cacheKind: string;
  close(): Promise<void>;
};

/** Seams tests (and local tooling) may replace; env decides the rest. */
export type TrendsModuleOverrides = {
  kv?: IKvStore;
  transport?: IHttpTransport;
  now?: () => Date;
};

export function buildTrendsModule(
  env: TrendsEnvShape,
  overrides: TrendsModuleOverrides = {}
): TrendsModule {
  // 1) Token store
  let redis: RedisKvStore | undefined;
  let kv: IKvStore;
  if (overrides.kv) {
    kv = overrides.kv;
  } else if (env.TOKEN_CACHE === "redis" && env.REDIS_URL) {
    redis = RedisKvStore.connect(env.REDIS_URL);
    kv = redis;
  } else {
    kv = new MemoryKvStore();
  }
  const cache = new CredentialCache(kv);

  const transport =
    overrides.transport ??
    new AxiosTransport({ timeoutMs: env.OUTBOUND_TIMEOUT_MS });

  // 2) Identity: fail-fast on a malformed key, at boot rather than first request
  const signer = new RsaAssertionSigner(env.SA_PRIVATE_KEY);
  const now = overrides.now;
  const minter = new AssertionMinter({
    signer,
    now: now ? () => Math.floor(now().getTime() / 1000) : undefined,
  });
  const tokens = new TokenProvider({
    identity: {
      issuer: env.SA_EMAIL,
      audience: env.TOKEN_AUDIENCE,
      grantType: env.TOKEN_GRANT_TYPE,
    },
    minter,
    cache,
    transport,
    singleFlight: env.TOKEN_SINGLE_FLIGHT,
  });

  // 3) Warehouse
  const executor = new QueryExecutor({
    tokens,
    transport,
    apiBaseUrl: env.BQ_API_BASE_URL,
    projectId: env.BQ_PROJECT_ID,
    scope: env.BQ_SCOPE,
  });

  // 4) Controller DI
  const controller = new TermsController({
    executor,
    filters: new RangeFilterBuilder({ now }),
    table: {
      projectId: env.BQ_PROJECT_ID,
      datasetTableId: env.BQ_DATASET_TABLE_ID,
    },
  });

  // 5) Router
  return {
    router: new TermsRouter(controller).router(),
    cacheKind: cache.kind,
    close: async () => {
      if (redis) await redis.quit();
    },
  };
}
