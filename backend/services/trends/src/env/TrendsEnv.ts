// backend/services/trends/src/env/TrendsEnv.ts
/**
 * Purpose (single concern):
 * - Validate and expose the exact environment the trends service needs.
 *
 * Why:
 * - No literals, no defaults, no fallbacks. Fail-fast at boot if anything is missing.
 * - Identifiers (project, dataset.table) are embedded in statement text, so
 *   they are restricted to a safe charset here; values never are.
 */

import { z } from "zod";

const boolLike = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["1", "0", "true", "false", "on", "off", "yes", "no"]))
  .transform((v) => v === "1" || v === "true" || v === "on" || v === "yes");

const intLike = z
  .string()
  .trim()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform((v) => Number(v));

/** Strict schema — every field required, no defaults. */
const EnvSchema = z
  .object({
    SA_EMAIL: z.string().trim().email(),
    /** PEM; may arrive single-line with literal "\n" sequences. */
    SA_PRIVATE_KEY: z.string().min(1),
    /** Identity-provider token endpoint; also the assertion audience. */
    TOKEN_AUDIENCE: z.string().trim().url(),
    TOKEN_GRANT_TYPE: z.string().trim().min(1),
    TOKEN_CACHE: z.enum(["redis", "memory"]),
    REDIS_URL: z.string().trim().url().optional(),
    TOKEN_SINGLE_FLIGHT: boolLike,

    BQ_SCOPE: z.string().trim().min(1),
    BQ_PROJECT_ID: z
      .string()
      .trim()
      .regex(/^[a-z][a-z0-9-]{4,28}[a-z0-9]$/, "not a valid project id"),
    BQ_DATASET_TABLE_ID: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9_]+\.[A-Za-z0-9_-]+$/, 'must be "<dataset>.<table>"'),
    BQ_API_BASE_URL: z.string().trim().url(),

    OUTBOUND_TIMEOUT_MS: intLike.pipe(z.number().int().positive()),
    TRENDS_PORT: intLike.pipe(z.number().int().min(0).max(65535)),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]),
  })
  .strict()
  .superRefine((env, ctx) => {
    if (env.TOKEN_CACHE === "redis" && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REDIS_URL"],
        message: "REDIS_URL is required when TOKEN_CACHE=redis",
      });
    }
  });

export type TrendsEnvShape = z.infer<typeof EnvSchema>;

export class TrendsEnv {
  /**
   * Validate and return typed env configuration.
   * Throws immediately if any variable is missing or invalid.
   */
  static assert(env: NodeJS.ProcessEnv = process.env): TrendsEnvShape {
    // Parse **only** known keys; reject extras to surface drift.
    return EnvSchema.parse({
      SA_EMAIL: env.SA_EMAIL,
      SA_PRIVATE_KEY: env.SA_PRIVATE_KEY,
      TOKEN_AUDIENCE: env.TOKEN_AUDIENCE,
      TOKEN_GRANT_TYPE: env.TOKEN_GRANT_TYPE,
      TOKEN_CACHE: env.TOKEN_CACHE,
      REDIS_URL: env.REDIS_URL || undefined,
      TOKEN_SINGLE_FLIGHT: env.TOKEN_SINGLE_FLIGHT,
      BQ_SCOPE: env.BQ_SCOPE,
      BQ_PROJECT_ID: env.BQ_PROJECT_ID,
      BQ_DATASET_TABLE_ID: env.BQ_DATASET_TABLE_ID,
      BQ_API_BASE_URL: env.BQ_API_BASE_URL,
      OUTBOUND_TIMEOUT_MS: env.OUTBOUND_TIMEOUT_MS,
      TRENDS_PORT: env.TRENDS_PORT,
      LOG_LEVEL: env.LOG_LEVEL,
    });
  }
}
