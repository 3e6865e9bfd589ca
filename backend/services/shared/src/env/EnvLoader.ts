// backend/services/shared/src/env/EnvLoader.ts
/**
 * Purpose:
 * - Deterministic env-file loading for the monorepo.
 *
 * Policy:
 * - Load order & precedence:
 *   1) REPO ROOT: .env, .env.<mode>         (base; never overrides)
 *   2) SERVICE-LOCAL: .env, .env.<mode>     (OVERRIDES root)
 *   3) ENV_FILE (if provided)               (OVERRIDES root & service)
 * - Typed validation is NOT done here; each service owns a zod schema.
 * - Summary lists files, applied keys, and how many were overrides.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

type EnvMode = "dev" | "test" | "docker" | "production" | string;

type EnvTarget = Record<string, string | undefined>;

/** Uppercase-with-underscores guard; we don’t set weird keys. */
const VALID_KEY = /^[A-Z0-9_]+$/;

export type ApplyStats = {
  file: string;
  newKeys: number;
  overrides: number;
  totalKeys: number;
};

function applyEnvFromFile(
  target: EnvTarget,
  file: string,
  override: boolean
): ApplyStats {
  const kv = dotenv.parse(fs.readFileSync(file, "utf8"));
  let newKeys = 0;
  let overrides = 0;
  for (const [k, v] of Object.entries(kv)) {
    if (!VALID_KEY.test(k)) continue;
    const existed = Object.prototype.hasOwnProperty.call(target, k);
    if (!existed) {
      target[k] = v;
      newKeys++;
    } else if (override && target[k] !== v) {
      target[k] = v;
      overrides++;
    }
  }
  return { file, newKeys, overrides, totalKeys: Object.keys(kv).length };
}

export class EnvLoader {
  /**
   * Load env files in a safe, deterministic order.
   * Root first (base), then service (overrides), then ENV_FILE (final overrides).
   */
  static loadAll(options: {
    repoRoot: string;
    serviceRoot: string;
    mode?: EnvMode;
    target?: EnvTarget;
  }): ApplyStats[] {
    const target = options.target ?? process.env;
    const mode = (target.MODE ?? target.NODE_ENV ?? options.mode ?? "dev")
      .toString()
      .toLowerCase();

    const groups: Array<{ files: string[]; override: boolean }> = [
      {
        files: [
          path.join(options.repoRoot, ".env"),
          path.join(options.repoRoot, `.env.${mode}`),
        ],
        override: false,
      },
      {
        files: [
          path.join(options.serviceRoot, ".env"),
          path.join(options.serviceRoot, `.env.${mode}`),
        ],
        override: true,
      },
    ];

    const envFile = target.ENV_FILE;
    if (envFile) {
      const explicit = path.isAbsolute(envFile)
        ? envFile
        : path.join(options.repoRoot, envFile);
      if (!fs.existsSync(explicit)) {
        throw new Error(`ENV: ENV_FILE "${explicit}" does not exist.`);
      }
      groups.push({ files: [explicit], override: true });
    }

    // Deduplicate existing files while preserving order
    const seen = new Set<string>();
    const summaries: ApplyStats[] = [];
    for (const group of groups) {
      for (const f of group.files) {
        const abs = path.resolve(f);
        if (seen.has(abs) || !fs.existsSync(abs)) continue;
        seen.add(abs);
        summaries.push(applyEnvFromFile(target, abs, group.override));
      }
    }
    return summaries;
  }

  /** One-line summary for the boot log. */
  static describe(repoRoot: string, stats: ApplyStats[]): string {
    const parts = stats.map((s) => {
      const rel = path.relative(repoRoot, s.file) || s.file;
      return `${rel}:${s.newKeys}+${s.overrides}/${s.totalKeys}`;
    });
    return `loaded_files=${stats.length} ${parts.join(" ")}`.trim();
  }
}
