// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API for all services with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 * - debug() adds origin capture (file/method/line).
 *
 * Runtime Controls:
 * - initRootLogger({ service, level }) is called once at boot.
 * - Before that, a pino root at LOG_LEVEL (or "info") is created lazily so
 *   library code imported by tests never throws for lack of a logger.
 */

import pino, {
  type Logger as PinoLogger,
  type LoggerOptions,
  stdTimeFunctions,
} from "pino";

type Json = Record<string, unknown>;

type LevelName = "debug" | "info" | "warn" | "error";
export type RootLevel = LevelName | "silent";

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  info(msg: string, meta?: Json): void;
  info(obj: Json, msg?: string): void;

  debug(msg: string, meta?: Json): void;
  debug(obj: Json, msg?: string): void;

  warn(msg: string, meta?: Json): void;
  warn(obj: Json, msg?: string): void;

  error(msg: string, meta?: Json): void;
  error(obj: Json, msg?: string): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

// ────────────────────────────────────────────────────────────────────────────
// Root logger
// ────────────────────────────────────────────────────────────────────────────

let ROOT: PinoLogger | null = null;

const ROOT_LEVELS: readonly RootLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export function isRootLevel(v: string): v is RootLevel {
  return ROOT_LEVELS.some((level) => level === v);
}

function rootOptions(level: RootLevel, service?: string): LoggerOptions {
  return {
    level,
    base: service ? { service } : {},
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: [
        "req.headers.authorization",
        "req.headers.cookie",
        "headers.authorization",
        "headers.Authorization",
      ],
    },
  };
}

/** Initialize the root logger for this running service. Call once at boot. */
export function initRootLogger(opts: {
  service: string;
  level: RootLevel;
}): PinoLogger {
  const service = opts.service.trim();
  if (!service) throw new Error("Logger: initRootLogger requires a service");
  ROOT = pino(rootOptions(opts.level, service));
  return ROOT;
}

/** Replace the root (tests inject a pino instance writing to a buffer). */
export function setRootLogger(logger: PinoLogger): void {
  ROOT = logger;
}

export function getRootLogger(): PinoLogger {
  if (ROOT) return ROOT;
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  ROOT = pino(rootOptions(isRootLevel(raw) ? raw : "info"));
  return ROOT;
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  constructor(private readonly ctx: Json = {}) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  public info(arg1: string | Json, arg2?: string | Json): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2);
    getRootLogger().info(obj, msg);
  }

  // debug always includes origin
  public debug(arg1: string | Json, arg2?: string | Json): void {
    const root = getRootLogger();
    if (!root.isLevelEnabled("debug")) return;
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2);
    root.debug({ ...obj, origin: captureOrigin(2) }, msg);
  }

  public warn(arg1: string | Json, arg2?: string | Json): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2);
    getRootLogger().warn(obj, msg);
  }

  public error(arg1: string | Json, arg2?: string | Json): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2);
    getRootLogger().error(obj, msg);
  }

  public serializeError(err: unknown) {
    if (err instanceof Error)
      return { name: err.name, message: err.message, stack: err.stack };
    return { message: String(err) };
  }
}

/** Normalize args for BoundLogger while merging in bound context. */
function normalizeForBound(
  boundCtx: Json,
  arg1: string | Json,
  arg2?: string | Json
): [Json, string | undefined] {
  if (typeof arg1 === "string") {
    const meta = arg2 && typeof arg2 === "object" ? arg2 : {};
    return [{ ...boundCtx, ...meta }, arg1];
  }
  return [{ ...boundCtx, ...arg1 }, typeof arg2 === "string" ? arg2 : undefined];
}

// ────────────────────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────────────────────

/** Capture file/method/line from the current stack frame. */
function captureOrigin(depth = 2): Record<string, string | number | undefined> {
  const e = new Error();
  const lines = (e.stack || "").split("\n");
  const line = lines[depth + 1] || "";
  const m =
    /at\s+(?<method>[^(\s]+)?\s*\(?((?<file>[^:()]+):(?<line>\d+):(?<col>\d+))\)?/i.exec(
      line
    );
  if (!m || !m.groups) return {};
  const file = shortenPath(m.groups.file || "");
  return { file, method: m.groups.method, line: Number(m.groups.line) };
}

/** Shorten absolute paths to repo-relative where possible (heuristic). */
function shortenPath(abs: string): string {
  const anchors = ["/backend/", "/src/"];
  for (const a of anchors) {
    const i = abs.indexOf(a);
    if (i >= 0) return abs.slice(i + 1);
  }
  return abs;
}
