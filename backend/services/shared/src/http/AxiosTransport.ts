// backend/services/shared/src/http/AxiosTransport.ts
/**
 * Purpose:
 * - IHttpTransport over axios.
 *
 * Notes:
 * - validateStatus accepts everything: non-2xx is data, not an exception.
 * - responseType "text" keeps the body verbatim; JSON decoding is the
 *   caller's concern so malformed bodies can be told apart from rejections.
 * - Single attempt. No retries here.
 */

import axios, { type AxiosInstance } from "axios";
import { getLogger } from "../logger/Logger";
import type { HttpRequest, HttpResponse, IHttpTransport } from "./IHttpTransport";
import { TransportError } from "./TransportError";

export class AxiosTransport implements IHttpTransport {
  private readonly http: AxiosInstance;
  private readonly log = getLogger({ component: "AxiosTransport" });

  constructor(opts: { timeoutMs: number }) {
    if (!Number.isInteger(opts.timeoutMs) || opts.timeoutMs <= 0) {
      throw new Error("AxiosTransport: timeoutMs must be a positive integer");
    }
    this.http = axios.create({
      timeout: opts.timeoutMs,
      responseType: "text",
      validateStatus: () => true,
      transitional: { forcedJSONParsing: false },
    });
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    const started = Date.now();
    const target = describeTarget(req.url);
    try {
      const res = await this.http.request<unknown>({
        method: req.method,
        url: req.url,
        headers: req.headers,
        data: req.body,
      });

      this.log.debug(
        { method: req.method, target, status: res.status, tookMs: Date.now() - started },
        "http_send_ok"
      );

      return { status: res.status, body: bodyText(res.data) };
    } catch (err: unknown) {
      const code = axios.isAxiosError(err) ? err.code : undefined;
      this.log.warn(
        { method: req.method, target, code, tookMs: Date.now() - started },
        "http_send_failed"
      );
      throw new TransportError(
        `${req.method} ${target} failed: ${code ?? errorMessage(err)}`,
        { meta: { target }, cause: err }
      );
    }
  }
}

function bodyText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return JSON.stringify(data);
}

/** Origin + path only; query strings may carry secrets. */
function describeTarget(url: string): string {
  try {
    const u = new URL(url);
    return `${u.origin}${u.pathname}`;
  } catch {
    return url;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
