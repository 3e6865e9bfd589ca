// backend/services/trends/src/warehouse/QueryExecutor.ts
/**
 * Purpose:
 * - Run one statement as a synchronous query job and hand back parsed JSON.
 *
 * Invariants:
 * - Single attempt, no retry.
 * - Non-2xx → UpstreamRejection with the body verbatim.
 * - 2xx with a non-JSON body → DecodeError (never partial output).
 * - Every error leaving here carries the statement text in meta.query.
 */

import type { IHttpTransport } from "@rt/shared/http/IHttpTransport";
import { isSuccessStatus } from "@rt/shared/http/IHttpTransport";
import { ServiceError } from "@rt/shared/problem/ServiceError";
import { getLogger } from "@rt/shared/logger/Logger";
import { DecodeError, UpstreamRejection, withQuery } from "../errors";
import type { ITokenProvider } from "../security/TokenProvider";
import { buildQueryJob } from "./QueryJob";
import type { Statement } from "./statements";

export type QueryExecutorOptions = {
  tokens: ITokenProvider;
  transport: IHttpTransport;
  /** e.g. "https://bigquery.googleapis.com/bigquery/v2" */
  apiBaseUrl: string;
  projectId: string;
  scope: string;
};

export class QueryExecutor {
  private readonly log = getLogger({
    service: "trends",
    component: "QueryExecutor",
  });
  private readonly url: string;

  constructor(private readonly opts: QueryExecutorOptions) {
    const base = opts.apiBaseUrl.replace(/\/+$/, "");
    this.url = `${base}/projects/${encodeURIComponent(opts.projectId)}/queries`;
  }

  async runQuery(statement: Statement): Promise<unknown> {
    try {
      return await this.run(statement);
    } catch (err: unknown) {
      if (err instanceof ServiceError) throw withQuery(err, statement.sql);
      throw err;
    }
  }

  private async run(statement: Statement): Promise<unknown> {
    const token = await this.opts.tokens.acquire(this.opts.scope);
    const job = buildQueryJob(statement);
    const started = Date.now();

    this.log.debug(
      { query: statement.sql, params: statement.params.length },
      "query_begin"
    );

    const res = await this.opts.transport.send({
      method: "POST",
      url: this.url,
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json; charset=utf-8",
      },
      body: JSON.stringify(job),
    });

    if (!isSuccessStatus(res.status)) {
      throw new UpstreamRejection("warehouse", res.status, res.body);
    }

    let json: unknown;
    try {
      json = JSON.parse(res.body);
    } catch (err: unknown) {
      throw new DecodeError(
        `warehouse response is not valid JSON: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    this.log.info(
      { query: statement.sql, tookMs: Date.now() - started },
      "query_ok"
    );
    return json;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
