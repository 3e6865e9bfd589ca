// backend/services/trends/src/controllers/TermsController.ts
/**
 * Purpose:
 * - Thin controller for the rising-terms table.
 *   POST /terms → validate payload → INSERT
 *   GET  /terms → date bounds → SELECT → typed records
 *
 * Invariants:
 * - No status decisions here: failures are passed to next() and the problem
 *   middleware maps them.
 * - Bad input is rejected before any token or query work starts.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { getLogger } from "@rt/shared/logger/Logger";
import { ServiceError } from "@rt/shared/problem/ServiceError";
import { assertRisingTerm } from "../contracts/risingTerm.contract";
import { DateRangeError, withQuery } from "../errors";
import type { RangeFilterBuilder } from "../filters/RangeFilterBuilder";
import type { QueryExecutor } from "../warehouse/QueryExecutor";
import {
  decodeQueryResponse,
  type StructuredRecord,
} from "../warehouse/ResponseDecoder";
import {
  buildInsertStatement,
  buildSelectStatement,
  type TableRef,
} from "../warehouse/statements";

export type TermsControllerDeps = {
  executor: QueryExecutor;
  filters: RangeFilterBuilder;
  table: TableRef;
};

export class TermsController {
  private readonly log = getLogger({
    service: "trends",
    component: "TermsController",
  });

  constructor(private readonly deps: TermsControllerDeps) {}

  /** POST /api/trends/v1/terms */
  public insert(): RequestHandler {
    const log = this.log.bind({ route: "POST /terms" });

    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const row = assertRisingTerm(req.body);
        const statement = buildInsertStatement(this.deps.table, row);
        await this.deps.executor.runQuery(statement);

        log.info({ requestId: req.id, term: row.term, week: row.week }, "terms_insert_ok");
        res.status(200).end();
      } catch (err) {
        next(err);
      }
    };
  }

  /** GET /api/trends/v1/terms?from=YYYY-MM-DD&to=YYYY-MM-DD */
  public select(): RequestHandler {
    const log = this.log.bind({ route: "GET /terms" });

    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const from = queryParam(req, "from");
        const to = queryParam(req, "to");
        const filter = this.deps.filters.buildFilter(from, to);
        const statement = buildSelectStatement(this.deps.table, filter);

        const response = await this.deps.executor.runQuery(statement);
        const records = decodeForStatement(response, statement.sql);

        log.info({ requestId: req.id, count: records.length }, "terms_select_ok");
        res.status(200).json(records);
      } catch (err) {
        next(err);
      }
    };
  }
}

function queryParam(req: Request, name: string): string | undefined {
  const v = req.query[name];
  if (v === undefined) return undefined;
  if (typeof v !== "string") {
    throw new DateRangeError(`query string \`${name}\` must be given once`);
  }
  return v;
}

function decodeForStatement(response: unknown, sql: string): StructuredRecord[] {
  try {
    return decodeQueryResponse(response);
  } catch (err: unknown) {
    if (err instanceof ServiceError) throw withQuery(err, sql);
    throw err;
  }
}
