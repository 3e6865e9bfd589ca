// backend/services/trends/src/filters/RangeFilterBuilder.ts
/**
 * Purpose:
 * - Translate optional `from` / `to` calendar dates into a WHERE clause.
 *
 * Rules (weeks start on Sunday, dates are YYYY-MM-DD, UTC):
 * - neither  → week >= start of the current week
 * - to only  → current week onward AND week <= @to; `to` before the most
 *              recent Sunday leaves nothing in range and is rejected
 * - from only→ week >= @from
 * - both     → date >= @from AND date <= @to; `to` before `from` is rejected
 * - Any unparsable date rejects the request before a query is built.
 */

import { DateRangeError } from "../errors";
import type { QueryParameter } from "../warehouse/statements";

export type FilterClause = {
  sql: string;
  params: QueryParameter[];
};

/** Start of the current week as computed by the warehouse (WEEK = Sunday). */
const CURRENT_WEEK_START = "DATE_TRUNC(CURRENT_DATE(), WEEK)";

const DATE_FORMAT = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC midnight (epoch ms) of a strict YYYY-MM-DD calendar date, else null. */
export function calendarDateMs(value: string): number | null {
  const m = DATE_FORMAT.exec(value);
  if (!m) return null;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const ms = Date.UTC(y, mo - 1, d);
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== y ||
    check.getUTCMonth() !== mo - 1 ||
    check.getUTCDate() !== d
  ) {
    return null;
  }
  return ms;
}

export function parseCalendarDate(name: string, value: string): number {
  const ms = calendarDateMs(value);
  if (ms === null) {
    throw new DateRangeError(
      `query string \`${name}\`: "${value}" is not a YYYY-MM-DD calendar date`
    );
  }
  return ms;
}

/** Most recent Sunday (today if today is Sunday), UTC midnight epoch ms. */
export function mostRecentSunday(today: Date): number {
  const midnight = Date.UTC(
    today.getUTCFullYear(),
    today.getUTCMonth(),
    today.getUTCDate()
  );
  return midnight - today.getUTCDay() * DAY_MS;
}

export class RangeFilterBuilder {
  private readonly now: () => Date;

  constructor(opts: { now?: () => Date } = {}) {
    this.now = opts.now ?? (() => new Date());
  }

  buildFilter(from?: string, to?: string): FilterClause {
    if (from !== undefined && to !== undefined) {
      const fromMs = parseCalendarDate("from", from);
      const toMs = parseCalendarDate("to", to);
      if (toMs < fromMs) {
        throw new DateRangeError(
          `query string \`from\`: ${from} or \`to\`: ${to} is not valid (to precedes from)`
        );
      }
      return {
        sql: "date >= @from AND date <= @to",
        params: [dateParam("from", from), dateParam("to", to)],
      };
    }

    if (from !== undefined) {
      parseCalendarDate("from", from);
      return { sql: "week >= @from", params: [dateParam("from", from)] };
    }

    if (to !== undefined) {
      const toMs = parseCalendarDate("to", to);
      if (toMs < mostRecentSunday(this.now())) {
        throw new DateRangeError(
          `query string \`to\`: ${to} is before the start of the current week`
        );
      }
      return {
        sql: `week >= ${CURRENT_WEEK_START} AND week <= @to`,
        params: [dateParam("to", to)],
      };
    }

    return { sql: `week >= ${CURRENT_WEEK_START}`, params: [] };
  }
}

function dateParam(name: string, value: string): QueryParameter {
  return { name, type: "DATE", value };
}
