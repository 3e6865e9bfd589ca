// backend/services/trends/src/warehouse/statements.ts
/**
 * Statement text + named parameters for the rising-terms table.
 *
 * Values always travel as typed query parameters. Only the table reference is
 * spliced into the text, and TrendsEnv restricts its charset at boot.
 */

import type { RisingTermPayload } from "../contracts/risingTerm.contract";
import type { FilterClause } from "../filters/RangeFilterBuilder";

export type ParamType = "STRING" | "INT64" | "DATE";

export type QueryParameter = {
  name: string;
  type: ParamType;
  value: string;
};

export type Statement = {
  sql: string;
  params: QueryParameter[];
};

export type TableRef = {
  projectId: string;
  datasetTableId: string; // "<dataset>.<table>"
};

export function tableSql(t: TableRef): string {
  return `\`${t.projectId}.${t.datasetTableId}\``;
}

/** Column order of the insert; also the parameter names. */
const INSERT_COLUMNS = [
  ["refresh_date", "DATE"],
  ["dma_name", "STRING"],
  ["dma_id", "INT64"],
  ["term", "STRING"],
  ["week", "DATE"],
  ["score", "INT64"],
  ["rank", "INT64"],
  ["percent_gain", "INT64"],
] as const satisfies ReadonlyArray<readonly [keyof RisingTermPayload, ParamType]>;

export function buildInsertStatement(
  table: TableRef,
  row: RisingTermPayload
): Statement {
  const columns = INSERT_COLUMNS.map(([name]) => name);
  const sql =
    `INSERT INTO ${tableSql(table)} (${columns.join(", ")}) ` +
    `VALUES (${columns.map((c) => `@${c}`).join(", ")})`;

  const params = INSERT_COLUMNS.map(([name, type]) => ({
    name,
    type,
    value: String(row[name]),
  }));

  return { sql, params };
}

export function buildSelectStatement(
  table: TableRef,
  filter: FilterClause
): Statement {
  return {
    sql: `SELECT * FROM ${tableSql(table)} WHERE ${filter.sql}`,
    params: [...filter.params],
  };
}
