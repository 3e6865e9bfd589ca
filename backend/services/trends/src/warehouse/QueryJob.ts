// backend/services/trends/src/warehouse/QueryJob.ts
/**
 * Wire shape of a synchronous query job (jobs.query request body).
 */

import type { QueryParameter, Statement } from "./statements";

/** Processing location of the dataset. */
export const QUERY_LOCATION = "US";

type WireParameter = {
  name: string;
  parameterType: { type: string };
  parameterValue: { value: string };
};

export type QueryJob = {
  kind: "bigquery#queryRequest";
  query: string;
  location: string;
  useLegacySql: false;
  parameterMode?: "NAMED";
  queryParameters?: WireParameter[];
};

function toWire(p: QueryParameter): WireParameter {
  return {
    name: p.name,
    parameterType: { type: p.type },
    parameterValue: { value: p.value },
  };
}

export function buildQueryJob(statement: Statement): QueryJob {
  const job: QueryJob = {
    kind: "bigquery#queryRequest",
    query: statement.sql,
    location: QUERY_LOCATION,
    useLegacySql: false,
  };
  if (statement.params.length > 0) {
    job.parameterMode = "NAMED";
    job.queryParameters = statement.params.map(toWire);
  }
  return job;
}
